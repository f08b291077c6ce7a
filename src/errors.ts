export type RollcallErrorCode =
  | "IMAGE_DECODE_FAILURE"
  | "DETECTOR_UNAVAILABLE"
  | "NO_FACE_DETECTED"
  | "MULTIPLE_FACES_DETECTED"
  | "EMBEDDER_FAILURE"
  | "MIXED_DESCRIPTOR_KIND"
  | "DESCRIPTOR_MISMATCH"
  | "HISTORY_APPEND_FAILURE"
  | "RECOGNITION_CANCELLED"
  | "DUPLICATE_ENTRY"
  | "INVALID_ENTRY"
  | "ENTRY_NOT_FOUND"
  | "CONFIG_ERROR"
  | "INVALID_OPTIONS";

export class RollcallError extends Error {
  readonly code: RollcallErrorCode;

  constructor(code: RollcallErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export function isRollcallError(error: unknown, code?: RollcallErrorCode): error is RollcallError {
  return error instanceof RollcallError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ImageDecodeFailureError extends RollcallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("IMAGE_DECODE_FAILURE", message, options);
  }
}

export class DetectorUnavailableError extends RollcallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DETECTOR_UNAVAILABLE", message, options);
  }
}

export class NoFaceDetectedError extends RollcallError {
  constructor(message = "No face detected in the image. Use a clear, well-lit photo of one person.") {
    super("NO_FACE_DETECTED", message);
  }
}

export class MultipleFacesDetectedError extends RollcallError {
  readonly faceCount: number;

  constructor(faceCount: number) {
    super(
      "MULTIPLE_FACES_DETECTED",
      `${faceCount} faces detected; enrollment images must contain exactly one face`
    );
    this.faceCount = faceCount;
  }
}

export class EmbedderFailureError extends RollcallError {
  readonly faceIndex: number;

  constructor(faceIndex: number, message: string, options?: { cause?: unknown }) {
    super("EMBEDDER_FAILURE", message, options);
    this.faceIndex = faceIndex;
  }
}

export class MixedDescriptorKindError extends RollcallError {
  constructor(message: string) {
    super("MIXED_DESCRIPTOR_KIND", message);
  }
}

export class DescriptorMismatchError extends RollcallError {
  constructor(message: string) {
    super("DESCRIPTOR_MISMATCH", message);
  }
}

export class HistoryAppendFailureError extends RollcallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("HISTORY_APPEND_FAILURE", message, options);
  }
}

export class RecognitionCancelledError extends RollcallError {
  constructor(message = "Recognition run cancelled") {
    super("RECOGNITION_CANCELLED", message);
  }
}

export class DuplicateEntryError extends RollcallError {
  constructor(id: string | number) {
    super("DUPLICATE_ENTRY", `Duplicate gallery entry id: ${id}`);
  }
}

export class InvalidEntryError extends RollcallError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_ENTRY", `Invalid entry: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

export class EntryNotFoundError extends RollcallError {
  constructor(id: string | number) {
    super("ENTRY_NOT_FOUND", `Entry not found: ${id}`);
  }
}

export class ConfigError extends RollcallError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
  }
}

export class InvalidOptionsError extends RollcallError {
  constructor(message: string) {
    super("INVALID_OPTIONS", message);
  }
}
