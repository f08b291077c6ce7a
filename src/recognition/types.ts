import type { Descriptor } from "../descriptors/types";
import type { BoundingBox } from "../faces/types";
import type { Match } from "../matching/matcher";

export interface FaceObservation {
  /** Position among the image's detected faces, in detector order. */
  index: number;
  boundingBox: BoundingBox;
  /** Null when the embedder failed for this face. */
  descriptor: Descriptor | null;
}

export interface MatchResult extends Match {
  observation: FaceObservation;
}

export interface RunMetadata {
  warnings: string[];
  /** Faces the detector returned, before truncation to maxFaces. */
  facesFound: number;
  imageWidth: number | null;
  imageHeight: number | null;
  threshold: number;
  source?: string;
}

export interface RecognitionRun {
  timestamp: string;
  totalDetected: number;
  totalRecognized: number;
  perFaceResults: readonly MatchResult[];
  processingDurationMs: number;
  galleryVersion: number;
  metadata: RunMetadata;
}

export interface RecognizeOptions {
  threshold: number;
  maxFaces?: number;
  signal?: AbortSignal;
}

export const DEFAULT_MAX_FACES = 50;
