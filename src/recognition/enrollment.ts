import { checkDescriptor, describeKind, type Descriptor, type DescriptorKind } from "../descriptors/types";
import {
  DetectorUnavailableError,
  EmbedderFailureError,
  ImageDecodeFailureError,
  MixedDescriptorKindError,
  MultipleFacesDetectedError,
  NoFaceDetectedError,
  errorMessage,
  isRollcallError,
} from "../errors";
import type { BoundingBox, DecodedImage, FaceDetector, FaceEmbedder, ImageDecoder, RawImage } from "../faces/types";
import { createLogger } from "../logger";

const log = createLogger("enrollment");

export interface EnrollerDeps {
  decoder: ImageDecoder;
  detector: FaceDetector | null;
  embedder: FaceEmbedder;
}

/** Turns an enrollment photo showing exactly one face into a descriptor. */
export class Enroller {
  private decoder: ImageDecoder;
  private detector: FaceDetector | null;
  private embedder: FaceEmbedder;

  constructor(deps: EnrollerDeps) {
    this.decoder = deps.decoder;
    this.detector = deps.detector;
    this.embedder = deps.embedder;
  }

  get kind(): DescriptorKind {
    return this.embedder.kind;
  }

  async prepareEntry(image: RawImage): Promise<Descriptor> {
    if (!this.detector) {
      throw new DetectorUnavailableError("No face detector configured");
    }

    let decoded: DecodedImage;
    try {
      decoded = await this.decoder.decode(image);
    } catch (error) {
      if (isRollcallError(error, "IMAGE_DECODE_FAILURE")) throw error;
      throw new ImageDecodeFailureError(`Could not decode image: ${errorMessage(error)}`, { cause: error });
    }

    let boxes: BoundingBox[];
    try {
      boxes = await this.detector.detect(decoded);
    } catch (error) {
      if (isRollcallError(error)) throw error;
      throw new DetectorUnavailableError(`Face detector failed: ${errorMessage(error)}`, { cause: error });
    }

    if (boxes.length === 0) {
      log.warn({ source: image.source }, "No face detected in enrollment image");
      throw new NoFaceDetectedError();
    }
    if (boxes.length > 1) {
      log.warn({ source: image.source, faces: boxes.length }, "Multiple faces in enrollment image");
      throw new MultipleFacesDetectedError(boxes.length);
    }

    let descriptor: Descriptor;
    try {
      descriptor = await this.embedder.embed(decoded, boxes[0]);
    } catch (error) {
      throw new EmbedderFailureError(0, `Embedding failed: ${errorMessage(error)}`, { cause: error });
    }

    const problem = checkDescriptor(descriptor, this.embedder.kind);
    if (problem) {
      throw new MixedDescriptorKindError(
        `Embedder output does not match gallery kind ${describeKind(this.embedder.kind)}: ${problem}`
      );
    }

    log.debug({ source: image.source, kind: descriptor.kind }, "Enrollment descriptor prepared");
    return descriptor;
  }
}
