import type { Descriptor, DescriptorKind } from "../descriptors/types";

/** Face rectangle in pixel coordinates of the decoded image. */
export interface BoundingBox {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/** Image bytes as received from the caller, before decoding. */
export interface RawImage {
  bytes: Uint8Array;
  /** Where the bytes came from (file path, upload name); informational only. */
  source?: string;
}

export interface DecodedImage {
  /** Normalised bytes (resized and re-encoded when needed). */
  bytes: Buffer;
  width: number;
  height: number;
  format: string;
  source?: string;
}

export interface ImageDecoder {
  decode(image: RawImage): Promise<DecodedImage>;
}

export interface FaceDetector {
  /** Faces in detector order. */
  detect(image: DecodedImage): Promise<BoundingBox[]>;
}

export interface FaceEmbedder {
  readonly kind: DescriptorKind;
  embed(image: DecodedImage, box: BoundingBox): Promise<Descriptor>;
}
