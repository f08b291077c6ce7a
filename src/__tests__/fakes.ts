import type { Descriptor, DescriptorKind } from "../descriptors/types";
import type {
  BoundingBox,
  DecodedImage,
  FaceDetector,
  FaceEmbedder,
  ImageDecoder,
  RawImage,
} from "../faces/types";

export function rawImage(source = "test.jpg"): RawImage {
  return { bytes: new Uint8Array([1, 2, 3]), source };
}

export class FakeDecoder implements ImageDecoder {
  calls = 0;

  constructor(private failure?: Error) {}

  async decode(image: RawImage): Promise<DecodedImage> {
    this.calls++;
    if (this.failure) throw this.failure;
    return { bytes: Buffer.from(image.bytes), width: 640, height: 480, format: "jpeg", source: image.source };
  }
}

export class FakeDetector implements FaceDetector {
  calls = 0;

  constructor(private result: BoundingBox[] | Error) {}

  async detect(): Promise<BoundingBox[]> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

/** Box whose `left` coordinate identifies the face to the fake embedder. */
export function box(key: number): BoundingBox {
  return { top: 10, right: key + 20, bottom: 30, left: key };
}

export function boxes(count: number): BoundingBox[] {
  return Array.from({ length: count }, (_, i) => box(i));
}

type EmbedFn = (box: BoundingBox) => Descriptor | Promise<Descriptor>;

export class FakeEmbedder implements FaceEmbedder {
  calls: BoundingBox[] = [];

  constructor(readonly kind: DescriptorKind, private fn: EmbedFn) {}

  async embed(_image: DecodedImage, faceBox: BoundingBox): Promise<Descriptor> {
    this.calls.push(faceBox);
    return this.fn(faceBox);
  }
}

export function embedding(...values: number[]): Descriptor {
  return { kind: "embedding", values };
}

export function histogram(...values: number[]): Descriptor {
  return { kind: "histogram", values };
}

/** Promise plus the functions that settle it, for controlling interleavings. */
export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void; reject: (error: Error) => void } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
