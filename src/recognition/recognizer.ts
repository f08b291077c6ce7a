import Bottleneck from "bottleneck";
import { performance } from "perf_hooks";
import type { Descriptor, DescriptorKind } from "../descriptors/types";
import {
  DetectorUnavailableError,
  EmbedderFailureError,
  HistoryAppendFailureError,
  ImageDecodeFailureError,
  InvalidOptionsError,
  RecognitionCancelledError,
  errorMessage,
  isRollcallError,
} from "../errors";
import type { BoundingBox, DecodedImage, FaceDetector, FaceEmbedder, ImageDecoder, RawImage } from "../faces/types";
import type { Gallery } from "../gallery/gallery";
import type { GalleryRegistry } from "../gallery/registry";
import type { HistorySink } from "../history/types";
import { createLogger } from "../logger";
import { LinearScanMatcher, unknownMatch, type Matcher } from "../matching/matcher";
import { elapsedMs, timed } from "../utils/timing";
import {
  DEFAULT_MAX_FACES,
  type FaceObservation,
  type MatchResult,
  type RecognitionRun,
  type RecognizeOptions,
} from "./types";

const log = createLogger("recognizer");

export interface RecognizerDeps {
  decoder: ImageDecoder;
  detector: FaceDetector | null;
  embedder: FaceEmbedder;
  history?: HistorySink | null;
  matcher?: Matcher;
  /** Faces embedded and matched in parallel within one run. */
  concurrency?: number;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RecognitionCancelledError();
  }
}

/**
 * Detect, embed and match every face in one image against a fixed gallery
 * snapshot, then record the run.
 */
export class Recognizer {
  private decoder: ImageDecoder;
  private detector: FaceDetector | null;
  private embedder: FaceEmbedder;
  private history: HistorySink | null;
  private matcher: Matcher;
  private concurrency: number;

  constructor(deps: RecognizerDeps) {
    this.decoder = deps.decoder;
    this.detector = deps.detector;
    this.embedder = deps.embedder;
    this.history = deps.history ?? null;
    this.matcher = deps.matcher ?? new LinearScanMatcher();
    this.concurrency = Math.max(1, deps.concurrency ?? 4);
  }

  get kind(): DescriptorKind {
    return this.embedder.kind;
  }

  /** Snapshot the registry once, then recognize against that snapshot. */
  async recognizeCurrent(
    image: RawImage,
    registry: GalleryRegistry,
    options: RecognizeOptions
  ): Promise<RecognitionRun> {
    return this.recognize(image, registry.snapshot(), options);
  }

  async recognize(image: RawImage, gallery: Gallery, options: RecognizeOptions): Promise<RecognitionRun> {
    return timed(log, "recognize", () => this.run(image, gallery, options), {
      source: image.source,
      galleryVersion: gallery.version,
    });
  }

  private async run(image: RawImage, gallery: Gallery, options: RecognizeOptions): Promise<RecognitionRun> {
    const start = performance.now();
    const timestamp = new Date().toISOString();
    const maxFaces = options.maxFaces ?? DEFAULT_MAX_FACES;
    const { threshold, signal } = options;
    if (!Number.isInteger(maxFaces) || maxFaces < 0) {
      throw new InvalidOptionsError(`maxFaces must be a non-negative integer, got ${maxFaces}`);
    }

    throwIfAborted(signal);
    const detector = this.detector;
    if (!detector) {
      throw new DetectorUnavailableError("No face detector configured");
    }

    const decoded = await this.decode(image);
    throwIfAborted(signal);

    const boxes = await this.detect(detector, decoded);
    const warnings: string[] = [];

    let retained = boxes;
    if (boxes.length > maxFaces) {
      const warning = `Too many faces detected (${boxes.length}), processing first ${maxFaces}`;
      log.warn({ source: image.source, detected: boxes.length, maxFaces }, warning);
      warnings.push(warning);
      retained = boxes.slice(0, maxFaces);
    }

    const results = await this.matchAll(decoded, retained, gallery, threshold, signal);
    throwIfAborted(signal);

    const totalRecognized = results.filter((r) => r.isKnown).length;
    const run: RecognitionRun = deepFreeze({
      timestamp,
      totalDetected: results.length,
      totalRecognized,
      perFaceResults: results,
      processingDurationMs: elapsedMs(start),
      galleryVersion: gallery.version,
      metadata: {
        warnings,
        facesFound: boxes.length,
        imageWidth: decoded.width,
        imageHeight: decoded.height,
        threshold,
        ...(image.source !== undefined ? { source: image.source } : {}),
      },
    });

    log.info(
      {
        source: image.source,
        detected: run.totalDetected,
        recognized: run.totalRecognized,
        galleryVersion: run.galleryVersion,
      },
      "Recognition completed"
    );

    await this.appendHistory(run);
    return run;
  }

  private async decode(image: RawImage): Promise<DecodedImage> {
    try {
      return await this.decoder.decode(image);
    } catch (error) {
      if (isRollcallError(error, "IMAGE_DECODE_FAILURE")) throw error;
      throw new ImageDecodeFailureError(`Could not decode image: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async detect(detector: FaceDetector, image: DecodedImage): Promise<BoundingBox[]> {
    try {
      return await detector.detect(image);
    } catch (error) {
      if (isRollcallError(error, "DETECTOR_UNAVAILABLE") || isRollcallError(error, "IMAGE_DECODE_FAILURE")) {
        throw error;
      }
      throw new DetectorUnavailableError(`Face detector failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async matchAll(
    image: DecodedImage,
    boxes: BoundingBox[],
    gallery: Gallery,
    threshold: number,
    signal: AbortSignal | undefined
  ): Promise<MatchResult[]> {
    if (boxes.length === 0) return [];

    const limiter = new Bottleneck({ maxConcurrent: this.concurrency });
    // Promise.all keeps face-index order regardless of completion order
    return Promise.all(
      boxes.map((box, index) =>
        limiter.schedule(async () => {
          throwIfAborted(signal);
          return this.matchFace(image, box, index, gallery, threshold);
        })
      )
    );
  }

  private async matchFace(
    image: DecodedImage,
    box: BoundingBox,
    index: number,
    gallery: Gallery,
    threshold: number
  ): Promise<MatchResult> {
    let descriptor: Descriptor;
    try {
      descriptor = await this.embedder.embed(image, box);
    } catch (error) {
      const failure = new EmbedderFailureError(index, `Embedding failed for face ${index}: ${errorMessage(error)}`, {
        cause: error,
      });
      log.warn({ source: image.source, faceIndex: index, error: failure.message }, "Face degraded to unknown");
      return { ...unknownMatch(null), observation: { index, boundingBox: box, descriptor: null } };
    }

    const observation: FaceObservation = { index, boundingBox: box, descriptor };
    try {
      return { ...this.matcher.match(descriptor, gallery, threshold), observation };
    } catch (error) {
      // A descriptor of the wrong shape is an embedder fault for this face only
      log.warn({ source: image.source, faceIndex: index, error: errorMessage(error) }, "Face degraded to unknown");
      return { ...unknownMatch(null), observation: { ...observation, descriptor: null } };
    }
  }

  private async appendHistory(run: RecognitionRun): Promise<void> {
    if (!this.history) return;
    try {
      await this.history.append(run);
    } catch (error) {
      const failure = new HistoryAppendFailureError(`Could not record recognition run: ${errorMessage(error)}`, {
        cause: error,
      });
      log.error(
        { code: failure.code, error: failure.message, galleryVersion: run.galleryVersion, timestamp: run.timestamp },
        "History append failed"
      );
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
