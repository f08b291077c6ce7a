export * from "./errors";
export * from "./descriptors/types";
export * from "./descriptors/metrics";
export * from "./gallery/types";
export { Gallery } from "./gallery/gallery";
export { GalleryRegistry } from "./gallery/registry";
export { GalleryManager, type EnrollResult } from "./gallery/manager";
export { MemoryEntryStore } from "./gallery/memory";
export { validateEntryMetadata, type EntryMetadata, type EntryMetadataInput } from "./gallery/attributes";
export { LinearScanMatcher, UNMATCHED, unknownMatch, type Match, type Matcher } from "./matching/matcher";
export { calibrate } from "./matching/calibrator";
export * from "./recognition/types";
export { Recognizer, type RecognizerDeps } from "./recognition/recognizer";
export { Enroller, type EnrollerDeps } from "./recognition/enrollment";
export * from "./history/types";
export { MemoryHistorySink } from "./history/memory";
export * from "./faces/types";
export { SharpImageDecoder, readImageFile, type ImageProcessingOptions } from "./faces/image";
export { FaceServiceClient, type FaceServiceOptions, type FetchFn } from "./faces/service";
export { RekognitionDetector, toPixelBox, type RekognitionDetectorOptions } from "./faces/rekognition";
export { SqliteEntryStore, SqliteHistorySink, initDatabase, closeDatabase } from "./db";
export { loadConfig, parseConfig, thresholdFor, type Config } from "./config";
export { createServices, galleryKind, type Services } from "./services";
export { createLogger } from "./logger";
