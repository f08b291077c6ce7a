import { thresholdFor, type Config } from "./config";
import { embeddingKind, histogramKind, type DescriptorKind } from "./descriptors/types";
import { initDatabase, SqliteEntryStore, SqliteHistorySink } from "./db";
import { SharpImageDecoder } from "./faces/image";
import { RekognitionDetector } from "./faces/rekognition";
import { FaceServiceClient } from "./faces/service";
import type { FaceDetector } from "./faces/types";
import { GalleryManager } from "./gallery/manager";
import { GalleryRegistry } from "./gallery/registry";
import { setLogLevel } from "./logger";
import { Enroller } from "./recognition/enrollment";
import { Recognizer } from "./recognition/recognizer";

export interface Services {
  config: Config;
  kind: DescriptorKind;
  threshold: number;
  registry: GalleryRegistry;
  recognizer: Recognizer;
  manager: GalleryManager;
  entries: SqliteEntryStore;
  history: SqliteHistorySink;
}

export function galleryKind(config: Config): DescriptorKind {
  return config.gallery.kind === "embedding"
    ? embeddingKind(config.gallery.dimension)
    : histogramKind(config.gallery.dimension, config.gallery.histogramMetric);
}

/**
 * Open the database, build the first gallery from it and wire the
 * collaborators the config selects.
 */
export async function createServices(config: Config): Promise<Services> {
  setLogLevel(config.logging.level);
  initDatabase(config.database.path);

  const kind = galleryKind(config);
  const decoder = new SharpImageDecoder(config.imageProcessing);
  const faceService = new FaceServiceClient(config.faceService, kind);
  const detector: FaceDetector =
    config.detector.backend === "rekognition"
      ? new RekognitionDetector({ region: config.aws.region, rateLimit: config.aws.rateLimit })
      : faceService;

  const entries = new SqliteEntryStore();
  const history = new SqliteHistorySink();
  const registry = new GalleryRegistry(kind);
  await registry.refresh(entries);

  const recognizer = new Recognizer({
    decoder,
    detector,
    embedder: faceService,
    history,
    concurrency: config.recognition.concurrency,
  });
  const enroller = new Enroller({ decoder, detector, embedder: faceService });
  const manager = new GalleryManager(entries, registry, enroller);

  return {
    config,
    kind,
    threshold: thresholdFor(config),
    registry,
    recognizer,
    manager,
    entries,
    history,
  };
}
