import { z } from "zod";
import { parse as parseYaml } from "yaml";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { ConfigError } from "./errors";

const configSchema = z.object({
  database: z
    .object({
      path: z.string().default("./.rollcall.db"),
    })
    .default({}),
  gallery: z
    .object({
      kind: z.enum(["embedding", "histogram"]).default("embedding"),
      dimension: z.number().int().min(1).max(65536).default(128),
      histogramMetric: z.enum(["chi-square", "bhattacharyya"]).default("chi-square"),
    })
    .default({}),
  recognition: z
    .object({
      maxFaces: z.number().int().min(1).max(500).default(50),
      thresholds: z
        .object({
          embedding: z.number().positive().default(0.6),
          histogram: z.number().positive().default(100),
        })
        .default({}),
      concurrency: z.number().int().min(1).max(32).default(4),
      timeoutMs: z.number().int().min(100).max(600000).default(30000),
    })
    .default({}),
  imageProcessing: z
    .object({
      maxDimension: z.number().min(100).max(10000).default(1920),
      jpegQuality: z.number().min(1).max(100).default(90),
    })
    .default({}),
  detector: z
    .object({
      backend: z.enum(["service", "rekognition"]).default("service"),
    })
    .default({}),
  faceService: z
    .object({
      url: z.string().url().default("http://127.0.0.1:5001"),
      timeoutMs: z.number().int().min(100).max(120000).default(10000),
      rateLimit: z
        .object({
          minTime: z.number().min(0).default(0),
          maxConcurrent: z.number().min(1).max(32).default(4),
        })
        .default({}),
    })
    .default({}),
  aws: z
    .object({
      region: z.string().default("us-east-1"),
      rateLimit: z
        .object({
          minTime: z.number().min(0).default(200),
          maxConcurrent: z.number().min(1).max(20).default(5),
        })
        .default({}),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

const CONFIG_FILENAME = "config.yaml";
const GLOBAL_CONFIG_DIR = join(homedir(), ".config", "rollcall");

function expandPath(p: string): string {
  if (p === ":memory:") return p;
  if (p.startsWith("~/")) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}

export function getConfigPath(): string {
  const localPath = join(process.cwd(), CONFIG_FILENAME);
  if (existsSync(localPath)) {
    return localPath;
  }
  return join(GLOBAL_CONFIG_DIR, CONFIG_FILENAME);
}

/**
 * Validate a raw (already parsed) config object and fill in defaults.
 * Throws ConfigError listing every invalid field.
 */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const config = result.data;
  config.database.path = expandPath(config.database.path);
  return config;
}

export function loadConfig(): Config {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    // Return defaults if no config exists
    return parseConfig({});
  }

  const content = readFileSync(configPath, "utf-8");
  return parseConfig(parseYaml(content));
}

/** Match threshold for the gallery kind the config declares. */
export function thresholdFor(config: Config): number {
  return config.gallery.kind === "embedding"
    ? config.recognition.thresholds.embedding
    : config.recognition.thresholds.histogram;
}

export function getDefaultConfig(): string {
  return `# rollcall configuration

database:
  path: ./.rollcall.db

gallery:
  kind: embedding           # "embedding" (euclidean) or "histogram" (LBP histograms)
  dimension: 128            # Descriptor length produced by the embedder
  histogramMetric: chi-square   # chi-square or bhattacharyya (histogram galleries only)

recognition:
  maxFaces: 50              # Faces processed per image, in detector order
  thresholds:
    embedding: 0.6          # Max euclidean distance for a match
    histogram: 100          # Max histogram distance for a match
  concurrency: 4            # Faces embedded in parallel per image
  timeoutMs: 30000          # Abort a recognition run after this long

imageProcessing:
  maxDimension: 1920        # Max pixel dimension before resizing
  jpegQuality: 90           # Quality for JPEG re-encoding (1-100)

detector:
  backend: service          # "service" (face service sidecar) or "rekognition"

faceService:
  url: http://127.0.0.1:5001
  timeoutMs: 10000
  rateLimit:
    minTime: 0              # Minimum ms between requests
    maxConcurrent: 4        # Max concurrent requests

aws:
  region: us-east-1
  rateLimit:
    minTime: 200
    maxConcurrent: 5

logging:
  level: info               # fatal, error, warn, info, debug, trace, silent
`;
}
