import Bottleneck from "bottleneck";
import { z } from "zod";
import type { Descriptor, DescriptorKind } from "../descriptors/types";
import {
  DetectorUnavailableError,
  ImageDecodeFailureError,
  errorMessage,
} from "../errors";
import { createLogger } from "../logger";
import type { BoundingBox, DecodedImage, FaceDetector, FaceEmbedder } from "./types";

const log = createLogger("face-service");

const boxSchema = z.object({
  top: z.number(),
  right: z.number(),
  bottom: z.number(),
  left: z.number(),
});

const detectResponseSchema = z.object({
  faces: z.array(boxSchema),
});

const embedResponseSchema = z.object({
  kind: z.enum(["embedding", "histogram"]),
  values: z.array(z.number()),
});

export interface FaceServiceOptions {
  url: string;
  timeoutMs: number;
  rateLimit: {
    minTime: number;
    maxConcurrent: number;
  };
}

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

/**
 * Client for the face analysis sidecar: one service does both detection and
 * descriptor extraction over JSON/HTTP.
 */
export class FaceServiceClient implements FaceDetector, FaceEmbedder {
  readonly kind: DescriptorKind;
  private baseUrl: string;
  private timeoutMs: number;
  private limiter: Bottleneck;
  private fetchFn: FetchFn;

  constructor(options: FaceServiceOptions, kind: DescriptorKind, fetchFn: FetchFn = fetch) {
    this.kind = kind;
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = fetchFn;
    this.limiter = new Bottleneck({
      minTime: options.rateLimit.minTime,
      maxConcurrent: options.rateLimit.maxConcurrent,
    });
  }

  async detect(image: DecodedImage): Promise<BoundingBox[]> {
    let body: unknown;
    try {
      body = await this.post("/detect", { image: image.bytes.toString("base64") });
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 422) {
        throw new ImageDecodeFailureError(`Face service could not read image: ${error.message}`, {
          cause: error,
        });
      }
      throw new DetectorUnavailableError(`Face service detect failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = detectResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DetectorUnavailableError(
        `Face service returned an invalid detect response: ${parsed.error.message}`
      );
    }

    log.debug({ source: image.source, faces: parsed.data.faces.length }, "Faces detected");
    return parsed.data.faces;
  }

  async embed(image: DecodedImage, box: BoundingBox): Promise<Descriptor> {
    const body = await this.post("/embed", {
      image: image.bytes.toString("base64"),
      box,
      kind: this.kind.type,
    });

    const parsed = embedResponseSchema.parse(body);
    return { kind: parsed.kind, values: parsed.values };
  }

  private post(path: string, payload: unknown): Promise<unknown> {
    return this.limiter.schedule(async () => {
      const url = `${this.baseUrl}${path}`;
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const text = await response.text();
        log.error({ url, status: response.status, body: text.slice(0, 200) }, "Face service request failed");
        throw new HttpStatusError(response.status, `${response.status} ${text.slice(0, 200)}`);
      }

      const body: unknown = await response.json();
      return body;
    });
  }
}
