import {
  RekognitionClient,
  DetectFacesCommand,
  type BoundingBox as AwsBoundingBox,
} from "@aws-sdk/client-rekognition";
import Bottleneck from "bottleneck";
import { DetectorUnavailableError, ImageDecodeFailureError } from "../errors";
import { createLogger } from "../logger";
import type { BoundingBox, DecodedImage, FaceDetector } from "./types";

const log = createLogger("rekognition");

export interface RekognitionDetectorOptions {
  region: string;
  rateLimit: {
    minTime: number;
    maxConcurrent: number;
  };
}

export interface SendCapable {
  send(command: DetectFacesCommand): Promise<{ FaceDetails?: Array<{ BoundingBox?: AwsBoundingBox }> }>;
}

function hasName(error: unknown): error is { name: string; message: string } {
  return typeof error === "object" && error !== null && "name" in error && "message" in error;
}

/**
 * Detector backed by AWS Rekognition DetectFaces. Rekognition only locates
 * faces here; descriptors still come from the configured embedder.
 */
export class RekognitionDetector implements FaceDetector {
  private client: SendCapable;
  private limiter: Bottleneck;

  constructor(options: RekognitionDetectorOptions, client?: SendCapable) {
    if (client) {
      this.client = client;
    } else {
      const rekognition = new RekognitionClient({ region: options.region });
      this.client = { send: (command) => rekognition.send(command) };
    }
    this.limiter = new Bottleneck({
      minTime: options.rateLimit.minTime,
      maxConcurrent: options.rateLimit.maxConcurrent,
    });
  }

  async detect(image: DecodedImage): Promise<BoundingBox[]> {
    return this.limiter.schedule(async () => {
      log.debug({ source: image.source }, "Detecting faces");

      try {
        const response = await this.client.send(
          new DetectFacesCommand({
            Image: { Bytes: image.bytes },
            Attributes: ["DEFAULT"],
          })
        );

        const boxes: BoundingBox[] = [];
        for (const detail of response.FaceDetails ?? []) {
          if (detail.BoundingBox) {
            boxes.push(toPixelBox(detail.BoundingBox, image.width, image.height));
          }
        }

        log.debug({ source: image.source, faces: boxes.length }, "Detection completed");
        return boxes;
      } catch (error) {
        if (hasName(error) && (error.name === "InvalidImageFormatException" || error.name === "ImageTooLargeException")) {
          throw new ImageDecodeFailureError(`Rekognition rejected image: ${error.message}`, { cause: error });
        }
        const message = hasName(error) ? `${error.name}: ${error.message}` : String(error);
        log.error({ source: image.source, error: message }, "DetectFaces failed");
        throw new DetectorUnavailableError(`Rekognition detect failed: ${message}`, { cause: error });
      }
    });
  }
}

/**
 * Rekognition boxes are ratios of the image size and may extend past its edges.
 */
export function toPixelBox(box: AwsBoundingBox, width: number, height: number): BoundingBox {
  const left = Math.max(0, Math.round((box.Left ?? 0) * width));
  const top = Math.max(0, Math.round((box.Top ?? 0) * height));
  const right = Math.min(width, Math.round(((box.Left ?? 0) + (box.Width ?? 0)) * width));
  const bottom = Math.min(height, Math.round(((box.Top ?? 0) + (box.Height ?? 0)) * height));
  return { top, right, bottom, left };
}
