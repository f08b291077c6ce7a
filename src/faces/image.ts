import sharp from "sharp";
import { readFile } from "fs/promises";
import { ImageDecodeFailureError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { DecodedImage, ImageDecoder, RawImage } from "./types";

const log = createLogger("image");

export interface ImageProcessingOptions {
  maxDimension: number;
  jpegQuality: number;
}

/**
 * Decodes with sharp, downscaling anything larger than maxDimension and
 * re-encoding formats the face services do not accept as JPEG.
 */
export class SharpImageDecoder implements ImageDecoder {
  private options: ImageProcessingOptions;

  constructor(options: ImageProcessingOptions) {
    this.options = options;
  }

  async decode(image: RawImage): Promise<DecodedImage> {
    const { maxDimension, jpegQuality } = this.options;
    const input = Buffer.from(image.bytes);

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(input).metadata();
    } catch (error) {
      throw new ImageDecodeFailureError(
        `Could not decode image${image.source ? ` ${image.source}` : ""}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const { width, height, format } = metadata;
    if (!width || !height || !format) {
      throw new ImageDecodeFailureError(
        `Image${image.source ? ` ${image.source}` : ""} has no readable dimensions`
      );
    }

    log.debug({ source: image.source, format, width, height, size: input.length }, "Decoding image");

    try {
      if (width > maxDimension || height > maxDimension) {
        log.debug({ source: image.source, maxDimension }, "Resizing large image");
        const { data, info } = await sharp(input)
          .rotate()
          .resize(maxDimension, maxDimension, { fit: "inside" })
          .jpeg({ quality: jpegQuality })
          .toBuffer({ resolveWithObject: true });
        return { bytes: data, width: info.width, height: info.height, format: "jpeg", source: image.source };
      }

      if (format !== "jpeg" && format !== "png") {
        log.debug({ source: image.source, format }, "Converting to JPEG");
        const { data, info } = await sharp(input)
          .jpeg({ quality: jpegQuality })
          .toBuffer({ resolveWithObject: true });
        return { bytes: data, width: info.width, height: info.height, format: "jpeg", source: image.source };
      }
    } catch (error) {
      throw new ImageDecodeFailureError(
        `Could not process image${image.source ? ` ${image.source}` : ""}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return { bytes: input, width, height, format, source: image.source };
  }
}

export async function readImageFile(path: string): Promise<RawImage> {
  try {
    return { bytes: await readFile(path), source: path };
  } catch (error) {
    throw new ImageDecodeFailureError(`Could not read image ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
