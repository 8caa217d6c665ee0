import sharp from "sharp";
import { JPEG_QUALITY, MAX_DIMENSION, MAX_IMAGE_BYTES } from "./config";

export type ChannelCount = 1 | 2 | 3 | 4;

/** Raw pixels as decoded from an upload or camera capture. */
export type SourceImage = {
  pixels: Buffer;
  width: number;
  height: number;
  channels: ChannelCount;
};

export type NormalizeOptions = {
  maxDimension: number;
  quality: number;
};

const DEFAULT_OPTIONS: NormalizeOptions = {
  maxDimension: MAX_DIMENSION,
  quality: JPEG_QUALITY,
};

/**
 * Decodes PNG, JPEG, WEBP or GIF bytes (first frame only).
 * Rejects when the bytes are not a readable image.
 */
export async function decodeImage(bytes: Buffer): Promise<SourceImage> {
  const { data, info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });
  return {
    pixels: data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}

/** Target size that fits inside `max` x `max`; never upscales. */
export function boundedSize(width: number, height: number, max: number) {
  if (width <= max && height <= max) return { width, height };

  if (width >= height) {
    return { width: max, height: Math.max(1, Math.round((height * max) / width)) };
  }
  return { width: Math.max(1, Math.round((width * max) / height)), height: max };
}

/**
 * Drops alpha, bounds the dimensions and re-encodes as JPEG.
 * Identical input and options always give identical bytes.
 */
export async function normalizeImage(
  image: SourceImage,
  options: NormalizeOptions = DEFAULT_OPTIONS
): Promise<Buffer> {
  const { width, height, channels } = image;
  let pipeline = sharp(image.pixels, { raw: { width, height, channels } });

  // alpha is discarded, not composited
  if (channels === 2 || channels === 4) {
    pipeline = pipeline.removeAlpha().toColourspace("srgb");
  }

  const target = boundedSize(width, height, options.maxDimension);
  if (target.width !== width || target.height !== height) {
    pipeline = pipeline.resize({
      width: target.width,
      height: target.height,
      fit: "fill",
      kernel: sharp.kernel.lanczos3,
    });
  }

  return pipeline.jpeg({ quality: options.quality, optimiseCoding: true }).toBuffer();
}

export function toDataUri(bytes: Uint8Array): string {
  return `data:image/jpeg;base64,${Buffer.from(bytes).toString("base64")}`;
}

// The budget is a target only; nothing re-encodes when it is exceeded.
export function exceedsByteBudget(bytes: Uint8Array, budget = MAX_IMAGE_BYTES): boolean {
  return bytes.byteLength > budget;
}
