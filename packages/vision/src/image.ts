/**
 * Image loading and data URL encoding.
 *
 * @module @agent-tools/vision/image
 */

import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import { ImageReadError } from "@agent-tools/core";
import { ErrorCode } from "@agent-tools/shared";

export type ImageMimeType = "image/png" | "image/jpeg" | "image/gif" | "image/webp";

/** Largest image accepted by the providers (20MB) */
export const MAX_IMAGE_SIZE_BYTES = 20 * 1024 * 1024;

const EXTENSION_TO_MIME: Record<string, ImageMimeType> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

const MAGIC_BYTES: Array<{ bytes: number[]; offset: number; mimeType: ImageMimeType }> = [
  { bytes: [0x89, 0x50, 0x4e, 0x47], offset: 0, mimeType: "image/png" },
  { bytes: [0xff, 0xd8, 0xff], offset: 0, mimeType: "image/jpeg" },
  { bytes: [0x47, 0x49, 0x46, 0x38], offset: 0, mimeType: "image/gif" },
  // "WEBP" after the RIFF header
  { bytes: [0x57, 0x45, 0x42, 0x50], offset: 8, mimeType: "image/webp" },
];

export interface EncodedImage {
  dataUrl: string;
  mimeType: ImageMimeType;
  sizeBytes: number;
}

/**
 * Detect MIME type from file extension
 */
export function detectMimeTypeFromExtension(filePath: string): ImageMimeType | undefined {
  return EXTENSION_TO_MIME[extname(filePath).toLowerCase()];
}

/**
 * Detect MIME type from file magic bytes
 */
export function detectMimeTypeFromBuffer(buffer: Uint8Array): ImageMimeType | undefined {
  for (const { bytes, offset, mimeType } of MAGIC_BYTES) {
    if (bytes.every((byte, i) => buffer[offset + i] === byte)) {
      return mimeType;
    }
  }
  return undefined;
}

/**
 * Read an image from disk and encode it as a base64 data URL.
 *
 * The extension decides the MIME type; unknown extensions fall back to the
 * file's magic bytes.
 *
 * @throws ImageReadError if the file is missing, unreadable, empty, larger
 * than {@link MAX_IMAGE_SIZE_BYTES} or not a recognised image
 */
export async function readImageAsDataUrl(imagePath: string): Promise<EncodedImage> {
  let buffer: Buffer;
  try {
    const stats = await stat(imagePath);
    if (!stats.isFile()) {
      throw new ImageReadError(`Not a file: ${imagePath}`, imagePath, {
        code: ErrorCode.INVALID_ARGUMENT,
      });
    }
    if (stats.size > MAX_IMAGE_SIZE_BYTES) {
      throw new ImageReadError(
        `Image ${imagePath} is ${stats.size} bytes, exceeding the ${MAX_IMAGE_SIZE_BYTES} byte limit`,
        imagePath,
        { code: ErrorCode.INVALID_ARGUMENT }
      );
    }
    buffer = await readFile(imagePath);
  } catch (error) {
    if (error instanceof ImageReadError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ImageReadError(`Cannot read image ${imagePath}: ${reason}`, imagePath, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (buffer.length === 0) {
    throw new ImageReadError(`Image ${imagePath} is empty`, imagePath, {
      code: ErrorCode.INVALID_ARGUMENT,
    });
  }

  const mimeType = detectMimeTypeFromExtension(imagePath) ?? detectMimeTypeFromBuffer(buffer);
  if (!mimeType) {
    throw new ImageReadError(`Unable to detect image format for: ${imagePath}`, imagePath, {
      code: ErrorCode.INVALID_ARGUMENT,
    });
  }

  return {
    dataUrl: `data:${mimeType};base64,${buffer.toString("base64")}`,
    mimeType,
    sizeBytes: buffer.length,
  };
}
