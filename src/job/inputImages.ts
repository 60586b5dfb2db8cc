import { Buffer } from "node:buffer";

import type { EngineClient } from "../engine/client.js";
import type { StructuredLogger } from "../logger.js";
import { TransportError, describeError } from "../worker/errors.js";
import type { InputImage } from "./input.js";

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export interface ImageUploadReport {
  readonly uploaded: readonly string[];
  readonly errors: readonly string[];
}

/** Strips an optional `data:<mime>;base64,` prefix and decodes the payload. */
export function decodeImagePayload(image: string): Buffer | null {
  const commaIndex = image.indexOf(",");
  const payload = (commaIndex >= 0 ? image.slice(commaIndex + 1) : image).replace(/\s+/g, "");
  if (payload.length === 0 || payload.length % 4 === 1 || !BASE64_PATTERN.test(payload)) {
    return null;
  }
  return Buffer.from(payload, "base64");
}

/**
 * Uploads caller-supplied images to the engine input folder so the graph can
 * reference them by name. Every image is attempted; failures are reported
 * together.
 */
export async function uploadInputImages(
  client: Pick<EngineClient, "uploadImage">,
  images: readonly InputImage[],
  logger: StructuredLogger | null = null,
): Promise<ImageUploadReport> {
  const uploaded: string[] = [];
  const errors: string[] = [];
  if (images.length === 0) {
    return { uploaded, errors };
  }

  logger?.info("input_images_upload_started", { count: images.length });
  for (const image of images) {
    const bytes = decodeImagePayload(image.image);
    if (!bytes) {
      errors.push(`Error decoding base64 for ${image.name}: invalid base64 payload`);
      continue;
    }
    try {
      await client.uploadImage(image.name, bytes);
      uploaded.push(image.name);
      logger?.debug("input_image_uploaded", { name: image.name, bytes: bytes.byteLength });
    } catch (error) {
      const message =
        error instanceof TransportError && error.reason === "timeout"
          ? `Timeout uploading ${image.name}`
          : `Error uploading ${image.name}: ${describeError(error)}`;
      errors.push(message);
    }
  }

  if (errors.length > 0) {
    logger?.warn("input_images_upload_failed", { uploaded: uploaded.length, failed: errors.length });
  } else {
    logger?.info("input_images_uploaded", { count: uploaded.length });
  }
  return { uploaded, errors };
}
