/**
 * Data URI helpers for inline images.
 */

import { InvalidBase64Error } from "../../errors";

const IMAGE_DATA_URI_PREFIX = "data:image/";
const BASE64_MARKER = "base64,";

/** Standard alphabet with mandatory padding. */
const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isImageDataUri(value: string): boolean {
  return value.startsWith(IMAGE_DATA_URI_PREFIX);
}

/**
 * Return the base64 payload following the `base64,` marker, or null when
 * the URI has no such marker.
 */
export function dataUriPayload(uri: string): string | null {
  const idx = uri.indexOf(BASE64_MARKER);
  if (idx === -1) {
    return null;
  }
  return uri.slice(idx + BASE64_MARKER.length);
}

/**
 * Decode standard base64. CR and LF are ignored; anything else outside the
 * alphabet, or bad padding, is rejected.
 *
 * @throws InvalidBase64Error
 */
export function decodeBase64Strict(payload: string): Buffer {
  const cleaned = payload.replace(/[\r\n]/g, "");
  if (!STRICT_BASE64.test(cleaned)) {
    throw new InvalidBase64Error(`payload of ${cleaned.length} characters is not valid standard base64`);
  }
  return Buffer.from(cleaned, "base64");
}

/**
 * Decode a `data:image/...;base64,...` URI into bytes.
 * Returns null when the URI is not an image data URI with a base64 payload.
 *
 * @throws InvalidBase64Error when the payload is malformed
 */
export function decodeImageDataUri(uri: string): Buffer | null {
  if (!isImageDataUri(uri)) {
    return null;
  }
  const payload = dataUriPayload(uri);
  return payload === null ? null : decodeBase64Strict(payload);
}

export function encodeImageDataUri(bytes: Buffer, mimeType: string = "image/png"): string {
  return `data:${mimeType};base64,${bytes.toString("base64")}`;
}
