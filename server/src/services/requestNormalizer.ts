/**
 * Request normalizer.
 *
 * Decodes a parsed chat-completions body into normalized messages. Message
 * content arrives in two shapes, a list of typed parts or a plain string, and
 * is decoded by ordered fallback: the list interpretation must validate in
 * full before it is accepted, then the string interpretation is tried.
 * Parts of unknown kinds are kept as "unrecognized" parts.
 */

import { MalformedContentError, MalformedJsonError } from "../errors";
import type { ChatCompletionRequest, ContentPart, Message } from "../models/chat";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Content decoding
// ---------------------------------------------------------------------------

/** Absent and null fields read as missing. */
function isMissing(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

/**
 * Decode one part. Fields are optional; only a field present with the wrong
 * JSON type invalidates the part (and with it the whole list).
 */
function decodePart(raw: unknown): ContentPart | null {
  if (isMissing(raw)) {
    return { type: "unrecognized", originalType: "" };
  }
  if (!isObject(raw)) {
    return null;
  }
  if (!isMissing(raw.type) && typeof raw.type !== "string") {
    return null;
  }
  const type = typeof raw.type === "string" ? raw.type : "";

  switch (type) {
    case "text":
      if (isMissing(raw.text)) {
        return { type: "text", text: "" };
      }
      return typeof raw.text === "string" ? { type: "text", text: raw.text } : null;

    case "image_url": {
      const imageUrl = raw.image_url;
      if (isMissing(imageUrl)) {
        return { type: "unrecognized", originalType: type };
      }
      if (typeof imageUrl === "string") {
        return { type: "image_reference", imageReference: imageUrl };
      }
      if (!isObject(imageUrl)) {
        return null;
      }
      if (isMissing(imageUrl.url)) {
        return { type: "image_reference", imageReference: "" };
      }
      return typeof imageUrl.url === "string"
        ? { type: "image_reference", imageReference: imageUrl.url }
        : null;
    }

    // Bare base64 with a separate media type, as sent by some desktop clients
    case "image": {
      if (isMissing(raw.image)) {
        return { type: "unrecognized", originalType: type };
      }
      if (typeof raw.image !== "string") {
        return null;
      }
      const mediaType = typeof raw.mediaType === "string" && raw.mediaType !== "" ? raw.mediaType : "image/png";
      return { type: "image_reference", imageReference: `data:${mediaType};base64,${raw.image}` };
    }

    default:
      return { type: "unrecognized", originalType: type };
  }
}

function decodePartList(raw: unknown): ContentPart[] | null {
  if (!Array.isArray(raw) || raw.length === 0) {
    return null;
  }

  const parts: ContentPart[] = [];
  for (const item of raw) {
    const part = decodePart(item);
    if (!part) {
      return null;
    }
    parts.push(part);
  }
  return parts;
}

/**
 * Decode one message's content.
 *
 * @throws MalformedContentError when neither interpretation applies
 */
export function normalizeContent(raw: unknown): ContentPart[] {
  const parts = decodePartList(raw);
  if (parts) {
    return parts;
  }

  if (typeof raw === "string") {
    return [{ type: "text", text: raw }];
  }

  throw new MalformedContentError(
    Array.isArray(raw)
      ? "content list is empty or holds a part with a field of the wrong type"
      : `content has unsupported type ${raw === null ? "null" : typeof raw}`
  );
}

// ---------------------------------------------------------------------------
// Request decoding
// ---------------------------------------------------------------------------

function normalizeMessage(raw: unknown, index: number): Message {
  if (!isObject(raw)) {
    throw new MalformedJsonError(`messages[${index}] is not an object`);
  }
  if (typeof raw.role !== "string") {
    throw new MalformedJsonError(`messages[${index}].role must be a string`);
  }

  try {
    return { role: raw.role, content: normalizeContent(raw.content) };
  } catch (err) {
    if (err instanceof MalformedContentError) {
      throw new MalformedContentError(`messages[${index}]: ${err.detail ?? err.message}`);
    }
    throw err;
  }
}

/**
 * Decode a parsed JSON body into a chat-completions request.
 *
 * A missing `messages` field yields an empty list; the caller reports the
 * resulting empty prompt.
 */
export function normalizeChatRequest(body: unknown): ChatCompletionRequest {
  if (!isObject(body)) {
    throw new MalformedJsonError("request body must be a JSON object");
  }

  const { model, messages } = body;

  if (model !== undefined && model !== null && typeof model !== "string") {
    throw new MalformedJsonError("model must be a string");
  }
  if (messages !== undefined && messages !== null && !Array.isArray(messages)) {
    throw new MalformedJsonError("messages must be an array");
  }

  return {
    model: typeof model === "string" ? model : undefined,
    messages: Array.isArray(messages) ? messages.map(normalizeMessage) : [],
  };
}
