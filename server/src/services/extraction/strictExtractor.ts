/**
 * Strict extraction strategy.
 *
 * Only "user" messages contribute. Their non-blank text parts are joined
 * with a single space and only the joined prompt is trimmed; the last inline base64 image wins and any other image
 * reference is ignored. A malformed inline image fails the whole request.
 */

import type { Message } from "../../models/chat";
import { decodeImageDataUri } from "./dataUri";
import type { ExtractionResult, PromptImageExtractor } from "./types";

export class StrictExtractor implements PromptImageExtractor {
  readonly name = "strict";

  async extract(messages: Message[]): Promise<ExtractionResult> {
    const texts: string[] = [];
    let imageBytes: Buffer | undefined;

    for (const message of messages) {
      if (message.role !== "user") {
        continue;
      }

      for (const part of message.content) {
        if (part.type === "text") {
          if (part.text.trim() !== "") {
            texts.push(part.text);
          }
          continue;
        }
        if (part.type !== "image_reference") {
          continue;
        }

        const decoded = decodeImageDataUri(part.imageReference);
        if (decoded) {
          imageBytes = decoded;
        }
      }
    }

    return { prompt: texts.join(" ").trim(), imageBytes };
  }
}
