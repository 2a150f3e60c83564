/**
 * Prompt/image extraction tests for both strategies.
 *
 * The lenient strategy's remote fetches go through a fake fetcher that
 * records the URLs it was asked for.
 */

import { describe, it, expect } from "vitest";
import type { Message } from "../models/chat";
import { createExtractor } from "../services/extraction";
import type { ImageFetcher } from "../services/extraction";
import { LenientExtractor, lastPngReference, resolveImageUrl } from "../services/extraction/lenientExtractor";
import { StrictExtractor } from "../services/extraction/strictExtractor";
import { ImageFetchFailedError, InvalidBase64Error } from "../errors";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ABC = "data:image/png;base64,QUJD";
const DEF = "data:image/png;base64,REVG";
const BROKEN = "data:image/png;base64,@@not-base64@@";

function text(role: string, value: string): Message {
  return { role, content: [{ type: "text", text: value }] };
}

function parts(role: string, ...items: Array<string | { image: string }>): Message {
  return {
    role,
    content: items.map((item) =>
      typeof item === "string"
        ? { type: "text" as const, text: item }
        : { type: "image_reference" as const, imageReference: item.image }
    ),
  };
}

class FakeFetcher implements ImageFetcher {
  readonly requested: string[] = [];
  private readonly result: Buffer | Error;

  constructor(result: Buffer | Error = Buffer.from("remote-png")) {
    this.result = result;
  }

  async fetchImage(url: URL): Promise<Buffer> {
    this.requested.push(url.toString());
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

function lenient(fetcher: ImageFetcher = new FakeFetcher()): LenientExtractor {
  return new LenientExtractor({ fetcher, imageBaseUrl: "https://images.test/generated" });
}

// ===========================================================================
// Strict strategy
// ===========================================================================

describe("StrictExtractor", () => {
  const strict = new StrictExtractor();

  it("uses plain user text as the prompt with no image", async () => {
    const result = await strict.extract([text("user", "a red cat")]);

    expect(result.prompt).toBe("a red cat");
    expect(result.imageBytes).toBeUndefined();
  });

  it("decodes an inline image next to the text", async () => {
    const result = await strict.extract([parts("user", "edit this", { image: ABC })]);

    expect(result.prompt).toBe("edit this");
    expect(result.imageBytes?.toString("utf8")).toBe("ABC");
  });

  it("concatenates text from every user message, ignoring other roles", async () => {
    const result = await strict.extract([
      text("system", "you draw pictures"),
      text("user", "a cat"),
      text("assistant", "ignored"),
      parts("user", "  on a mat ", "   ", "at night"),
    ]);

    expect(result.prompt).toBe("a cat   on a mat  at night");
  });

  it("trims only the joined prompt, keeping spacing inside it", async () => {
    const result = await strict.extract([parts("user", "foo ", "bar")]);

    expect(result.prompt).toBe("foo  bar");
  });

  it("skips unrecognized parts", async () => {
    const result = await strict.extract([
      {
        role: "user",
        content: [
          { type: "text", text: "a red cat" },
          { type: "unrecognized", originalType: "input_audio" },
          { type: "image_reference", imageReference: ABC },
        ],
      },
    ]);

    expect(result.prompt).toBe("a red cat");
    expect(result.imageBytes?.toString("utf8")).toBe("ABC");
  });

  it("keeps the bytes of the later of two inline images", async () => {
    const result = await strict.extract([parts("user", "combine", { image: ABC }, { image: DEF })]);

    expect(result.imageBytes?.equals(Buffer.from("DEF"))).toBe(true);
  });

  it("ignores images outside user messages and non-data references", async () => {
    const result = await strict.extract([
      parts("assistant", { image: ABC }),
      parts("user", "draw", { image: "https://cdn.test/cat.png" }),
    ]);

    expect(result.prompt).toBe("draw");
    expect(result.imageBytes).toBeUndefined();
  });

  it("returns an empty prompt when no user message exists", async () => {
    const result = await strict.extract([text("system", "hello"), text("assistant", "hi")]);

    expect(result.prompt).toBe("");
  });

  it("fails on malformed inline base64", async () => {
    await expect(strict.extract([parts("user", "edit", { image: BROKEN })])).rejects.toBeInstanceOf(
      InvalidBase64Error
    );
  });
});

// ===========================================================================
// Lenient strategy
// ===========================================================================

describe("LenientExtractor", () => {
  it("takes the last text part from any role", async () => {
    const result = await lenient().extract([text("user", "first idea"), text("assistant", "  second idea  ")]);

    expect(result.prompt).toBe("second idea");
  });

  it("skips unrecognized parts", async () => {
    const fetcher = new FakeFetcher();
    const result = await lenient(fetcher).extract([
      {
        role: "user",
        content: [
          { type: "text", text: "a red cat" },
          { type: "unrecognized", originalType: "file" },
        ],
      },
    ]);

    expect(result.prompt).toBe("a red cat");
    expect(result.imageBytes).toBeUndefined();
    expect(fetcher.requested).toEqual([]);
  });

  it("returns an empty prompt when there are no text parts", async () => {
    const result = await lenient().extract([parts("user", { image: ABC })]);

    expect(result.prompt).toBe("");
    expect(result.imageBytes?.toString("utf8")).toBe("ABC");
  });

  it("skips malformed base64 and keeps the prompt", async () => {
    const fetcher = new FakeFetcher();
    const result = await lenient(fetcher).extract([parts("user", "edit this", { image: BROKEN })]);

    expect(result.prompt).toBe("edit this");
    expect(result.imageBytes).toBeUndefined();
    expect(fetcher.requested).toEqual([]);
  });

  it("keeps an earlier valid image when a later one is malformed", async () => {
    const result = await lenient().extract([parts("user", "edit", { image: ABC }, { image: BROKEN })]);

    expect(result.imageBytes?.toString("utf8")).toBe("ABC");
  });

  it("skips image data URIs without a base64 marker", async () => {
    const result = await lenient().extract([parts("user", "edit", { image: "data:image/png,QUJD" })]);

    expect(result.imageBytes).toBeUndefined();
  });

  it("fetches a .png reference from an image_url part", async () => {
    const fetcher = new FakeFetcher(Buffer.from("cat-bytes"));
    const result = await lenient(fetcher).extract([
      parts("user", "make it blue", { image: "https://cdn.test/cat.png" }),
    ]);

    expect(fetcher.requested).toEqual(["https://cdn.test/cat.png"]);
    expect(result.imageBytes?.toString("utf8")).toBe("cat-bytes");
  });

  it("fetches the last .png URL mentioned in text", async () => {
    const fetcher = new FakeFetcher();
    const result = await lenient(fetcher).extract([
      text("user", "mix https://cdn.test/a.png and https://cdn.test/b.png"),
    ]);

    expect(fetcher.requested).toEqual(["https://cdn.test/b.png"]);
    expect(result.prompt).toBe("mix https://cdn.test/a.png and https://cdn.test/b.png");
  });

  it("resolves bare paths against the configured base URL", async () => {
    const fetcher = new FakeFetcher();
    await lenient(fetcher).extract([text("assistant", "variation of result/output_1.png")]);

    expect(fetcher.requested).toEqual(["https://images.test/generated/output_1.png"]);
  });

  it("does not fetch when an inline image was supplied", async () => {
    const fetcher = new FakeFetcher();
    const result = await lenient(fetcher).extract([
      parts("user", "see https://cdn.test/a.png", { image: ABC }),
    ]);

    expect(fetcher.requested).toEqual([]);
    expect(result.imageBytes?.toString("utf8")).toBe("ABC");
  });

  it("ignores references that do not parse as URLs", async () => {
    const fetcher = new FakeFetcher();
    const result = await lenient(fetcher).extract([parts("user", "draw", { image: "not a url.png" })]);

    expect(fetcher.requested).toEqual([]);
    expect(result.imageBytes).toBeUndefined();
  });

  it("surfaces fetch failures together with the partial prompt", async () => {
    const fetcher = new FakeFetcher(new Error("image URL returned status: 404 Not Found"));
    const failure = lenient(fetcher).extract([
      parts("user", "  recolor  ", { image: "https://cdn.test/missing.png" }),
    ]);

    await expect(failure).rejects.toBeInstanceOf(ImageFetchFailedError);
    await expect(failure).rejects.toMatchObject({
      message: "image URL returned status: 404 Not Found",
      prompt: "recolor",
      statusCode: 400,
    });
  });
});

// ===========================================================================
// Helpers and factory
// ===========================================================================

describe("lastPngReference", () => {
  it("returns null when nothing matches", () => {
    expect(lastPngReference("a red cat")).toBeNull();
    expect(lastPngReference("https://cdn.test/cat.jpg")).toBeNull();
  });

  it("returns the last match", () => {
    expect(lastPngReference("x/one.png y/two.png")).toBe("/two.png");
  });

  it("ends URLs only at ASCII whitespace", () => {
    expect(lastPngReference("see https://cdn.test/a\u00a0b.png now")).toBe("https://cdn.test/a\u00a0b.png");
  });
});

describe("resolveImageUrl", () => {
  it("prefixes bare paths with the base URL", () => {
    expect(resolveImageUrl("/a.png", "https://images.test/generated")?.toString()).toBe(
      "https://images.test/generated/a.png"
    );
  });

  it("keeps absolute URLs", () => {
    expect(resolveImageUrl("http://cdn.test/a.png", "https://images.test")?.toString()).toBe(
      "http://cdn.test/a.png"
    );
  });

  it("returns null for strings without a scheme", () => {
    expect(resolveImageUrl("a.png", "https://images.test")).toBeNull();
  });

  it("returns null for schemes other than http and https", () => {
    expect(resolveImageUrl("file:///etc/a.png", "https://images.test")).toBeNull();
    expect(resolveImageUrl("/a.png", "ftp://images.test")).toBeNull();
  });
});

describe("createExtractor", () => {
  it("creates both strategies by name", () => {
    expect(createExtractor("strict").name).toBe("strict");
    expect(createExtractor("LENIENT", { fetcher: new FakeFetcher() }).name).toBe("lenient");
  });

  it("throws for unknown strategies", () => {
    expect(() => createExtractor("greedy")).toThrow(/Unknown extraction strategy: "greedy"/);
  });
});
