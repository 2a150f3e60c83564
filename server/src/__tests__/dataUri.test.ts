import { describe, it, expect } from "vitest";
import {
  dataUriPayload,
  decodeBase64Strict,
  decodeImageDataUri,
  encodeImageDataUri,
  isImageDataUri,
} from "../services/extraction/dataUri";
import { InvalidBase64Error } from "../errors";

describe("data URI helpers", () => {
  it("round-trips arbitrary bytes through a data URI", () => {
    const bytes = Buffer.from([0, 1, 2, 127, 128, 250, 255]);
    const uri = encodeImageDataUri(bytes);

    expect(uri.startsWith("data:image/png;base64,")).toBe(true);
    expect(decodeImageDataUri(uri)?.equals(bytes)).toBe(true);
  });

  it("decodes QUJD to ABC", () => {
    expect(decodeImageDataUri("data:image/png;base64,QUJD")?.toString("utf8")).toBe("ABC");
  });

  it("ignores line breaks inside the payload", () => {
    expect(decodeBase64Strict("QUJD\r\nREVG").toString("utf8")).toBe("ABCDEF");
  });

  it("accepts padded payloads", () => {
    expect(decodeBase64Strict("QUI=").toString("utf8")).toBe("AB");
    expect(decodeBase64Strict("QQ==").toString("utf8")).toBe("A");
  });

  it("rejects characters outside the alphabet", () => {
    expect(() => decodeBase64Strict("QU*D")).toThrow(InvalidBase64Error);
  });

  it("rejects payloads with a bad length or padding", () => {
    expect(() => decodeBase64Strict("QUJ")).toThrow(InvalidBase64Error);
    expect(() => decodeBase64Strict("Q===")).toThrow(InvalidBase64Error);
    expect(() => decodeBase64Strict("QUJD=")).toThrow(InvalidBase64Error);
  });

  it("returns null for data URIs that are not base64 images", () => {
    expect(decodeImageDataUri("data:image/png,QUJD")).toBeNull();
    expect(decodeImageDataUri("data:text/plain;base64,QUJD")).toBeNull();
    expect(decodeImageDataUri("https://example.test/cat.png")).toBeNull();
  });

  it("splits the payload at the base64 marker", () => {
    expect(isImageDataUri("data:image/webp;base64,AAAA")).toBe(true);
    expect(dataUriPayload("data:image/webp;base64,AAAA")).toBe("AAAA");
    expect(dataUriPayload("data:image/webp,AAAA")).toBeNull();
  });
});
