/**
 * HttpImageFetcher against an in-process Express server.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import express from "express";
import type { Server } from "http";
import { HttpImageFetcher } from "../services/extraction/imageFetcher";

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = express();
  app.get("/cat.png", (_req, res) => {
    res.type("png").send(Buffer.from("cat-bytes"));
  });
  app.get("/missing.png", (_req, res) => {
    res.status(404).send("nope");
  });

  await new Promise<void>((resolve) => {
    server = app.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("test server has no TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("HttpImageFetcher", () => {
  it("returns the response body of a 200", async () => {
    const fetcher = new HttpImageFetcher({ insecureTls: false });

    const bytes = await fetcher.fetchImage(new URL(`${baseUrl}/cat.png`));

    expect(bytes.toString("utf8")).toBe("cat-bytes");
  });

  it("fails on a non-200 status", async () => {
    const fetcher = new HttpImageFetcher({ insecureTls: false });

    await expect(fetcher.fetchImage(new URL(`${baseUrl}/missing.png`))).rejects.toThrow(
      "image URL returned status: 404 Not Found"
    );
  });

  it("fetches through its own agent in insecure mode", async () => {
    const fetcher = new HttpImageFetcher({ insecureTls: true });

    try {
      const bytes = await fetcher.fetchImage(new URL(`${baseUrl}/cat.png`));
      expect(bytes.toString("utf8")).toBe("cat-bytes");
    } finally {
      await fetcher.close();
    }
  });

  it("honours an aborted signal", async () => {
    const fetcher = new HttpImageFetcher({ insecureTls: false });
    const controller = new AbortController();
    controller.abort();

    await expect(fetcher.fetchImage(new URL(`${baseUrl}/cat.png`), controller.signal)).rejects.toThrow(
      /^failed to fetch image from URL: /
    );
  });
});
