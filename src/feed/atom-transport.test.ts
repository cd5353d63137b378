import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { TransportError } from "../errors";
import { toPlainProperties } from "../convert/plain";
import { renderAtomEntry } from "./atom";
import { createAtomTransport } from "./atom-transport";
import { createFeedEntryClient } from "./client";
import { createXmlContentEntry } from "./content";
import type { FeedTransport } from "./transport";

const ENTRY_URL = "https://feeds.example.com/vehicles/vehicle0";

const ENTRY_DOCUMENT =
  '<entry xmlns="http://www.w3.org/2005/Atom"><id>urn:vehicle0</id><content type="application/xml"><entity><name>vehicle0</name></entity></content></entry>';

function atomResponse(body: string, status = 200, statusText = "OK"): Response {
  return new Response(body, {
    status,
    statusText,
    headers: { "Content-Type": "application/atom+xml" },
  });
}

describe("createAtomTransport", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let transport: FeedTransport;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    transport = createAtomTransport(
      { timeoutMs: 5000, userAgent: "feedmap-test", authToken: "test-token" },
      pino({ level: "silent" }),
    );
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should GET an entry with Atom and auth headers", async () => {
    fetchMock.mockResolvedValue(atomResponse(ENTRY_DOCUMENT));

    const entry = await transport.fetchEntry(ENTRY_URL);

    expect(entry).toEqual({
      id: "urn:vehicle0",
      content: {
        type: "application/xml",
        xml: "<entity><name>vehicle0</name></entity>",
      },
    });
    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe(ENTRY_URL);
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      "User-Agent": "feedmap-test",
      Accept: "application/atom+xml",
      Authorization: "Bearer test-token",
    });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should omit the Authorization header without a token", async () => {
    fetchMock.mockResolvedValue(atomResponse(ENTRY_DOCUMENT));
    const anonymous = createAtomTransport(
      { timeoutMs: 5000, userAgent: "feedmap-test" },
      pino({ level: "silent" }),
    );

    await anonymous.fetchEntry(ENTRY_URL);

    const [, init] = fetchMock.mock.calls[0]!;
    expect(init?.headers).toEqual({
      "User-Agent": "feedmap-test",
      Accept: "application/atom+xml",
    });
  });

  it("should GET a feed and return its entries in order", async () => {
    fetchMock.mockResolvedValue(
      atomResponse(
        '<feed xmlns="http://www.w3.org/2005/Atom"><entry><id>urn:a</id></entry><entry><id>urn:b</id></entry></feed>',
      ),
    );

    const entries = await transport.fetchFeed("https://feeds.example.com/vehicles");

    expect(entries).toEqual([
      { id: "urn:a", content: null },
      { id: "urn:b", content: null },
    ]);
  });

  it("should POST inserted entries as Atom and parse the response", async () => {
    fetchMock.mockResolvedValue(atomResponse(ENTRY_DOCUMENT, 201, "Created"));
    const entry = createXmlContentEntry("<entity><name>vehicle0</name></entity>");

    const created = await transport.insert(ENTRY_URL, entry);

    const [, init] = fetchMock.mock.calls[0]!;
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(renderAtomEntry(entry));
    expect(init?.headers).toEqual({
      "User-Agent": "feedmap-test",
      Accept: "application/atom+xml",
      Authorization: "Bearer test-token",
      "Content-Type": "application/atom+xml; charset=utf-8",
    });
    expect(created.id).toBe("urn:vehicle0");
  });

  it("should PUT updated entries", async () => {
    fetchMock.mockResolvedValue(atomResponse(ENTRY_DOCUMENT));

    await transport.update(ENTRY_URL, createXmlContentEntry("<entity/>"));

    const [url, init] = fetchMock.mock.calls[0]!;
    expect(url).toBe(ENTRY_URL);
    expect(init?.method).toBe("PUT");
  });

  it("should DELETE without a body", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await transport.delete(ENTRY_URL);

    const [, init] = fetchMock.mock.calls[0]!;
    expect(init?.method).toBe("DELETE");
    expect(init?.body).toBeUndefined();
  });

  it("should reject non-2xx responses with TransportError", async () => {
    fetchMock.mockResolvedValue(atomResponse("missing", 404, "Not Found"));

    let caught: unknown;
    try {
      await transport.fetchEntry(ENTRY_URL);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TransportError);
    if (caught instanceof TransportError) {
      expect(caught.status).toBe(404);
      expect(caught.message).toBe(`HTTP 404: Not Found (${ENTRY_URL})`);
    }
  });

  it("should pass network failures through unchanged", async () => {
    const failure = new TypeError("fetch failed");
    fetchMock.mockRejectedValue(failure);

    await expect(transport.delete(ENTRY_URL)).rejects.toBe(failure);
  });

  it("should serve the feed entry client end to end", async () => {
    fetchMock.mockImplementation(async () => atomResponse(ENTRY_DOCUMENT));
    const client = createFeedEntryClient({ transport, logger: pino({ level: "silent" }) });

    const entry = await client.getEntry(ENTRY_URL);

    expect(toPlainProperties(entry)).toEqual({ name: "vehicle0" });
  });
});
