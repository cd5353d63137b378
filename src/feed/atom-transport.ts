// pattern: Imperative Shell
import type { Logger } from "pino";
import { TransportError } from "../errors";
import { ATOM_MEDIA_TYPE, parseAtomEntry, parseAtomFeed, renderAtomEntry } from "./atom";
import type { FeedEntry, FeedTransport } from "./transport";

export type AtomTransportOptions = Readonly<{
  timeoutMs: number;
  userAgent: string;
  authToken?: string;
}>;

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Creates a FeedTransport that speaks Atom over HTTP.
 *
 * - Entries are sent as `application/atom+xml` with the payload inlined in `<content>`
 * - Non-2xx responses reject with TransportError carrying the status
 * - Network errors and timeouts reject with the error `fetch` raised
 * - No retries
 */
export function createAtomTransport(
  options: AtomTransportOptions,
  logger: Logger,
): FeedTransport {
  async function request(
    method: HttpMethod,
    url: string,
    body?: string,
  ): Promise<string> {
    const headers: Record<string, string> = {
      "User-Agent": options.userAgent,
      Accept: ATOM_MEDIA_TYPE,
    };
    if (options.authToken) {
      headers["Authorization"] = `Bearer ${options.authToken}`;
    }
    if (body !== undefined) {
      headers["Content-Type"] = `${ATOM_MEDIA_TYPE}; charset=utf-8`;
    }

    const response = await fetch(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (!response.ok) {
      logger.warn({ method, url, status: response.status }, "feed request rejected");
      throw new TransportError(url, response.status, response.statusText);
    }

    logger.debug({ method, url, status: response.status }, "feed request complete");
    return response.text();
  }

  async function send(
    method: "POST" | "PUT",
    url: string,
    entry: FeedEntry,
  ): Promise<FeedEntry> {
    const responseBody = await request(method, url, renderAtomEntry(entry));
    return parseAtomEntry(responseBody);
  }

  return {
    fetchEntry: async (url) => parseAtomEntry(await request("GET", url)),
    fetchFeed: async (url) => parseAtomFeed(await request("GET", url)),
    insert: (url, entry) => send("POST", url, entry),
    update: (url, entry) => send("PUT", url, entry),
    delete: async (url) => {
      await request("DELETE", url);
    },
  };
}
