import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { createAtomTransport } from "./feed/atom-transport";
import { createFeedEntryClient } from "./feed/client";
import type { FeedEntryClient } from "./feed/client";

/**
 * Wires a FeedEntryClient over the Atom HTTP transport described by `config`.
 */
export function createFeedClient(config: AppConfig, logger: Logger): FeedEntryClient {
  const transport = createAtomTransport(
    {
      timeoutMs: config.feed.timeoutMs,
      userAgent: config.feed.userAgent,
      authToken: config.feed.authToken,
    },
    logger.child({ component: "atom-transport" }),
  );

  return createFeedEntryClient({
    transport,
    logger: logger.child({ component: "feed-client" }),
    rootElement: config.xml.rootElement,
  });
}

export * from "./convert";
export * from "./errors";
export { loadConfig } from "./config";
export type { AppConfig } from "./config";
export { createLogger } from "./logger";
export type { LoggerOptions } from "./logger";
export { createFeedEntryClient, requireEntryName, entryUrl, NAME_KEY } from "./feed/client";
export type { FeedEntryClient, FeedEntryClientOptions } from "./feed/client";
export { createAtomTransport } from "./feed/atom-transport";
export type { AtomTransportOptions } from "./feed/atom-transport";
export { parseAtomEntry, parseAtomFeed, renderAtomEntry, ATOM_NAMESPACE } from "./feed/atom";
export { createXmlContentEntry, readXmlContent, isXmlMediaType, XML_CONTENT_TYPE } from "./feed/content";
export type { FeedEntry, EntryContent, FeedTransport } from "./feed/transport";
