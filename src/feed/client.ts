// pattern: Imperative Shell
import type { Logger } from "pino";
import { ClientError, ValidationError } from "../errors";
import { convertPropertiesToXml } from "../convert/properties-to-xml";
import { convertXmlToProperties } from "../convert/xml-to-properties";
import type { PropertyMap } from "../convert/types";
import { createXmlContentEntry, readXmlContent } from "./content";
import type { FeedEntry, FeedTransport } from "./transport";

export const NAME_KEY = "name";

export type FeedEntryClientOptions = Readonly<{
  transport: FeedTransport;
  logger: Logger;
  rootElement?: string;
}>;

/**
 * Map-based access to payload-in-content feed entries.
 *
 * Entry URLs for insert, update and name-based delete are `baseUrl + "/" + name`,
 * where `name` is the entry map's `name` text. Batch operations run one request
 * per entry, in order, and stop at the first failure.
 */
export type FeedEntryClient = {
  readonly getEntry: (url: string) => Promise<PropertyMap>;
  readonly getEntries: (url: string) => Promise<ReadonlyArray<PropertyMap>>;
  readonly insertEntry: (baseUrl: string, entry: PropertyMap) => Promise<PropertyMap>;
  readonly insertEntries: (
    baseUrl: string,
    entries: ReadonlyArray<PropertyMap>,
  ) => Promise<void>;
  readonly updateEntry: (baseUrl: string, entry: PropertyMap) => Promise<PropertyMap>;
  readonly updateEntries: (
    baseUrl: string,
    entries: ReadonlyArray<PropertyMap>,
  ) => Promise<void>;
  readonly deleteEntry: (url: string, entry?: PropertyMap) => Promise<void>;
  readonly deleteEntries: (
    baseUrl: string,
    entries: ReadonlyArray<PropertyMap>,
  ) => Promise<void>;
  readonly getMapFromXml: (xml: string) => PropertyMap;
};

/**
 * Reads the entry's `name` as a string.
 * @throws ValidationError when `name` is absent, an empty element, or not text.
 */
export function requireEntryName(entry: PropertyMap): string {
  const value = Object.hasOwn(entry, NAME_KEY) ? entry[NAME_KEY] : undefined;
  if (value === undefined) {
    throw new ValidationError(`entry map does not have '${NAME_KEY}' key`, NAME_KEY);
  }
  if (value.kind !== "text" || value.text === null) {
    throw new ValidationError(`'${NAME_KEY}' in entry map is not a string`, NAME_KEY);
  }
  return value.text;
}

export function entryUrl(baseUrl: string, entry: PropertyMap): string {
  return `${baseUrl}/${requireEntryName(entry)}`;
}

export function createFeedEntryClient(options: FeedEntryClientOptions): FeedEntryClient {
  const { transport, logger } = options;

  async function callTransport<T>(
    action: string,
    url: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ url, error: message }, `${action} failed`);
      throw new ClientError(`error while ${action} ${url}`, url, err);
    }
  }

  function toProperties(entry: FeedEntry): PropertyMap {
    const xml = readXmlContent(entry);
    logger.debug({ id: entry.id, xml }, "entry content");
    return convertXmlToProperties(xml);
  }

  function toEntry(properties: PropertyMap): FeedEntry {
    return createXmlContentEntry(
      convertPropertiesToXml(properties, { rootElement: options.rootElement }),
    );
  }

  async function insertEntry(baseUrl: string, entry: PropertyMap): Promise<PropertyMap> {
    const url = entryUrl(baseUrl, entry);
    const feedEntry = toEntry(entry);
    logger.info({ url }, "inserting entry");
    return toProperties(
      await callTransport("inserting", url, () => transport.insert(url, feedEntry)),
    );
  }

  async function updateEntry(baseUrl: string, entry: PropertyMap): Promise<PropertyMap> {
    const url = entryUrl(baseUrl, entry);
    const feedEntry = toEntry(entry);
    logger.info({ url }, "updating entry");
    return toProperties(
      await callTransport("updating", url, () => transport.update(url, feedEntry)),
    );
  }

  async function deleteEntry(url: string, entry?: PropertyMap): Promise<void> {
    const target = entry === undefined ? url : entryUrl(url, entry);
    logger.info({ url: target }, "deleting entry");
    await callTransport("deleting", target, () => transport.delete(target));
  }

  return {
    getEntry: async (url) => {
      logger.info({ url }, "fetching entry");
      return toProperties(
        await callTransport("fetching", url, () => transport.fetchEntry(url)),
      );
    },

    getEntries: async (url) => {
      logger.info({ url }, "fetching feed");
      const entries = await callTransport("fetching", url, () => transport.fetchFeed(url));
      return entries.map(toProperties);
    },

    insertEntry,

    insertEntries: async (baseUrl, entries) => {
      for (const entry of entries) {
        await insertEntry(baseUrl, entry);
      }
    },

    updateEntry,

    updateEntries: async (baseUrl, entries) => {
      for (const entry of entries) {
        await updateEntry(baseUrl, entry);
      }
    },

    deleteEntry,

    deleteEntries: async (baseUrl, entries) => {
      for (const entry of entries) {
        await deleteEntry(baseUrl, entry);
      }
    },

    getMapFromXml: convertXmlToProperties,
  };
}
