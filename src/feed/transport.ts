/**
 * Content carried by a feed entry. `xml` holds the payload document when
 * `type` is an XML media type.
 */
export type EntryContent = Readonly<{
  type: string;
  xml: string;
}>;

/**
 * A feed record as the transport sees it. The client only reads
 * `content.xml`, and only builds entries from an XML payload.
 */
export type FeedEntry = Readonly<{
  id: string | null;
  content: EntryContent | null;
}>;

/**
 * The feed protocol collaborator. Implementations own HTTP, authentication,
 * timeouts and retries; every method rejects on failure.
 */
export type FeedTransport = {
  readonly fetchEntry: (url: string) => Promise<FeedEntry>;
  readonly fetchFeed: (url: string) => Promise<ReadonlyArray<FeedEntry>>;
  readonly insert: (url: string, entry: FeedEntry) => Promise<FeedEntry>;
  readonly update: (url: string, entry: FeedEntry) => Promise<FeedEntry>;
  readonly delete: (url: string) => Promise<void>;
};
