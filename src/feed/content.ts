// pattern: Functional Core
import { ParseError } from "../errors";
import type { FeedEntry } from "./transport";

export const XML_CONTENT_TYPE = "application/xml";

export function isXmlMediaType(type: string): boolean {
  const mediaType = type.split(";")[0]?.trim().toLowerCase() ?? "";
  return (
    mediaType === "application/xml" ||
    mediaType === "text/xml" ||
    mediaType.endsWith("+xml")
  );
}

/**
 * Wraps an XML payload in a new entry with `application/xml` content.
 */
export function createXmlContentEntry(xml: string): FeedEntry {
  return { id: null, content: { type: XML_CONTENT_TYPE, xml } };
}

/**
 * Returns the XML payload of an entry.
 * @throws ParseError when the entry has no content or its content is not XML.
 */
export function readXmlContent(entry: FeedEntry): string {
  const label = entry.id ?? "(no id)";
  if (entry.content === null) {
    throw new ParseError(`entry ${label} has no content`);
  }
  if (!isXmlMediaType(entry.content.type)) {
    throw new ParseError(
      `entry ${label} has ${entry.content.type} content, expected XML`,
    );
  }
  return entry.content.xml;
}
