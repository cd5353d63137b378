// pattern: Functional Core
import { ParseError } from "../errors";
import {
  buildOrderedXml,
  childElements,
  documentElement,
  elementNode,
  parseOrderedNodes,
  readAttribute,
  textContent,
  textNode,
} from "../convert/ordered-xml";
import type { OrderedNode, XmlElement } from "../convert/ordered-xml";
import { isXmlMediaType } from "./content";
import type { EntryContent, FeedEntry } from "./transport";

export const ATOM_NAMESPACE = "http://www.w3.org/2005/Atom";
export const ATOM_MEDIA_TYPE = "application/atom+xml";

function readContent(element: XmlElement): EntryContent {
  const type = readAttribute(element, "type") ?? "text";
  if (isXmlMediaType(type)) {
    return { type, xml: buildOrderedXml(element.children).trim() };
  }
  return { type, xml: textContent(element) ?? "" };
}

function readEntry(element: XmlElement): FeedEntry {
  let id: string | null = null;
  let content: EntryContent | null = null;

  for (const child of childElements(element)) {
    if (child.name === "id") {
      id = textContent(child)?.trim() ?? null;
    } else if (child.name === "content" && content === null) {
      content = readContent(child);
    }
  }

  return { id, content };
}

function readDocument(xml: string, expected: "entry" | "feed"): XmlElement {
  const root = documentElement(parseOrderedNodes(xml));
  if (root.name !== expected) {
    throw new ParseError(`expected an Atom ${expected}, found <${root.name}>`);
  }
  return root;
}

/**
 * Parses an Atom `<entry>` document. XML content is returned re-serialized,
 * other content as its text.
 */
export function parseAtomEntry(xml: string): FeedEntry {
  return readEntry(readDocument(xml, "entry"));
}

/**
 * Parses an Atom `<feed>` document into its entries, in document order.
 */
export function parseAtomFeed(xml: string): ReadonlyArray<FeedEntry> {
  return childElements(readDocument(xml, "feed"))
    .filter((element) => element.name === "entry")
    .map(readEntry);
}

/**
 * Renders an entry as an Atom `<entry>` document with the payload inlined
 * in `<content>`.
 *
 * @throws ParseError when XML content is not well-formed.
 */
export function renderAtomEntry(entry: FeedEntry): string {
  const children: Array<OrderedNode> = [];

  if (entry.id !== null) {
    children.push(elementNode("id", [textNode(entry.id)]));
  }
  if (entry.content !== null) {
    const { type, xml } = entry.content;
    const body = isXmlMediaType(type) ? parseOrderedNodes(xml) : [textNode(xml)];
    children.push(elementNode("content", body, { type }));
  }

  return buildOrderedXml([
    elementNode("entry", children, { xmlns: ATOM_NAMESPACE }),
  ]);
}
