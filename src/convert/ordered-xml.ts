// pattern: Functional Core
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "../errors";

export const TEXT_KEY = "#text";
export const ATTRIBUTES_KEY = ":@";
export const ATTRIBUTE_PREFIX = "@_";

/**
 * One entry of fast-xml-parser's order-preserving output: either
 * `{ [tagName]: children, ":@"?: attributes }` or `{ "#text": value }`.
 */
export type OrderedNode = Record<string, unknown>;

export type XmlElement = Readonly<{
  name: string;
  attributes: Readonly<Record<string, unknown>>;
  children: ReadonlyArray<unknown>;
}>;

// The parser stores an element named __proto__ under this key.
const ESCAPED_PROTO_KEY = "#__proto__";

const PREDEFINED_ENTITIES: ReadonlySet<string> = new Set([
  "amp",
  "lt",
  "gt",
  "quot",
  "apos",
]);

// Entities are resolved from the predefined set, numeric character references
// and internal DOCTYPE declarations only; nothing is ever fetched. Named HTML
// entities such as &nbsp; are rejected by findUndeclaredEntity before parsing.
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: true,
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  format: false,
  suppressEmptyNode: false,
  processEntities: true,
});

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Returns the first entity reference in `xml` that is neither predefined nor
 * declared in the document's internal subset, or null when all resolve.
 */
export function findUndeclaredEntity(xml: string): string | null {
  const declared = new Set(PREDEFINED_ENTITIES);
  for (const match of xml.matchAll(/<!ENTITY\s+([^\s%>]+)/g)) {
    const name = match[1];
    if (name !== undefined) declared.add(name);
  }

  const body = xml
    .replace(/<!\[CDATA\[[\s\S]*?\]\]>/g, "")
    .replace(/<!--[\s\S]*?-->/g, "");
  for (const match of body.matchAll(/&([^#;\s&<]+);/g)) {
    const name = match[1];
    if (name !== undefined && !declared.has(name)) return name;
  }
  return null;
}

function restoreProtoNames(nodes: ReadonlyArray<unknown>): Array<unknown> {
  return nodes.map((node) => {
    if (!isRecord(node)) return node;
    const restored: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(node)) {
      Object.defineProperty(restored, key === ESCAPED_PROTO_KEY ? "__proto__" : key, {
        value: Array.isArray(value) ? restoreProtoNames(value) : value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return restored;
  });
}

/**
 * Validates and parses an XML document into fast-xml-parser's ordered node list.
 * @throws ParseError on malformed input or an undeclared entity reference.
 */
export function parseOrderedNodes(xml: string): ReadonlyArray<unknown> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ParseError(`malformed XML: ${validation.err.msg}`, {
      line: validation.err.line,
      column: validation.err.col,
    });
  }

  const entity = findUndeclaredEntity(xml);
  if (entity !== null) {
    throw new ParseError(`undeclared entity reference &${entity};`);
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ParseError(`failed to parse XML: ${message}`, undefined, {
      cause: err,
    });
  }

  if (!Array.isArray(parsed)) {
    throw new ParseError("XML parser returned an unexpected document shape");
  }
  return restoreProtoNames(parsed);
}

/**
 * Reads an ordered node as an element, or returns null for text and other nodes.
 */
export function readElement(node: unknown): XmlElement | null {
  if (!isRecord(node)) return null;

  for (const [name, children] of Object.entries(node)) {
    if (name === ATTRIBUTES_KEY || name === TEXT_KEY) continue;
    if (!Array.isArray(children)) return null;

    const attributes = node[ATTRIBUTES_KEY];
    return {
      name,
      attributes: isRecord(attributes) ? attributes : {},
      children,
    };
  }
  return null;
}

/**
 * Reads an ordered node as a text node, or returns null for anything else.
 */
export function readText(node: unknown): string | null {
  if (!isRecord(node) || !(TEXT_KEY in node)) return null;
  const value = node[TEXT_KEY];
  return typeof value === "string" ? value : String(value);
}

export function readAttribute(element: XmlElement, name: string): string | null {
  const value = element.attributes[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === "string" ? value : null;
}

export function childElements(element: XmlElement): ReadonlyArray<XmlElement> {
  const elements: Array<XmlElement> = [];
  for (const child of element.children) {
    const childElement = readElement(child);
    if (childElement !== null) elements.push(childElement);
  }
  return elements;
}

/**
 * Concatenates the element's direct text nodes; null when there are none
 * or they are all empty.
 */
export function textContent(element: XmlElement): string | null {
  let text = "";
  for (const child of element.children) {
    text += readText(child) ?? "";
  }
  return text === "" ? null : text;
}

/**
 * Returns the document (root) element of a parsed node list.
 * @throws ParseError when the document has no element or more than one.
 */
export function documentElement(nodes: ReadonlyArray<unknown>): XmlElement {
  let root: XmlElement | null = null;
  for (const node of nodes) {
    const element = readElement(node);
    if (element === null) continue;
    if (root !== null) {
      throw new ParseError("XML document has more than one root element");
    }
    root = element;
  }
  if (root === null) {
    throw new ParseError("XML document has no root element");
  }
  return root;
}

export function elementNode(
  name: string,
  children: ReadonlyArray<unknown>,
  attributes?: Readonly<Record<string, string>>,
): OrderedNode {
  const node: OrderedNode = { [name]: children };
  if (attributes !== undefined) {
    const prefixed: Record<string, string> = {};
    for (const [key, value] of Object.entries(attributes)) {
      prefixed[`${ATTRIBUTE_PREFIX}${key}`] = value;
    }
    node[ATTRIBUTES_KEY] = prefixed;
  }
  return node;
}

export function textNode(text: string): OrderedNode {
  return { [TEXT_KEY]: text };
}

/**
 * Renders ordered nodes as compact XML, escaping text and attribute values.
 */
export function buildOrderedXml(nodes: ReadonlyArray<unknown>): string {
  const xml: string = builder.build(nodes);
  return xml;
}
