// pattern: Functional Core
import { SerializationError } from "../errors";
import { buildOrderedXml, elementNode, textNode } from "./ordered-xml";
import type { OrderedNode } from "./ordered-xml";
import type { PropertyMap, PropertyValue } from "./types";
import { REPEATABLE_ATTRIBUTE } from "./xml-to-properties";

export const DEFAULT_ROOT_ELEMENT = "entity";

export type SerializeOptions = Readonly<{
  rootElement?: string;
}>;

// Local names only: namespace prefixes are not produced.
export const ELEMENT_NAME_PATTERN = /^[\p{L}_][\p{L}\p{N}_.-]*$/u;

function assertElementName(name: string, path: string): void {
  if (!ELEMENT_NAME_PATTERN.test(name)) {
    throw new SerializationError(
      `"${name}" at ${path} is not a valid XML element name`,
      path,
    );
  }
}

function assertPropertyValue(value: unknown, path: string): void {
  if (typeof value !== "object" || value === null) {
    throw new SerializationError(`value at ${path} is not a property value`, path);
  }
}

function renderSingle(
  name: string,
  value: PropertyValue,
  path: string,
  attributes?: Readonly<Record<string, string>>,
): OrderedNode {
  switch (value.kind) {
    case "text":
      return elementNode(
        name,
        value.text === null ? [] : [textNode(value.text)],
        attributes,
      );
    case "map":
      return elementNode(name, renderProperties(value.properties, path), attributes);
    case "sequence":
      throw new SerializationError(
        `sequence at ${path} directly contains another sequence`,
        path,
      );
    default: {
      const unknownValue: never = value;
      throw new SerializationError(
        `unsupported value at ${path}: ${JSON.stringify(unknownValue)}`,
        path,
      );
    }
  }
}

function renderProperties(properties: PropertyMap, parentPath: string): Array<OrderedNode> {
  const nodes: Array<OrderedNode> = [];

  for (const [name, value] of Object.entries(properties)) {
    const path = parentPath === "" ? name : `${parentPath}.${name}`;
    assertElementName(name, path);

    assertPropertyValue(value, path);
    if (value.kind !== "sequence") {
      nodes.push(renderSingle(name, value, path));
      continue;
    }

    value.items.forEach((item, index) => {
      const itemPath = `${path}[${index}]`;
      assertPropertyValue(item, itemPath);
      nodes.push(
        index === 0
          ? renderSingle(name, item, itemPath, { [REPEATABLE_ATTRIBUTE]: "true" })
          : renderSingle(name, item, itemPath),
      );
    });
  }

  return nodes;
}

/**
 * Renders a property map as XML wrapped in a root element (`entity` by default).
 *
 * Sequences become one sibling element per item, the first marked
 * `repeatable="true"` so a one-item sequence parses back as a sequence.
 * Null text renders as an empty element.
 *
 * @throws SerializationError for invalid element names, a sequence nested
 * directly in a sequence, or a value of unknown kind.
 */
export function convertPropertiesToXml(
  properties: PropertyMap,
  options: SerializeOptions = {},
): string {
  const rootElement = options.rootElement ?? DEFAULT_ROOT_ELEMENT;
  assertElementName(rootElement, "(root)");
  return buildOrderedXml([elementNode(rootElement, renderProperties(properties, ""))]);
}
