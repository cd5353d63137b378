// pattern: Functional Core
import {
  childElements,
  documentElement,
  parseOrderedNodes,
  readAttribute,
  textContent,
} from "./ordered-xml";
import type { XmlElement } from "./ordered-xml";
import { map, sequence, text } from "./types";
import type { PropertyMap, PropertyValue } from "./types";

export const REPEATABLE_ATTRIBUTE = "repeatable";

/**
 * Per-key accumulator for one level of the tree. A key moves from
 * `single` to `repeated` on its second occurrence, or starts as
 * `repeated` when its first occurrence carries the marker.
 */
type Slot =
  | { readonly kind: "single"; readonly value: PropertyValue }
  | { readonly kind: "repeated"; readonly items: Array<PropertyValue> };

function isRepeatable(element: XmlElement): boolean {
  return readAttribute(element, REPEATABLE_ATTRIBUTE) === "true";
}

function convertElement(element: XmlElement): PropertyValue {
  const children = childElements(element);
  if (children.length === 0) {
    return text(textContent(element));
  }
  return map(convertElements(children));
}

function convertElements(elements: ReadonlyArray<XmlElement>): PropertyMap {
  const slots = new Map<string, Slot>();

  for (const element of elements) {
    const value = convertElement(element);
    const slot = slots.get(element.name);

    if (slot === undefined) {
      slots.set(
        element.name,
        isRepeatable(element)
          ? { kind: "repeated", items: [value] }
          : { kind: "single", value },
      );
    } else if (slot.kind === "single") {
      slots.set(element.name, { kind: "repeated", items: [slot.value, value] });
    } else {
      slot.items.push(value);
    }
  }

  const properties: Record<string, PropertyValue> = {};
  for (const [name, slot] of slots) {
    const value = slot.kind === "single" ? slot.value : sequence(slot.items);
    Object.defineProperty(properties, name, {
      value,
      enumerable: true,
      writable: false,
      configurable: false,
    });
  }
  return Object.freeze(properties);
}

/**
 * Converts the children of an XML document's root element into a property map.
 *
 * Leaf elements become text (null when empty), elements with children become
 * nested maps, and a name seen twice among siblings, or first seen with
 * `repeatable="true"`, becomes a sequence holding every occurrence in order.
 * The root element's own name is ignored.
 *
 * @throws ParseError if the XML is malformed or references an undeclared entity.
 */
export function convertXmlToProperties(xmlText: string): PropertyMap {
  const root = documentElement(parseOrderedNodes(xmlText));
  return convertElements(childElements(root));
}
