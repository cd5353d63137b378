/**
 * A leaf element's text. `null` when the element was empty.
 */
export type TextValue = Readonly<{
  kind: "text";
  text: string | null;
}>;

/**
 * Every occurrence of a repeated element, in document order.
 */
export type SequenceValue = Readonly<{
  kind: "sequence";
  items: ReadonlyArray<PropertyValue>;
}>;

/**
 * An element with child elements, converted recursively.
 */
export type MapValue = Readonly<{
  kind: "map";
  properties: PropertyMap;
}>;

export type PropertyValue = TextValue | SequenceValue | MapValue;

/**
 * Element local name to value. Key order carries no meaning.
 */
export type PropertyMap = Readonly<Record<string, PropertyValue>>;

export function text(value: string | null): TextValue {
  const textValue: TextValue = { kind: "text", text: value };
  return Object.freeze(textValue);
}

export function sequence(items: ReadonlyArray<PropertyValue>): SequenceValue {
  const sequenceValue: SequenceValue = {
    kind: "sequence",
    items: Object.freeze([...items]),
  };
  return Object.freeze(sequenceValue);
}

export function map(properties: PropertyMap): MapValue {
  const mapValue: MapValue = {
    kind: "map",
    properties: Object.freeze({ ...properties }),
  };
  return Object.freeze(mapValue);
}

export function isSequence(value: PropertyValue | undefined): value is SequenceValue {
  return value?.kind === "sequence";
}

export function isMap(value: PropertyValue | undefined): value is MapValue {
  return value?.kind === "map";
}

/**
 * Returns the text stored under `key`. An absent key and an empty element
 * both read as null; sequences and nested maps are not text and read as null.
 */
export function getText(properties: PropertyMap, key: string): string | null {
  const value = Object.hasOwn(properties, key) ? properties[key] : undefined;
  return value?.kind === "text" ? value.text : null;
}
