// pattern: Functional Core
import { z } from "zod";
import { SerializationError, formatIssues } from "../errors";
import { map, sequence, text } from "./types";
import type { PropertyMap, PropertyValue } from "./types";

/**
 * JSON-compatible form of a property value, as used in fixtures and by
 * callers that prefer plain objects.
 */
export type PlainValue = string | null | Array<PlainValue> | PlainProperties;

export type PlainProperties = { [key: string]: PlainValue };

const plainValueSchema: z.ZodType<PlainValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.null(),
    z.array(plainValueSchema),
    z.record(z.string(), plainValueSchema),
  ]),
);

const plainPropertiesSchema = z.record(z.string(), plainValueSchema);

function fromPlainValue(value: PlainValue): PropertyValue {
  if (value === null || typeof value === "string") {
    return text(value);
  }
  if (Array.isArray(value)) {
    return sequence(value.map(fromPlainValue));
  }
  return map(fromPlainObject(value));
}

function fromPlainObject(plain: PlainProperties): PropertyMap {
  const properties: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(plain)) {
    Object.defineProperty(properties, key, {
      value: fromPlainValue(value),
      enumerable: true,
    });
  }
  return Object.freeze(properties);
}

function toPlainValue(value: PropertyValue): PlainValue {
  switch (value.kind) {
    case "text":
      return value.text;
    case "sequence":
      return value.items.map(toPlainValue);
    case "map":
      return toPlainProperties(value.properties);
  }
}

/**
 * Converts a property map to plain JSON-compatible data.
 */
export function toPlainProperties(properties: PropertyMap): PlainProperties {
  const plain: PlainProperties = {};
  for (const [key, value] of Object.entries(properties)) {
    Object.defineProperty(plain, key, {
      value: toPlainValue(value),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return plain;
}

/**
 * Builds a property map from plain data: strings and null become text,
 * arrays become sequences, and objects become nested maps.
 *
 * @throws SerializationError when the input is not a plain property object.
 */
export function fromPlainProperties(input: unknown): PropertyMap {
  const result = plainPropertiesSchema.safeParse(input);
  if (!result.success) {
    throw new SerializationError(
      `invalid property map:\n${formatIssues(result.error.issues)}`,
    );
  }
  return fromPlainObject(result.data);
}
