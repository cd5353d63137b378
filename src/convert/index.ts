export { convertXmlToProperties, REPEATABLE_ATTRIBUTE } from "./xml-to-properties";
export {
  convertPropertiesToXml,
  DEFAULT_ROOT_ELEMENT,
} from "./properties-to-xml";
export type { SerializeOptions } from "./properties-to-xml";
export { toPlainProperties, fromPlainProperties } from "./plain";
export type { PlainValue, PlainProperties } from "./plain";
export { text, sequence, map, isSequence, isMap, getText } from "./types";
export type {
  PropertyMap,
  PropertyValue,
  TextValue,
  SequenceValue,
  MapValue,
} from "./types";
