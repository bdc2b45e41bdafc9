import { DecodeError, Err, Ok, type Result } from "@/domain/error";
import { correctText, type EntityMode } from "@/domain/services/text-correction";
import { isItemType, type ItemType } from "@/domain/types";
import type { XmlElement } from "@/infrastructure/xml/xml-document";

export type DecodeOptions = {
  readonly entityMode: EntityMode;
};

/**
 * Runs a decoder written against the throwing readers below and turns the first
 * `DecodeError` into an `Err`. Anything else is a bug and keeps propagating.
 */
export const decodeWith = <T>(decode: () => T): Result<T, DecodeError> => {
  try {
    return Ok(decode());
  } catch (error) {
    if (error instanceof DecodeError) {
      return Err(error);
    }
    throw error;
  }
};

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export const parseInteger = (raw: string, field: string, element: string): number => {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!INTEGER.test(trimmed) || !Number.isSafeInteger(value)) {
    throw DecodeError.invalidNumber(field, element, raw);
  }
  return value;
};

export const parseDecimal = (raw: string, field: string, element: string): number => {
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) {
    throw DecodeError.invalidNumber(field, element, raw);
  }
  return Number(trimmed);
};

export const requireAttribute = (element: XmlElement, name: string): string => {
  const value = element.attribute(name);
  if (value === undefined) {
    throw DecodeError.missingField(name, element.name);
  }
  return value;
};

/** Treats an empty attribute like a missing one. */
export const optionalAttribute = (element: XmlElement, name: string): string | undefined => {
  const value = element.attribute(name)?.trim();
  return value === undefined || value === "" ? undefined : value;
};

export const requireIntegerAttribute = (element: XmlElement, name: string): number =>
  parseInteger(requireAttribute(element, name), name, element.name);

export const optionalIntegerAttribute = (element: XmlElement, name: string): number | undefined => {
  const raw = optionalAttribute(element, name);
  return raw === undefined ? undefined : parseInteger(raw, name, element.name);
};

export const optionalDecimalAttribute = (element: XmlElement, name: string): number | undefined => {
  const raw = optionalAttribute(element, name);
  return raw === undefined ? undefined : parseDecimal(raw, name, element.name);
};

export const requirePositiveId = (element: XmlElement, name: string): number => {
  const id = requireIntegerAttribute(element, name);
  if (id <= 0) {
    throw DecodeError.unexpectedValue(name, element.name, String(id));
  }
  return id;
};

/** BGG encodes booleans as `1` / `0`. */
export const requireFlagAttribute = (element: XmlElement, name: string): boolean => {
  const raw = requireAttribute(element, name).trim();
  if (raw === "1") return true;
  if (raw === "0") return false;
  throw DecodeError.unexpectedValue(name, element.name, raw);
};

export const requireItemType = (element: XmlElement, name: string): ItemType => {
  const raw = requireAttribute(element, name);
  if (!isItemType(raw)) {
    throw DecodeError.unexpectedValue(name, element.name, raw);
  }
  return raw;
};

export const requireChild = (element: XmlElement, tag: string): XmlElement => {
  const child = element.child(tag);
  if (child === undefined) {
    throw DecodeError.missingField(tag, element.name);
  }
  return child;
};

/** Text of `<tag>text</tag>`, absent when the element is missing or empty. */
export const optionalChildText = (element: XmlElement, tag: string): string | undefined => {
  const text = element.child(tag)?.text();
  return text === undefined || text === "" ? undefined : text;
};

export const optionalChildInteger = (element: XmlElement, tag: string): number | undefined => {
  const raw = optionalChildText(element, tag);
  return raw === undefined ? undefined : parseInteger(raw, tag, element.name);
};

/** `value` attribute of `<tag value="..."/>`, the shape used by the family, search and hot endpoints. */
export const optionalChildValue = (element: XmlElement, tag: string): string | undefined => {
  const child = element.child(tag);
  return child === undefined ? undefined : optionalAttribute(child, "value");
};

export const optionalChildIntegerValue = (element: XmlElement, tag: string): number | undefined => {
  const raw = optionalChildValue(element, tag);
  return raw === undefined ? undefined : parseInteger(raw, tag, element.name);
};

export const correct = (text: string, options: DecodeOptions): string => correctText(text, options.entityMode);

export const correctOptional = (text: string | undefined, options: DecodeOptions): string | undefined =>
  text === undefined ? undefined : correct(text, options);
