import { XMLParser, XMLValidator } from "fast-xml-parser";

import { Err, Ok, ParseError, type Result } from "@/domain/error";
import { isScalarValue } from "@/domain/services/text-correction";

/**
 * Entity references are left untouched by fast-xml-parser and decoded here, exactly once,
 * so the result does not depend on the parser's own entity tables.
 */
const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  processEntities: false,
  cdataPropName: "#cdata",
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true
});

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";
const CDATA_KEY = "#cdata";
const FRAGMENT_RADIUS = 40;

// BGG descriptions use &mdash; without declaring it.
const NAMED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ["lt", "<"],
  ["gt", ">"],
  ["amp", "&"],
  ["quot", '"'],
  ["apos", "'"],
  ["mdash", "\u2014"]
]);

const ENTITY_REFERENCE = /&(?:#[xX]([0-9a-fA-F]{1,6})|#([0-9]{1,7})|([A-Za-z][A-Za-z0-9]*));/g;

export const decodeEntities = (text: string): string =>
  text.replace(
    ENTITY_REFERENCE,
    (match: string, hex: string | undefined, decimal: string | undefined, name: string | undefined) => {
      if (name !== undefined) {
        return NAMED_ENTITIES.get(name) ?? match;
      }
      const codePoint = hex !== undefined ? Number.parseInt(hex, 16) : Number.parseInt(decimal ?? "", 10);
      return isScalarValue(codePoint) ? String.fromCodePoint(codePoint) : match;
    }
  );

type XmlNode = XmlElement | string;

/** Read-only view of one element. Children keep document order. */
export class XmlElement {
  constructor(
    readonly name: string,
    private readonly attributes: ReadonlyMap<string, string>,
    private readonly nodes: readonly XmlNode[]
  ) {}

  attribute(name: string): string | undefined {
    return this.attributes.get(name);
  }

  children(tag?: string): XmlElement[] {
    return this.nodes.filter(
      (node): node is XmlElement => node instanceof XmlElement && (tag === undefined || node.name === tag)
    );
  }

  child(tag: string): XmlElement | undefined {
    return this.children(tag)[0];
  }

  /** Direct text content, trimmed. */
  text(): string {
    return this.nodes
      .filter((node): node is string => typeof node === "string")
      .join("")
      .trim();
  }
}

export type XmlDocument = {
  readonly root: XmlElement;
};

export type ParseXmlOptions = {
  /** Accepted root element names; any root is accepted when omitted. */
  readonly expectedRoot?: string | readonly string[];
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toAttributes = (raw: unknown): Map<string, string> => {
  const attributes = new Map<string, string>();
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      attributes.set(name, decodeEntities(value));
    }
  }
  return attributes;
};

// CDATA content is literal: no entity decoding.
const cdataText = (raw: unknown): string => {
  if (!Array.isArray(raw)) {
    return "";
  }
  return raw
    .map((entry) => {
      const text = isRecord(entry) ? entry[TEXT_KEY] : undefined;
      return typeof text === "string" ? text : "";
    })
    .join("");
};

const toNodes = (raw: unknown): XmlNode[] => {
  if (!Array.isArray(raw)) {
    return [];
  }

  const nodes: XmlNode[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;

    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        nodes.push(decodeEntities(String(value)));
        continue;
      }
      if (key === CDATA_KEY) {
        nodes.push(cdataText(value));
        continue;
      }
      nodes.push(new XmlElement(key, toAttributes(entry[ATTRIBUTES_KEY]), toNodes(value)));
    }
  }
  return nodes;
};

const excerpt = (text: string, line: number, column: number): string => {
  const source = text.split(/\r?\n/)[line - 1] ?? "";
  if (!Number.isFinite(column)) {
    return source.slice(0, FRAGMENT_RADIUS * 2).trim();
  }
  const start = Math.max(0, column - 1 - FRAGMENT_RADIUS);
  return source.slice(start, column - 1 + FRAGMENT_RADIUS).trim();
};

const utf8 = new TextDecoder("utf-8", { fatal: true });

const decodeBody = (input: Uint8Array | string): Result<string, ParseError> => {
  if (typeof input === "string") {
    return Ok(input);
  }
  try {
    return Ok(utf8.decode(input));
  } catch (error) {
    if (error instanceof TypeError) {
      return Err(new ParseError("response body is not valid UTF-8", ""));
    }
    throw error;
  }
};

export function parseXmlDocument(input: Uint8Array | string, options: ParseXmlOptions = {}): Result<XmlDocument, ParseError> {
  const decoded = decodeBody(input);
  if (!decoded.ok) {
    return decoded;
  }

  const text = decoded.value;
  if (text.trim() === "") {
    return Err(new ParseError("empty document", ""));
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    // Errors inside a DOCTYPE carry no column.
    const position = Number.isFinite(col) ? `line ${line}, column ${col}` : `line ${line}`;
    return Err(new ParseError(`${msg} (${position})`, excerpt(text, line, col)));
  }

  // The validator accepts some documents the parser rejects, e.g. external entity declarations.
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(text);
  } catch (error) {
    if (error instanceof Error) {
      return Err(new ParseError(error.message, text.slice(0, FRAGMENT_RADIUS * 2)));
    }
    throw error;
  }
  const root = toNodes(parsed).find((node): node is XmlElement => node instanceof XmlElement);
  if (root === undefined) {
    return Err(new ParseError("document has no root element", text.slice(0, FRAGMENT_RADIUS * 2)));
  }

  const { expectedRoot } = options;
  if (expectedRoot !== undefined) {
    const accepted: readonly string[] = typeof expectedRoot === "string" ? [expectedRoot] : expectedRoot;
    if (!accepted.includes(root.name)) {
      return Err(new ParseError(`unexpected root element <${root.name}>`, `<${root.name}>`));
    }
  }

  return Ok({ root });
}
