import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedReportError } from "./loader.js";

export type XmlNode = Record<string, unknown>;

const ATTR_PREFIX = "@_";

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate and parse an XML document. Tags listed in `repeated` always come
 * back as arrays. Attribute values stay strings.
 */
export function parseXml(content: string, repeated: string[] = []): XmlNode {
  if (!content.trim()) {
    throw new MalformedReportError("document is empty");
  }
  const check = XMLValidator.validate(content);
  if (check !== true) {
    throw new MalformedReportError(`${check.err.msg} (line ${check.err.line})`);
  }

  const arrayTags = new Set(repeated);
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    isArray: (name, _jpath, _isLeaf, isAttribute) => !isAttribute && arrayTags.has(name),
  });
  const parsed: unknown = parser.parse(content);
  if (!isXmlNode(parsed)) {
    throw new MalformedReportError("document has no root element");
  }
  return parsed;
}

/** Direct child elements with the given tag. Empty elements parse as "". */
export function children(node: XmlNode, tag: string): unknown[] {
  const value = node[tag];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Every element with the given tag anywhere below `node`, depth first. */
export function descendants(node: XmlNode, tag: string): unknown[] {
  const found: unknown[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTR_PREFIX) || key === "#text") continue;
    for (const item of Array.isArray(value) ? value : [value]) {
      if (key === tag) found.push(item);
      if (isXmlNode(item)) found.push(...descendants(item, tag));
    }
  }
  return found;
}

export function attr(element: unknown, name: string): string | undefined {
  if (!isXmlNode(element)) return undefined;
  const value = element[ATTR_PREFIX + name];
  return typeof value === "string" ? value : undefined;
}

/** Integer attribute; missing means 0, anything non-numeric is malformed. */
export function intAttr(element: unknown, name: string): number {
  const raw = attr(element, name);
  if (raw === undefined || raw.trim() === "") return 0;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new MalformedReportError(`attribute ${name}="${raw}" is not an integer`);
  }
  return value;
}

export function floatAttr(element: unknown, name: string): number {
  const raw = attr(element, name);
  if (raw === undefined || raw.trim() === "") return 0;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new MalformedReportError(`attribute ${name}="${raw}" is not a number`);
  }
  return value;
}
