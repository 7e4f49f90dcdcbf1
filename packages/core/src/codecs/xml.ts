import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedDocumentError } from "../errors";

// Parsed element: attributes under "@_name", text under "#text", children by local name.
export type XmlNode = Record<string, unknown>;

export interface XmlObject {
  [key: string]: string | number | XmlObject | XmlObject[];
}

// Builder input where sibling order matters: one tag per node, attributes under ":@".
export interface OrderedNode {
  [key: string]: OrderedNode[] | Record<string, string> | string;
}

const ATTR = "@_";

function isRecord(v: unknown): v is XmlNode {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function asNode(v: unknown): XmlNode | undefined {
  if (isRecord(v)) return v;
  if (typeof v === "string") return { "#text": v };
  return undefined;
}

/**
 * Parses a document with namespace prefixes dropped, so `pc:TextLine` and `TextLine`
 * resolve the same. Tags in `repeated` always come back as arrays.
 */
export function parseXml(xml: string, repeated: readonly string[]): XmlNode {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new MalformedDocumentError(`Invalid XML at line ${valid.err.line}: ${valid.err.msg}`);
  }
  const tags = new Set(repeated);
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    // Numeric character references (&#233; &#x2014;) are only decoded with this on.
    htmlEntities: true,
    isArray: (name: string) => tags.has(name),
  });
  const root: unknown = parser.parse(xml);
  if (!isRecord(root)) throw new MalformedDocumentError("Empty document");
  return root;
}

export function children(node: XmlNode, name: string): XmlNode[] {
  const v = node[name];
  if (v === undefined) return [];
  const list: unknown[] = Array.isArray(v) ? v : [v];
  const out: XmlNode[] = [];
  for (const item of list) {
    const n = asNode(item);
    if (n) out.push(n);
  }
  return out;
}

export function child(node: XmlNode, name: string): XmlNode | undefined {
  return children(node, name)[0];
}

/**
 * Depth-first, document order within each element. Does not descend into matches,
 * nor into elements named in `stopAt`.
 */
export function descendants(node: XmlNode, name: string, stopAt: readonly string[] = []): XmlNode[] {
  const out: XmlNode[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTR) || key === "#text" || stopAt.includes(key)) continue;
    const list: unknown[] = Array.isArray(value) ? value : [value];
    for (const item of list) {
      const n = asNode(item);
      if (!n) continue;
      if (key === name) out.push(n);
      else out.push(...descendants(n, name, stopAt));
    }
  }
  return out;
}

export function attr(node: XmlNode, name: string): string | undefined {
  const v = node[ATTR + name];
  return typeof v === "string" ? v : undefined;
}

export function requireAttr(node: XmlNode, name: string, where: string): string {
  const v = attr(node, name);
  if (v === undefined) throw new MalformedDocumentError(`${where}: missing attribute ${name}`);
  return v;
}

export function numberAttr(node: XmlNode, name: string, where: string): number {
  const raw = requireAttr(node, name, where);
  const v = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(v)) {
    throw new MalformedDocumentError(`${where}: attribute ${name}="${raw}" is not a number`);
  }
  return v;
}

export function text(node: XmlNode): string {
  const v = node["#text"];
  return typeof v === "string" ? v : "";
}

export function buildXml(doc: XmlObject, declaration: string): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });
  return `${declaration}\n${builder.build(doc)}`;
}

export function attrs(values: Record<string, string | number>): XmlObject {
  const out: XmlObject = {};
  for (const [k, v] of Object.entries(values)) out[ATTR + k] = v;
  return out;
}

export function element(name: string, attributes: Record<string, string | number> = {}, kids: OrderedNode[] = []): OrderedNode {
  const node: OrderedNode = { [name]: kids };
  const entries = Object.entries(attributes);
  if (entries.length) {
    const prefixed: Record<string, string> = {};
    for (const [k, v] of entries) prefixed[ATTR + k] = String(v);
    node[":@"] = prefixed;
  }
  return node;
}

export function textNode(value: string): OrderedNode {
  return { "#text": value };
}

export function buildOrderedXml(nodes: OrderedNode[], declaration: string): string {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    preserveOrder: true,
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });
  return `${declaration}\n${String(builder.build(nodes)).trimStart()}`;
}
