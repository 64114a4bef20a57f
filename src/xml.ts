import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { DeserializationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Paths
//
// Requests and responses are both addressed with path strings:
//   "bootstrap>vm-auth-key>generate>lifetime"   nested elements
//   "move-dg>entry>@name"                       attribute of <entry>
// Segments may also be separated with "." instead of ">".
// ---------------------------------------------------------------------------

const ATTR_PREFIX = "@_";
const TEXT_NODE = "#text";

type XmlElement = { [key: string]: unknown };

function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function splitPath(path: string): string[] {
  return path
    .split(/[>.]/)
    .map((s) => s.trim())
    .filter(Boolean);
}

function nodeKey(segment: string): string {
  return segment.startsWith("@") ? ATTR_PREFIX + segment.slice(1) : segment;
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface RequestField {
  path: string;
  value: string | number;
  /** Emit nothing when the value is the empty string */
  omitEmpty?: boolean;
}

export interface CommandRequest {
  /** Root element tag, e.g. "show" or "request" */
  root: string;
  fields: RequestField[];
}

export function command(root: string, ...fields: RequestField[]): CommandRequest {
  return { root, fields };
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_NODE,
  suppressEmptyNode: true,
});

function childElement(parent: XmlElement, name: string): XmlElement {
  const existing = parent[name];
  if (isElement(existing)) return existing;
  const child: XmlElement = typeof existing === "string" && existing !== "" ? { [TEXT_NODE]: existing } : {};
  parent[name] = child;
  return child;
}

export function toXml(request: CommandRequest): string {
  const tree: XmlElement = {};

  for (const field of request.fields) {
    const value = String(field.value);
    if (field.omitEmpty && value === "") continue;

    const segments = splitPath(field.path);
    const last = segments.pop();
    if (last === undefined) continue;

    let node = tree;
    for (const segment of segments) node = childElement(node, segment);

    if (last.startsWith("@")) {
      node[nodeKey(last)] = value;
    } else {
      const existing = node[last];
      if (isElement(existing)) existing[TEXT_NODE] = value;
      else node[last] = value;
    }
  }

  const xml: string = builder.build({ [request.root]: Object.keys(tree).length ? tree : "" });
  return xml;
}

/** Short human-readable label for a request, used when no description is given */
export function describeRequest(request: CommandRequest): string {
  const paths = request.fields.map((f) => splitPath(f.path).filter((s) => !s.startsWith("@")).join(" "));
  return [request.root, ...new Set(paths)].filter(Boolean).join(" ");
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_NODE,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

/** Validate and parse an XML document into plain objects */
export function parseDocument(raw: string): unknown {
  const result = XMLValidator.validate(raw);
  if (result !== true) {
    throw new DeserializationError(
      `Malformed XML at line ${result.err.line}, column ${result.err.col}: ${result.err.msg}`,
      raw,
    );
  }
  const doc: unknown = parser.parse(raw);
  return doc;
}

/** Every node reached by `path` from `node`, in document order */
export function select(node: unknown, path: string): unknown[] {
  let current: unknown[] = [node];
  for (const segment of splitPath(path)) {
    const key = nodeKey(segment);
    current = current.flatMap((n): unknown[] => {
      if (!isElement(n)) return [];
      const next = n[key];
      if (next === undefined) return [];
      return Array.isArray(next) ? next : [next];
    });
  }
  return current;
}

export function textOf(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (isElement(node)) {
    const text = node[TEXT_NODE];
    if (typeof text === "string" || typeof text === "number") return String(text);
  }
  return "";
}

/** Maps a parsed node to a typed value; absent content yields a default */
export type Decoder<T> = (node: unknown) => T;

export function text(path = ""): Decoder<string> {
  return (node) => {
    const [first] = select(node, path);
    return first === undefined ? "" : textOf(first);
  };
}

export function int(path: string): Decoder<number> {
  return (node) => {
    const n = Number.parseInt(text(path)(node), 10);
    return Number.isNaN(n) ? 0 : n;
  };
}

export function texts(path: string): Decoder<string[]> {
  return (node) => select(node, path).map(textOf);
}

export function list<T>(path: string, item: Decoder<T>): Decoder<T[]> {
  return (node) => select(node, path).map(item);
}

/** Child element texts of the first node at `path`, keyed by tag name */
export function fields(path: string): Decoder<Record<string, string>> {
  return (node) => {
    const [first] = select(node, path);
    if (!isElement(first)) return {};
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(first)) {
      if (key.startsWith(ATTR_PREFIX) || key === TEXT_NODE) continue;
      out[key] = Array.isArray(value) ? value.map(textOf).join(", ") : textOf(value);
    }
    return out;
  };
}

/**
 * The first node at `path` as plain data, or null.
 *
 * Attributes become ordinary keys and the text of an element that also has
 * attributes or children goes under `text`. Child elements win on a name clash.
 */
export function tree(path: string): Decoder<unknown> {
  return (node) => {
    const [first] = select(node, path);
    return first === undefined ? null : plainNode(first);
  };
}

function plainNode(node: unknown): unknown {
  if (Array.isArray(node)) return node.map(plainNode);
  if (!isElement(node)) return node;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    if (key === TEXT_NODE || key.startsWith(ATTR_PREFIX)) continue;
    out[key] = plainNode(value);
  }
  for (const [key, value] of Object.entries(node)) {
    const name = key === TEXT_NODE ? "text" : key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : undefined;
    if (name !== undefined && !(name in out)) out[name] = value;
  }
  return out;
}
