import pako from "pako";
import { SparseMatrix } from "./sparse";
import { LogitsStore } from "./store";
import { MalformedDocumentError, MissingLineDataError, MissingPrerequisiteError } from "../errors";
import { getLogger } from "../logger";
import { pageLines } from "../model";
import type { Page } from "../types";

// Reserved key holding line id -> alphabet.
export const LINE_CHARACTERS_KEY = "line_characters";

interface EncodedMatrix {
  rows: number;
  cols: number;
  indptr: string; // base64, little-endian int32
  indices: string; // base64, little-endian int32
  data: string; // base64, little-endian float64
}

function int32ToBase64(arr: Int32Array): string {
  const buf = Buffer.alloc(arr.length * 4);
  arr.forEach((v, i) => buf.writeInt32LE(v, i * 4));
  return buf.toString("base64");
}

function float64ToBase64(arr: Float64Array): string {
  const buf = Buffer.alloc(arr.length * 8);
  arr.forEach((v, i) => buf.writeDoubleLE(v, i * 8));
  return buf.toString("base64");
}

function base64ToInt32(b64: string, what: string): Int32Array {
  const buf = Buffer.from(b64, "base64");
  if (buf.length % 4 !== 0) throw new MalformedDocumentError(`Corrupt ${what} payload`);
  const out = new Int32Array(buf.length / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readInt32LE(i * 4);
  return out;
}

function base64ToFloat64(b64: string, what: string): Float64Array {
  const buf = Buffer.from(b64, "base64");
  if (buf.length % 8 !== 0) throw new MalformedDocumentError(`Corrupt ${what} payload`);
  const out = new Float64Array(buf.length / 8);
  for (let i = 0; i < out.length; i++) out[i] = buf.readDoubleLE(i * 8);
  return out;
}

function encodeMatrix(m: SparseMatrix): EncodedMatrix {
  return {
    rows: m.rows,
    cols: m.cols,
    indptr: int32ToBase64(m.indptr),
    indices: int32ToBase64(m.indices),
    data: float64ToBase64(m.data),
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function decodeMatrix(lineId: string, raw: unknown): SparseMatrix {
  if (!isRecord(raw)) throw new MalformedDocumentError(`Logits entry for ${lineId} is not an object`);
  const { rows, cols, indptr, indices, data } = raw;
  if (typeof rows !== "number" || typeof cols !== "number" || typeof indptr !== "string"
    || typeof indices !== "string" || typeof data !== "string") {
    throw new MalformedDocumentError(`Logits entry for ${lineId} is incomplete`);
  }
  try {
    return new SparseMatrix(rows, cols, base64ToInt32(indptr, "indptr"), base64ToInt32(indices, "indices"), base64ToFloat64(data, "data"));
  } catch (e) {
    if (e instanceof RangeError) throw new MalformedDocumentError(`Logits entry for ${lineId}: ${e.message}`);
    throw e;
  }
}

function decodeAlphabets(raw: unknown): Map<string, string[]> {
  const out = new Map<string, string[]>();
  if (raw === undefined) return out;
  if (!isRecord(raw)) throw new MalformedDocumentError(`"${LINE_CHARACTERS_KEY}" is not an object`);
  for (const [id, chars] of Object.entries(raw)) {
    if (!Array.isArray(chars) || !chars.every((c): c is string => typeof c === "string")) {
      throw new MalformedDocumentError(`Alphabet for ${id} is not a list of characters`);
    }
    out.set(id, chars);
  }
  return out;
}

/** Serializes the logits of every page line. Each line must have logits attached. */
export function saveSnapshot(page: Page, store: LogitsStore): Uint8Array {
  // Entries are collected as pairs so that ids such as "__proto__" stay own keys.
  const matrices: Array<[string, EncodedMatrix]> = [];
  const characters: Array<[string, string[]]> = [];
  for (const line of pageLines(page)) {
    if (line.id === LINE_CHARACTERS_KEY) {
      throw new MalformedDocumentError(`Line id ${line.id} collides with the reserved snapshot key`);
    }
    const entry = store.get(line);
    if (!entry) throw new MissingPrerequisiteError(line.id, "logits");
    matrices.push([line.id, encodeMatrix(entry.matrix)]);
    characters.push([line.id, entry.alphabet]);
  }
  const container = Object.fromEntries<EncodedMatrix | Record<string, string[]>>([
    ...matrices,
    [LINE_CHARACTERS_KEY, Object.fromEntries(characters)],
  ]);
  return pako.gzip(JSON.stringify(container));
}

/**
 * Reads a snapshot into a fresh store for `page`. Snapshots written before alphabets
 * were recorded load with an empty alphabet for every line.
 */
export function loadSnapshot(page: Page, blob: Uint8Array): LogitsStore {
  const log = getLogger("core").child({ page_id: page.id });
  let parsed: unknown;
  try {
    parsed = JSON.parse(pako.ungzip(blob, { to: "string" }));
  } catch (e: unknown) {
    throw new MalformedDocumentError(`Unreadable logits snapshot: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(parsed)) throw new MalformedDocumentError("Logits snapshot is not an object");

  const alphabets = decodeAlphabets(parsed[LINE_CHARACTERS_KEY]);
  if (!(LINE_CHARACTERS_KEY in parsed)) log.debug("snapshot.legacy", { reason: "no alphabets" });

  const store = new LogitsStore();
  for (const line of pageLines(page)) {
    if (!Object.prototype.hasOwnProperty.call(parsed, line.id)) throw new MissingLineDataError(line.id);
    store.attach(line, decodeMatrix(line.id, parsed[line.id]), alphabets.get(line.id) ?? []);
  }
  log.debug("snapshot.loaded", { lines: store.size });
  return store;
}
