import {
  decodeAlto,
  decodePage,
  encodeAlto,
  encodePage,
  isLayoutError,
  loadSnapshot,
  MissingPrerequisiteError,
  type Logger,
  type PageSize,
} from "@ocr-layout/core";
import type { ApiConfig } from "./config";

export interface HandlerResult {
  status: number;
  body: unknown;
}

export interface ErrorBody {
  error: string;
  message: string;
}

export interface PageToAltoResponse {
  altoXml: string;
  skippedLines: string[];
}

export interface LayoutSummary {
  id: string;
  size: PageSize;
  regions: Array<{ id: string; lines: number }>;
}

export interface HandlerContext {
  config: ApiConfig;
  log: Logger;
  now?: Date;
}

// Body field missing or of the wrong type.
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function stringField(body: unknown, name: string): string {
  const v = isRecord(body) ? body[name] : undefined;
  if (typeof v !== "string" || !v.trim()) throw new BadRequestError(`${name} (string) required`);
  return v;
}

export function errorStatus(err: unknown): number {
  if (err instanceof BadRequestError) return 400;
  if (err instanceof MissingPrerequisiteError) return 422;
  if (isLayoutError(err)) return 400;
  return 500;
}

export function errorResponse(err: unknown): { status: number; body: ErrorBody } {
  const status = errorStatus(err);
  const code = err instanceof BadRequestError ? "bad_request" : isLayoutError(err) ? err.code.toLowerCase() : "internal_error";
  const message = err instanceof Error ? err.message : String(err);
  return { status, body: { error: code, message } };
}

export function health(): HandlerResult {
  return { status: 200, body: { ok: true } };
}

export function pageToAlto(body: unknown, ctx: HandlerContext): PageToAltoResponse {
  const pageXml = stringField(body, "pageXml");
  const logits = stringField(body, "logits");
  const page = decodePage(pageXml);
  const store = loadSnapshot(page, Buffer.from(logits, "base64"));
  const skippedLines: string[] = [];
  const altoXml = encodeAlto(page, store, {
    provenance: ctx.config.provenance,
    now: ctx.now,
    skipFailedLines: ctx.config.skipFailedLines,
    onLineError: (line) => skippedLines.push(line.id),
  });
  ctx.log.info("convert.page_to_alto", { page_id: page.id, skipped: skippedLines.length });
  return { altoXml, skippedLines };
}

export function altoToPage(body: unknown, ctx: HandlerContext): { pageXml: string } {
  const page = decodeAlto(stringField(body, "altoXml"));
  ctx.log.info("convert.alto_to_page", { page_id: page.id, regions: page.regions.length });
  return { pageXml: encodePage(page) };
}

export function layoutSummary(body: unknown): LayoutSummary {
  const page = decodePage(stringField(body, "pageXml"));
  return {
    id: page.id,
    size: page.size,
    regions: page.regions.map((r) => ({ id: r.id, lines: r.lines.length })),
  };
}

/** Runs a handler and turns thrown errors into a status and error body. */
export function respond(run: () => unknown, log: Logger): HandlerResult {
  try {
    return { status: 200, body: run() };
  } catch (err: unknown) {
    const out = errorResponse(err);
    if (out.status >= 500) log.error("request.failed", { error: out.body.message });
    else log.warn("request.rejected", { status: out.status, error: out.body.error, message: out.body.message });
    return out;
  }
}
