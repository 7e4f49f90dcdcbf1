import fs from "fs/promises";
import path from "path";
import { decodePage, encodeAlto, getLogger, loadSnapshot, type Logger, type Provenance } from "@ocr-layout/core";

export const ALTO_SUFFIX = ".alto.xml";
export const LOGITS_SUFFIX = ".logits";

export interface ConvertOptions {
  provenance?: Provenance;
  skipFailedLines?: boolean;
  now?: Date;
  logger?: Logger;
}

export interface FileResult {
  file: string;
  output?: string;
  skippedLines: string[];
  error?: string;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

async function convertFile(inputPath: string, logitsPath: string, outputPath: string, opts: ConvertOptions): Promise<string[]> {
  const page = decodePage(await fs.readFile(inputPath, "utf8"));
  const store = loadSnapshot(page, await fs.readFile(logitsPath));
  const skipped: string[] = [];
  const alto = encodeAlto(page, store, {
    provenance: opts.provenance,
    now: opts.now,
    skipFailedLines: opts.skipFailedLines,
    onLineError: (line) => skipped.push(line.id),
  });
  await fs.writeFile(outputPath, alto, "utf8");
  return skipped;
}

/**
 * Converts every PAGE file in `inputDir` that has a sibling logits snapshot into
 * `<name>.alto.xml` under `outputDir`. Files are processed in name order; a failing
 * file is reported in its result and the rest continue.
 */
export async function convertDirectory(inputDir: string, outputDir: string, opts: ConvertOptions = {}): Promise<FileResult[]> {
  const log = opts.logger ?? getLogger("worker");
  const names = (await fs.readdir(inputDir))
    .filter((n) => n.endsWith(".xml") && !n.endsWith(ALTO_SUFFIX))
    .sort();
  await fs.mkdir(outputDir, { recursive: true });

  const results: FileResult[] = [];
  for (const name of names) {
    const base = name.slice(0, -".xml".length);
    const logitsPath = path.join(inputDir, base + LOGITS_SUFFIX);
    const fileLog = log.child({ file: name });
    if (!(await exists(logitsPath))) {
      fileLog.debug("convert.no_logits");
      continue;
    }
    const output = path.join(outputDir, base + ALTO_SUFFIX);
    try {
      const skippedLines = await convertFile(path.join(inputDir, name), logitsPath, output, opts);
      fileLog.info("convert.done", { output, skipped: skippedLines.length });
      results.push({ file: name, output, skippedLines });
    } catch (err: unknown) {
      const error = err instanceof Error ? err.message : String(err);
      fileLog.error("convert.failed", { error });
      results.push({ file: name, skippedLines: [], error });
    }
  }
  log.info("convert.summary", { files: results.length, failed: results.filter((r) => r.error !== undefined).length });
  return results;
}
