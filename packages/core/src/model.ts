import { MalformedDocumentError } from "./errors";
import type { Page, PageSize, Polyline, Region, TextLine } from "./types";

export function createPage(id: string, size: PageSize = { height: 0, width: 0 }, regions: Region[] = []): Page {
  return { id, size, regions };
}

export function createRegion(id: string, polygon: Polyline, lines: TextLine[] = [], transcription?: string): Region {
  const region: Region = { id, polygon, lines };
  if (transcription !== undefined) region.transcription = transcription;
  return region;
}

export function createLine(id: string, fields: Omit<Partial<TextLine>, "id"> = {}): TextLine {
  return { id, ...fields };
}

export function* pageLines(page: Page): Generator<TextLine> {
  for (const region of page.regions) {
    for (const line of region.lines) yield line;
  }
}

export function findLine(page: Page, id: string): TextLine | undefined {
  for (const line of pageLines(page)) {
    if (line.id === id) return line;
  }
  return undefined;
}

export function lineCount(page: Page): number {
  return page.regions.reduce((acc, r) => acc + r.lines.length, 0);
}

export function assertUniqueIds(page: Page): void {
  const regionIds = new Set<string>();
  const lineIds = new Set<string>();
  for (const region of page.regions) {
    if (regionIds.has(region.id)) throw new MalformedDocumentError(`Duplicate region id ${region.id}`);
    regionIds.add(region.id);
    for (const line of region.lines) {
      if (lineIds.has(line.id)) throw new MalformedDocumentError(`Duplicate line id ${line.id}`);
      lineIds.add(line.id);
    }
  }
}
