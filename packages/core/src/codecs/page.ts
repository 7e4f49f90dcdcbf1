import { MalformedDocumentError } from "../errors";
import { formatPoints, parsePoints } from "../geometry";
import { getLogger } from "../logger";
import { assertUniqueIds, createLine, createPage, createRegion, lineCount } from "../model";
import type { Page, Polyline, Region, TextLine } from "../types";
import { formatHeights, parseHeights } from "./heights";
import { attr, attrs, buildXml, child, children, descendants, numberAttr, parseXml, requireAttr, text, type XmlNode, type XmlObject } from "./xml";

export const PAGE_NAMESPACE = "http://schema.primaresearch.org/PAGE/gts/pagecontent/2013-07-15";

const REPEATED = ["Page", "TextRegion", "TextLine", "Point", "TextEquiv", "Unicode", "Coords", "Baseline"];

function readCoords(el: XmlNode, where: string): Polyline {
  const points = attr(el, "points");
  if (points !== undefined) return parsePoints(points);
  return children(el, "Point").map((p): [number, number] => [numberAttr(p, "x", where), numberAttr(p, "y", where)]);
}

// A TextEquiv whose Unicode has no text reads as '' rather than absent.
function readTranscription(el: XmlNode, where: string): string | undefined {
  const equiv = child(el, "TextEquiv");
  if (!equiv) return undefined;
  const unicode = child(equiv, "Unicode");
  if (!unicode) throw new MalformedDocumentError(`${where}: TextEquiv without Unicode`);
  return text(unicode);
}

function readLine(el: XmlNode): TextLine {
  const id = requireAttr(el, "id", "TextLine");
  const where = `TextLine ${id}`;
  const line = createLine(id);

  const custom = attr(el, "custom");
  if (custom !== undefined) {
    const heights = parseHeights(custom);
    if (heights) line.heights = heights;
  }
  const baseline = child(el, "Baseline");
  if (baseline) line.baseline = readCoords(baseline, where);
  const coords = child(el, "Coords");
  if (coords) {
    const polygon = readCoords(coords, where);
    if (polygon.length) line.polygon = polygon;
  }
  const transcription = readTranscription(el, where);
  if (transcription !== undefined) line.transcription = transcription;
  return line;
}

function readRegion(el: XmlNode): Region {
  const id = requireAttr(el, "id", "TextRegion");
  const where = `TextRegion ${id}`;
  const coords = child(el, "Coords");
  if (!coords) throw new MalformedDocumentError(`${where}: missing Coords`);
  const lines = descendants(el, "TextLine", ["TextRegion"]).map(readLine);
  return createRegion(id, readCoords(coords, where), lines, readTranscription(el, where));
}

/** Parses a PAGE document. Throws MalformedDocumentError without returning a partial page. */
export function decodePage(xml: string): Page {
  const doc = parseXml(xml, REPEATED);
  const root = child(doc, "PcGts");
  const pageEl = root ? child(root, "Page") : undefined;
  if (!pageEl) throw new MalformedDocumentError("PAGE document has no Page element");

  const page = createPage(requireAttr(pageEl, "imageFilename", "Page"), {
    height: Math.trunc(numberAttr(pageEl, "imageHeight", "Page")),
    width: Math.trunc(numberAttr(pageEl, "imageWidth", "Page")),
  });
  // Nested regions are listed after their parent, each with its own lines only.
  const collect = (node: XmlNode) => {
    for (const regionEl of descendants(node, "TextRegion")) {
      page.regions.push(readRegion(regionEl));
      collect(regionEl);
    }
  };
  collect(pageEl);
  assertUniqueIds(page);

  getLogger("core").child({ page_id: page.id }).debug("page.decoded", { regions: page.regions.length, lines: lineCount(page) });
  return page;
}

function writeTextEquiv(transcription: string): XmlObject {
  return { Unicode: transcription };
}

function writeLine(line: TextLine): XmlObject {
  const el: XmlObject = attrs({ id: line.id });
  if (line.heights) el["@_custom"] = formatHeights(line.heights);
  el.Coords = line.polygon ? attrs({ points: formatPoints(line.polygon) }) : {};
  if (line.baseline) el.Baseline = attrs({ points: formatPoints(line.baseline) });
  if (line.transcription !== undefined) el.TextEquiv = writeTextEquiv(line.transcription);
  return el;
}

function writeRegion(region: Region): XmlObject {
  const el: XmlObject = attrs({ id: region.id });
  el.Coords = attrs({ points: formatPoints(region.polygon) });
  if (region.transcription !== undefined) el.TextEquiv = writeTextEquiv(region.transcription);
  el.TextLine = region.lines.map(writeLine);
  return el;
}

export function encodePage(page: Page): string {
  const pageEl: XmlObject = attrs({
    imageFilename: page.id,
    imageWidth: page.size.width,
    imageHeight: page.size.height,
  });
  pageEl.TextRegion = page.regions.map(writeRegion);
  return buildXml({ PcGts: { ...attrs({ xmlns: PAGE_NAMESPACE }), Page: pageEl } }, '<?xml version="1.0" encoding="UTF-8"?>');
}
