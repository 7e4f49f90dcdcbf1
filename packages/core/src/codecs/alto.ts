import { defaultCollaborators, reconstructLineWords, type Collaborators, type LineWords, type ReconstructOptions } from "../align/reconstruct";
import { MalformedDocumentError } from "../errors";
import { averageY, boundingBox, rectanglePolygon } from "../geometry";
import { getLogger, type Logger } from "../logger";
import type { LogitsStore } from "../logits/store";
import { assertUniqueIds, createLine, createPage, createRegion, lineCount } from "../model";
import type { Box, Page, Point, Provenance, Region, TextLine } from "../types";
import { attr, buildOrderedXml, descendants, element, numberAttr, parseXml, textNode, child, type OrderedNode, type XmlNode } from "./xml";

export const ALTO_NAMESPACE = "http://www.loc.gov/standards/alto/ns-v2#";
const XLINK_NAMESPACE = "http://www.w3.org/1999/xlink";
const XSI_NAMESPACE = "http://www.w3.org/2001/XMLSchema-instance";
const PAGE_ID_PREFIX = "id_";

export const DEFAULT_PROVENANCE: Provenance = {
  creator: "ocr-layout",
  name: "ocr-layout",
  version: "v0.1.0",
};

export interface AltoEncodeOptions extends ReconstructOptions {
  collaborators?: Collaborators;
  provenance?: Provenance;
  now?: Date;
  // Write lines whose reconstruction fails without String/SP children instead of throwing.
  skipFailedLines?: boolean;
  onLineError?: (line: TextLine, err: unknown) => void;
}

const REPEATED = ["Layout", "Page", "PrintSpace", "TextBlock", "TextLine", "String", "SP"];

const t = Math.trunc;

function boxAttrs(box: Box): Record<string, number> {
  return { HEIGHT: t(box.height), WIDTH: t(box.width), VPOS: t(box.vpos), HPOS: t(box.hpos) };
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

// Envelope of all region boxes; zero box when there are none.
function printSpace(regions: Region[]): Box {
  if (!regions.length) return { hpos: 0, vpos: 0, width: 0, height: 0 };
  const corners = regions.flatMap((r): Point[] => {
    const b = boundingBox(r.polygon);
    return [[b.hpos, b.vpos], [b.hpos + b.width, b.vpos + b.height]];
  });
  return boundingBox(corners);
}

function lineBox(line: TextLine): Box {
  if (line.polygon?.length) return boundingBox(line.polygon);
  if (line.baseline?.length) {
    const b = boundingBox(line.baseline);
    const [ascent, descent] = line.heights ?? [0, 0];
    return { hpos: b.hpos, vpos: b.vpos - ascent, width: b.width, height: b.height + ascent + descent };
  }
  return { hpos: 0, vpos: 0, width: 0, height: 0 };
}

function wordNodes(words: LineWords): OrderedNode[] {
  const nodes: OrderedNode[] = [];
  words.words.forEach((w, i) => {
    nodes.push(element("String", { CONTENT: w.content, ...boxAttrs(w) }));
    const gap = words.gaps[i];
    if (gap) nodes.push(element("SP", { WIDTH: t(gap.width), VPOS: t(gap.vpos), HPOS: t(gap.hpos) }));
  });
  return nodes;
}

function lineNode(line: TextLine, store: LogitsStore, opts: AltoEncodeOptions, collaborators: Collaborators, log: Logger): OrderedNode {
  const box = lineBox(line);
  const baseline = line.baseline?.length ? t(averageY(line.baseline)) : t(box.vpos + box.height);
  let kids: OrderedNode[] = [];
  try {
    kids = wordNodes(reconstructLineWords(line, store, collaborators, opts));
  } catch (err: unknown) {
    if (!opts.skipFailedLines) throw err;
    log.warn("alto.line_skipped", { line_id: line.id, error: err instanceof Error ? err.message : String(err) });
    opts.onLineError?.(line, err);
  }
  return element("TextLine", {
    ID: line.id,
    BASELINE: baseline,
    VPOS: t(box.vpos),
    HPOS: t(box.hpos),
    HEIGHT: t(box.height),
    WIDTH: t(box.width),
  }, kids);
}

function description(provenance: Provenance, now: Date): OrderedNode {
  return element("Description", {}, [
    element("MeasurementUnit", {}, [textNode("pixel")]),
    element("OCRProcessing", { ID: "IdOcr" }, [
      element("ocrProcessingStep", {}, [
        element("processingDateTime", {}, [textNode(isoDate(now))]),
        element("processingSoftware", {}, [
          element("softwareCreator", {}, [textNode(provenance.creator)]),
          element("softwareName", {}, [textNode(provenance.name)]),
          element("softwareVersion", {}, [textNode(provenance.version)]),
        ]),
      ]),
    ]),
  ]);
}

/**
 * Writes the page as ALTO. Each line with a transcription gets word and space boxes
 * reconstructed from its logits in `store`.
 */
export function encodeAlto(page: Page, store: LogitsStore, opts: AltoEncodeOptions = {}): string {
  const log = getLogger("core").child({ page_id: page.id });
  const collaborators = opts.collaborators ?? defaultCollaborators();
  const { height: H, width: W } = page.size;
  const ps = printSpace(page.regions);

  const blocks = page.regions.map((region) => {
    const lines = region.lines
      .filter((line) => !!line.transcription)
      .map((line) => lineNode(line, store, opts, collaborators, log));
    return element("TextBlock", { ID: region.id, ...boxAttrs(boundingBox(region.polygon)) }, lines);
  });

  const pageEl = element("Page", { ID: PAGE_ID_PREFIX + page.id, PHYSICAL_IMG_NR: 1, HEIGHT: H, WIDTH: W }, [
    element("TopMargin", boxAttrs({ hpos: 0, vpos: 0, width: W, height: ps.vpos })),
    element("LeftMargin", boxAttrs({ hpos: 0, vpos: 0, width: ps.hpos, height: H })),
    element("RightMargin", boxAttrs({ hpos: ps.hpos + ps.width, vpos: 0, width: W - (ps.hpos + ps.width), height: H })),
    element("BottomMargin", boxAttrs({ hpos: 0, vpos: ps.vpos + ps.height, width: W, height: H - (ps.vpos + ps.height) })),
    element("PrintSpace", boxAttrs(ps), blocks),
  ]);

  const root = element("alto", {
    "xmlns": ALTO_NAMESPACE,
    "xmlns:xlink": XLINK_NAMESPACE,
    "xmlns:xsi": XSI_NAMESPACE,
  }, [
    description(opts.provenance ?? DEFAULT_PROVENANCE, opts.now ?? new Date()),
    element("Layout", {}, [pageEl]),
  ]);

  log.debug("alto.encoded", { regions: page.regions.length, lines: lineCount(page) });
  return buildOrderedXml([root], '<?xml version="1.0" encoding="utf-8" standalone="yes"?>');
}

function readLine(el: XmlNode, blockId: string, index: number): TextLine {
  const id = attr(el, "ID") ?? `${blockId}_l${index}`;
  const where = `TextLine ${id}`;
  const hpos = numberAttr(el, "HPOS", where);
  const vpos = numberAttr(el, "VPOS", where);
  const width = numberAttr(el, "WIDTH", where);
  const height = numberAttr(el, "HEIGHT", where);
  const base = numberAttr(el, "BASELINE", where);
  const words = descendants(el, "String").map((s) => attr(s, "CONTENT") ?? "");
  return createLine(id, {
    baseline: [[hpos, base], [hpos + width, base]],
    polygon: rectanglePolygon({ hpos, vpos, width, height }),
    heights: [base - vpos, vpos + height - base],
    transcription: words.join(" "),
  });
}

function readBlock(el: XmlNode): Region {
  const id = attr(el, "ID");
  if (id === undefined) throw new MalformedDocumentError("TextBlock: missing attribute ID");
  const where = `TextBlock ${id}`;
  const polygon = rectanglePolygon({
    hpos: numberAttr(el, "HPOS", where),
    vpos: numberAttr(el, "VPOS", where),
    width: numberAttr(el, "WIDTH", where),
    height: numberAttr(el, "HEIGHT", where),
  });
  const lines = descendants(el, "TextLine").map((line, i) => readLine(line, id, i));
  return createRegion(id, polygon, lines);
}

/**
 * Parses an ALTO document. Regions and lines come back as rectangles and word
 * geometry is folded into each line's transcription.
 */
export function decodeAlto(xml: string): Page {
  const doc = parseXml(xml, REPEATED);
  const root = child(doc, "alto");
  const layout = root ? child(root, "Layout") : undefined;
  const pageEl = layout ? child(layout, "Page") : undefined;
  if (!pageEl) throw new MalformedDocumentError("ALTO document has no Layout/Page element");

  const rawId = attr(pageEl, "ID");
  if (rawId === undefined) throw new MalformedDocumentError("Page: missing attribute ID");
  const page = createPage(rawId.startsWith(PAGE_ID_PREFIX) ? rawId.slice(PAGE_ID_PREFIX.length) : rawId, {
    height: t(numberAttr(pageEl, "HEIGHT", "Page")),
    width: t(numberAttr(pageEl, "WIDTH", "Page")),
  });
  const space = child(pageEl, "PrintSpace");
  if (space) page.regions = descendants(space, "TextBlock").map(readBlock);
  assertUniqueIds(page);

  getLogger("core").child({ page_id: page.id }).debug("alto.decoded", { regions: page.regions.length, lines: lineCount(page) });
  return page;
}
