import { MalformedDocumentError } from "./errors";
import type { Box, Point, Polyline } from "./types";

export function boundingBox(points: Polyline): Box {
  if (!points.length) return { hpos: 0, vpos: 0, width: 0, height: 0 };
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const [x, y] of points) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  return { hpos: minX, vpos: minY, width: maxX - minX, height: maxY - minY };
}

// Clockwise from the top-left corner.
export function rectanglePolygon(box: Box): Polyline {
  const right = box.hpos + box.width;
  const bottom = box.vpos + box.height;
  return [
    [box.hpos, box.vpos],
    [right, box.vpos],
    [right, bottom],
    [box.hpos, bottom],
  ];
}

export function averageY(points: Polyline): number {
  if (!points.length) return 0;
  return points.reduce((acc, [, y]) => acc + y, 0) / points.length;
}

export function polylineLength(points: Polyline): number {
  let total = 0;
  for (let i = 1; i < points.length; i++) {
    total += Math.hypot(points[i][0] - points[i - 1][0], points[i][1] - points[i - 1][1]);
  }
  return total;
}

export function truncPoint([x, y]: Point): Point {
  return [Math.trunc(x), Math.trunc(y)];
}

// Ties go to the even neighbour: 2.5 -> 2, 3.5 -> 4.
export function roundHalfEven(v: number): number {
  const f = Math.floor(v);
  const diff = v - f;
  if (diff > 0.5) return f + 1;
  if (diff < 0.5) return f;
  return f % 2 === 0 ? f : f + 1;
}

/** Parses "x,y x,y ..." rounding every coordinate to an integer, ties to even. */
export function parsePoints(value: string): Polyline {
  const trimmed = value.trim();
  if (!trimmed) return [];
  return trimmed.split(/\s+/).map((pair) => {
    const parts = pair.split(",");
    const x = Number(parts[0]);
    const y = Number(parts[1]);
    if (parts.length !== 2 || parts[0] === "" || parts[1] === "" || !Number.isFinite(x) || !Number.isFinite(y)) {
      throw new MalformedDocumentError(`Unparseable point "${pair}"`);
    }
    return [roundHalfEven(x), roundHalfEven(y)];
  });
}

export function formatPoints(points: Polyline): string {
  return points.map((p) => truncPoint(p).join(",")).join(" ");
}
