import { COLUMNS_PER_FRAME } from "./boundaries";
import type { Box, CoordinateGrid } from "../types";

function gridWidth(grid: CoordinateGrid): number {
  return grid[0]?.length ?? 0;
}

/**
 * Maps the alignment columns [start, start + width) of a line with `frames` frames
 * onto the crop grid and returns the pixel box covering every row of those columns.
 * Empty column ranges give a zero-area box at the start column.
 */
export function projectColumns(grid: CoordinateGrid, start: number, width: number, frames: number): Box {
  const cols = gridWidth(grid);
  const scale = frames > 0 ? cols / (COLUMNS_PER_FRAME * frames) : 0;
  const from = Math.floor(start * scale);
  const to = from + Math.floor(width * scale);
  const lo = Math.max(0, from);
  const hi = Math.min(cols, to);

  if (lo >= hi) {
    const anchor = grid[0]?.[Math.min(Math.max(from, 0), cols - 1)];
    if (!anchor) return { hpos: 0, vpos: 0, width: 0, height: 0 };
    return { hpos: Math.trunc(anchor[0]), vpos: Math.trunc(anchor[1]), width: 0, height: 0 };
  }

  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const row of grid) {
    for (let c = lo; c < hi; c++) {
      const [x, y] = row[c];
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }
  return {
    hpos: Math.trunc(minX),
    vpos: Math.trunc(minY),
    width: Math.trunc(maxX - minX),
    height: Math.trunc(maxY - minY),
  };
}
