import { polylineLength } from "../geometry";
import type { CoordinateGrid, Heights, Point, Polyline } from "../types";

/**
 * Produces the pixel grid of a curved line crop: `targetHeight` rows from ascent
 * above the baseline to descent below it, one column per sampling step along the
 * baseline.
 */
export interface LineCropper {
  cropCoordinates(baseline: Polyline, heights: Heights, targetHeight: number): CoordinateGrid;
}

interface Sample {
  at: Point;
  tangent: Point;
}

function sampleAt(baseline: Polyline, distance: number): Sample {
  let walked = 0;
  for (let i = 1; i < baseline.length; i++) {
    const [x0, y0] = baseline[i - 1];
    const [x1, y1] = baseline[i];
    const len = Math.hypot(x1 - x0, y1 - y0);
    if (len === 0) continue;
    const isLast = i === baseline.length - 1;
    if (distance <= walked + len || isLast) {
      const d = distance - walked;
      const tangent: Point = [(x1 - x0) / len, (y1 - y0) / len];
      return { at: [x0 + ((x1 - x0) * d) / len, y0 + ((y1 - y0) * d) / len], tangent };
    }
    walked += len;
  }
  return { at: baseline[0], tangent: [1, 0] };
}

/** Straight-segment sampling of the baseline polyline with per-segment normals. */
export class BaselineCropper implements LineCropper {
  cropCoordinates(baseline: Polyline, [ascent, descent]: Heights, targetHeight: number): CoordinateGrid {
    const rows = Math.max(1, Math.round(targetHeight));
    const total = ascent + descent;
    const step = total > 0 ? total / rows : 1;
    const cols = Math.max(1, Math.round(polylineLength(baseline) / step));

    const grid: CoordinateGrid = Array.from({ length: rows }, () => new Array<Point>(cols));
    for (let c = 0; c < cols; c++) {
      const { at, tangent } = sampleAt(baseline, c * step);
      // Upwards normal for a left-to-right baseline in image coordinates.
      const nx = tangent[1];
      const ny = -tangent[0];
      for (let r = 0; r < rows; r++) {
        const offset = ascent - (r + 0.5) * step;
        grid[r][c] = [at[0] + nx * offset, at[1] + ny * offset];
      }
    }
    return grid;
  }
}
