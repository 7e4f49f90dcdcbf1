export interface NarrowOptions {
  // Rewrite repeats to blank - 1 instead of blank.
  liberal?: boolean;
}

/**
 * Pins every character of a forced-alignment path to a single frame.
 *
 * Each maximal run of adjacent, identical, non-blank labels keeps its first frame; the
 * other frames of the run are rewritten to `blank`. Runs are found by adjacency only,
 * so the same label appearing again after another label starts a new run.
 *
 * Mutates and returns `path`.
 */
export function narrowLabels(path: number[], blank: number, opts: NarrowOptions = {}): number[] {
  const filler = opts.liberal ? blank - 1 : blank;
  let prev: number | undefined;
  for (let i = 0; i < path.length; i++) {
    const label = path[i];
    if (label !== blank && label === prev) path[i] = filler;
    prev = label;
  }
  return path;
}

/**
 * Picks the frame among `frames` where `label` scores highest in `logProbs`.
 * Returns -1 when no candidate scores above -100.
 *
 * Alternative to keeping the first frame of a run; not used by reconstruction.
 */
export function mostConfidentFrame(logProbs: number[][], frames: number[], label: number): number {
  let best = -100;
  let frame = -1;
  for (const f of frames) {
    const score = logProbs[f]?.[label];
    if (score !== undefined && score > best) {
      best = score;
      frame = f;
    }
  }
  return frame;
}
