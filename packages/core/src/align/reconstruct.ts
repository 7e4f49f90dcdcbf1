import { walkWordBoundaries } from "./boundaries";
import { CtcForceAligner, type ForceAligner } from "./ctc";
import { narrowLabels } from "./narrow";
import { projectColumns } from "./projection";
import { BaselineCropper, type LineCropper } from "../crop/baseline";
import { MissingPrerequisiteError } from "../errors";
import { getLogger } from "../logger";
import { DEFAULT_MISSING_LOGIT, type LogitsStore } from "../logits/store";
import type { Box, TextLine } from "../types";

export interface WordBox extends Box {
  content: string;
}

export interface LineWords {
  words: WordBox[];
  gaps: Box[]; // gaps[i] follows words[i]
}

export interface Collaborators {
  aligner: ForceAligner;
  cropper: LineCropper;
}

export interface ReconstructOptions {
  targetHeight?: number; // crop rows, default 16
  missingValue?: number;
}

export function defaultCollaborators(): Collaborators {
  return { aligner: new CtcForceAligner(), cropper: new BaselineCropper() };
}

function toLabels(line: TextLine, transcription: string, alphabet: readonly string[]): number[] {
  const index = new Map(alphabet.map((c, i) => [c, i] as const));
  const labels: number[] = [];
  for (const ch of transcription) {
    const idx = index.get(ch);
    if (idx !== undefined) labels.push(idx);
    else if (!/\s/.test(ch)) throw new MissingPrerequisiteError(line.id, "alphabet", `no symbol for "${ch}"`);
  }
  return labels;
}

/**
 * Word and gap pixel boxes for one line, from its logits, transcription and baseline.
 * Reads the line and the store; writes nothing back.
 */
export function reconstructLineWords(
  line: TextLine,
  store: LogitsStore,
  collaborators: Collaborators = defaultCollaborators(),
  opts: ReconstructOptions = {},
): LineWords {
  const entry = store.get(line);
  if (!entry) throw new MissingPrerequisiteError(line.id, "logits");
  const { matrix, alphabet } = entry;
  if (!alphabet.length) throw new MissingPrerequisiteError(line.id, "alphabet");
  if (matrix.cols !== alphabet.length + 1) {
    throw new MissingPrerequisiteError(line.id, "alphabet", `${matrix.cols} logit columns for ${alphabet.length} symbols`);
  }
  const { baseline, heights, transcription } = line;
  if (!baseline || !baseline.length) throw new MissingPrerequisiteError(line.id, "baseline");
  if (!heights) throw new MissingPrerequisiteError(line.id, "heights");
  if (transcription === undefined) throw new MissingPrerequisiteError(line.id, "transcription");
  if (!transcription.trim()) return { words: [], gaps: [] };

  const blank = alphabet.length;
  const labels = toLabels(line, transcription, alphabet);
  const negLogProbs = store.logProbabilities(line, opts.missingValue ?? DEFAULT_MISSING_LOGIT).map((row) => row.map((v) => -v));
  const path = collaborators.aligner.align(negLogProbs, labels, blank).slice();
  if (path.length !== matrix.rows) {
    throw new RangeError(`Aligner returned ${path.length} labels for ${matrix.rows} frames on line ${line.id}`);
  }
  narrowLabels(path, blank);

  const grid = collaborators.cropper.cropCoordinates(baseline, heights, opts.targetHeight ?? 16);
  const frames = path.length;
  const words: WordBox[] = [];
  const gaps: Box[] = [];
  for (const span of walkWordBoundaries(transcription, path, alphabet)) {
    words.push({ content: span.text, ...projectColumns(grid, span.hpos, span.width, frames) });
    if (span.gap) gaps.push(projectColumns(grid, span.gap.start, span.gap.end - span.gap.start, frames));
  }

  getLogger("core").child({ line_id: line.id }).debug("line.reconstructed", { frames, words: words.length });
  return { words, gaps };
}
