import { SparseMatrix } from "./sparse";
import { MissingPrerequisiteError } from "../errors";
import type { TextLine } from "../types";

export const DEFAULT_MISSING_LOGIT = -80;

export interface LineLogits {
  matrix: SparseMatrix;
  alphabet: string[]; // column i ↔ alphabet[i]; column alphabet.length is the blank
}

type LineRef = Pick<TextLine, "id">;

/** Row-wise x - logsumexp(x). */
export function logSoftmax(rows: number[][]): number[][] {
  return rows.map((row) => {
    let max = -Infinity;
    for (const v of row) if (v > max) max = v;
    if (max === -Infinity) return row.slice();
    let sum = 0;
    for (const v of row) sum += Math.exp(v - max);
    const lse = max + Math.log(sum);
    return row.map((v) => v - lse);
  });
}

/**
 * Per-line logits side table keyed by line id. Lines themselves stay plain values;
 * everything attached after parsing lives here.
 */
export class LogitsStore {
  private readonly entries = new Map<string, LineLogits>();

  attach(line: LineRef, matrix: SparseMatrix, alphabet: string[]): void {
    this.entries.set(line.id, { matrix, alphabet: alphabet.slice() });
  }

  get(line: LineRef): LineLogits | undefined {
    return this.entries.get(line.id);
  }

  has(line: LineRef): boolean {
    return this.entries.has(line.id);
  }

  delete(line: LineRef): boolean {
    return this.entries.delete(line.id);
  }

  get size(): number {
    return this.entries.size;
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  dense(line: LineRef, missingValue = DEFAULT_MISSING_LOGIT): number[][] {
    return this.require(line).matrix.toDense(missingValue);
  }

  logProbabilities(line: LineRef, missingValue = DEFAULT_MISSING_LOGIT): number[][] {
    return logSoftmax(this.dense(line, missingValue));
  }

  private require(line: LineRef): LineLogits {
    const entry = this.entries.get(line.id);
    if (!entry) throw new MissingPrerequisiteError(line.id, "logits");
    return entry;
  }
}
