import { describe, test, expect } from 'vitest';
import { SparseMatrix } from '../logits/sparse';
import { LogitsStore, logSoftmax } from '../logits/store';
import { MissingPrerequisiteError } from '../errors';

// ─── SparseMatrix ────────────────────────────────────────────

describe('SparseMatrix', () => {
  test('fromDense stores only non-zero entries', () => {
    const m = SparseMatrix.fromDense([[0, 1.5, 0], [-2, 0, 0]]);
    expect(m.rows).toBe(2);
    expect(m.cols).toBe(3);
    expect(m.nnz).toBe(2);
    expect(Array.from(m.indptr)).toEqual([0, 1, 2]);
    expect(Array.from(m.indices)).toEqual([1, 0]);
    expect(m.get(1, 0)).toBe(-2);
    expect(m.get(1, 2)).toBe(0);
  });

  test('toDense fills zeros', () => {
    const m = SparseMatrix.fromDense([[0, 1.5], [-2, 0]]);
    expect(m.toDense(-80)).toEqual([[-80, 1.5], [-2, -80]]);
  });

  test('stored zeros decode like missing ones', () => {
    const m = new SparseMatrix(1, 2, Int32Array.from([0, 1]), Int32Array.from([0]), Float64Array.from([0]));
    expect(m.toDense(-7)).toEqual([[-7, -7]]);
  });

  test('rejects ragged input and bad indices', () => {
    expect(() => SparseMatrix.fromDense([[1, 2], [3]])).toThrow(RangeError);
    expect(() => new SparseMatrix(1, 2, Int32Array.from([0, 1]), Int32Array.from([5]), Float64Array.from([1]))).toThrow(RangeError);
  });
});

// ─── logSoftmax ──────────────────────────────────────────────

describe('logSoftmax', () => {
  test('rows sum to one in the probability domain', () => {
    const [row] = logSoftmax([[1, 2, 3]]);
    const total = row.reduce((acc, v) => acc + Math.exp(v), 0);
    expect(total).toBeCloseTo(1, 12);
  });

  test('uniform row gives log(1/n)', () => {
    const [row] = logSoftmax([[5, 5, 5, 5]]);
    row.forEach((v) => expect(v).toBeCloseTo(Math.log(0.25), 12));
  });

  test('stable for very negative inputs', () => {
    const [row] = logSoftmax([[-1000, -1000]]);
    expect(row[0]).toBeCloseTo(Math.log(0.5), 12);
    expect(row[1]).toBeCloseTo(Math.log(0.5), 12);
  });
});

// ─── LogitsStore ─────────────────────────────────────────────

describe('LogitsStore', () => {
  const line = { id: 'l1' };

  test('attach keeps a copy of the alphabet', () => {
    const store = new LogitsStore();
    const alphabet = ['a', 'b'];
    store.attach(line, SparseMatrix.fromDense([[1, 0, 0]]), alphabet);
    alphabet.push('c');
    expect(store.get(line)?.alphabet).toEqual(['a', 'b']);
    expect(store.has(line)).toBe(true);
    expect(store.size).toBe(1);
  });

  test('dense substitutes the missing value, default -80', () => {
    const store = new LogitsStore();
    store.attach(line, SparseMatrix.fromDense([[-1, 0], [0, -3]]), ['a']);
    expect(store.dense(line)).toEqual([[-1, -80], [-80, -3]]);
    expect(store.dense(line, -10)).toEqual([[-1, -10], [-10, -3]]);
  });

  test('logProbabilities normalizes the dense rows', () => {
    const store = new LogitsStore();
    store.attach(line, SparseMatrix.fromDense([[2, 0]]), ['a']);
    const [row] = store.logProbabilities(line);
    expect(Math.exp(row[0]) + Math.exp(row[1])).toBeCloseTo(1, 12);
    expect(row[0]).toBeGreaterThan(row[1]);
  });

  test('lines without logits fail with MissingPrerequisiteError', () => {
    const store = new LogitsStore();
    expect(() => store.dense({ id: 'nope' })).toThrow(MissingPrerequisiteError);
  });

  test('delete removes the entry', () => {
    const store = new LogitsStore();
    store.attach(line, SparseMatrix.fromDense([[1]]), []);
    expect(store.delete(line)).toBe(true);
    expect(store.ids()).toEqual([]);
  });
});
