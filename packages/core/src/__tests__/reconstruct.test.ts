import { describe, test, expect, vi } from 'vitest';
import { reconstructLineWords, type Collaborators } from '../align/reconstruct';
import { SparseMatrix } from '../logits/sparse';
import { LogitsStore } from '../logits/store';
import { createLine } from '../model';
import { MissingPrerequisiteError, type Prerequisite } from '../errors';
import type { CoordinateGrid, Point, TextLine } from '../types';

function makeGrid(rows: number, cols: number): CoordinateGrid {
  return Array.from({ length: rows }, (_, r) =>
    Array.from({ length: cols }, (_, c): Point => [10 * c, 100 + 5 * r]));
}

function uniformLogits(frames: number, classes: number): SparseMatrix {
  return SparseMatrix.fromDense(Array.from({ length: frames }, () => new Array<number>(classes).fill(-1)));
}

function fakes(path: number[], grid: CoordinateGrid) {
  const align = vi.fn((_cost: number[][], _labels: number[], _blank: number) => path.slice());
  const cropCoordinates = vi.fn(() => grid);
  const collaborators: Collaborators = { aligner: { align }, cropper: { cropCoordinates } };
  return { align, cropCoordinates, collaborators };
}

function line(overrides: Partial<TextLine> = {}): TextLine {
  return createLine('l1', {
    baseline: [[0, 120], [320, 120]],
    heights: [20, 5],
    transcription: 'hi',
    ...overrides,
  });
}

describe('reconstructLineWords', () => {
  test('single word box from the narrowed path', () => {
    const store = new LogitsStore();
    store.attach({ id: 'l1' }, uniformLogits(8, 3), ['h', 'i']);
    const { align, cropCoordinates, collaborators } = fakes([0, 0, 2, 1, 2, 2, 2, 2], makeGrid(2, 32));

    const result = reconstructLineWords(line(), store, collaborators);

    // columns [0, 12) on a 32-column grid for 8 frames
    expect(result).toEqual({
      words: [{ content: 'hi', hpos: 0, vpos: 100, width: 110, height: 5 }],
      gaps: [],
    });
    expect(align).toHaveBeenCalledTimes(1);
    const [cost, labels, blank] = align.mock.calls[0];
    expect(labels).toEqual([0, 1]);
    expect(blank).toBe(2);
    expect(cost).toHaveLength(8);
    expect(cost[0][0]).toBeCloseTo(Math.log(3), 12);
    expect(cropCoordinates).toHaveBeenCalledWith([[0, 120], [320, 120]], [20, 5], 16);
  });

  test('words and gaps for a multi-word line', () => {
    const store = new LogitsStore();
    store.attach({ id: 'l1' }, uniformLogits(8, 4), ['h', 'i', ' ']);
    const { collaborators } = fakes([0, 3, 1, 3, 2, 3, 1, 0], makeGrid(2, 32));

    const result = reconstructLineWords(line({ transcription: 'hi ih' }), store, collaborators);

    expect(result.words).toEqual([
      { content: 'hi', hpos: 0, vpos: 100, width: 70, height: 5 },
      { content: 'ih', hpos: 240, vpos: 100, width: 30, height: 5 },
    ]);
    expect(result.gaps).toEqual([{ hpos: 80, vpos: 100, width: 150, height: 5 }]);
  });

  test('passes the crop height option through', () => {
    const store = new LogitsStore();
    store.attach({ id: 'l1' }, uniformLogits(8, 3), ['h', 'i']);
    const { cropCoordinates, collaborators } = fakes([0, 2, 2, 1, 2, 2, 2, 2], makeGrid(1, 32));
    reconstructLineWords(line(), store, collaborators, { targetHeight: 40 });
    expect(cropCoordinates).toHaveBeenCalledWith([[0, 120], [320, 120]], [20, 5], 40);
  });

  test('missing logits fail without touching the line', () => {
    const target = line();
    const before = structuredClone(target);
    const { collaborators } = fakes([], makeGrid(1, 1));
    let caught: unknown;
    try {
      reconstructLineWords(target, new LogitsStore(), collaborators);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(MissingPrerequisiteError);
    expect(caught instanceof MissingPrerequisiteError && caught.missing).toBe('logits');
    expect(target).toEqual(before);
  });

  const incomplete: Array<{ missing: Prerequisite; target: TextLine; alphabet: string[] }> = [
    { missing: 'alphabet', target: line(), alphabet: [] },
    { missing: 'baseline', target: line({ baseline: undefined }), alphabet: ['h', 'i'] },
    { missing: 'baseline', target: line({ baseline: [] }), alphabet: ['h', 'i'] },
    { missing: 'heights', target: line({ heights: undefined }), alphabet: ['h', 'i'] },
    { missing: 'transcription', target: line({ transcription: undefined }), alphabet: ['h', 'i'] },
  ];

  test.each(incomplete)('missing $missing is reported', ({ missing, target, alphabet }) => {
    const store = new LogitsStore();
    store.attach({ id: 'l1' }, uniformLogits(8, alphabet.length + 1), alphabet);
    const { collaborators } = fakes([0, 2, 2, 1, 2, 2, 2, 2], makeGrid(1, 32));
    let caught: unknown;
    try {
      reconstructLineWords(target, store, collaborators);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(MissingPrerequisiteError);
    expect(caught).toMatchObject({ missing, lineId: 'l1' });
  });

  test('characters outside the alphabet are reported', () => {
    const store = new LogitsStore();
    store.attach({ id: 'l1' }, uniformLogits(8, 3), ['h', 'i']);
    const { collaborators } = fakes([], makeGrid(1, 32));
    expect(() => reconstructLineWords(line({ transcription: 'hx' }), store, collaborators)).toThrow('no symbol for "x"');
  });

  test('logit columns must match the alphabet plus blank', () => {
    const store = new LogitsStore();
    store.attach({ id: 'l1' }, uniformLogits(8, 2), ['h', 'i']);
    const { collaborators } = fakes([], makeGrid(1, 32));
    expect(() => reconstructLineWords(line(), store, collaborators)).toThrow(MissingPrerequisiteError);
  });

  test('blank transcription yields no boxes', () => {
    const store = new LogitsStore();
    store.attach({ id: 'l1' }, uniformLogits(8, 3), ['h', 'i']);
    const { align, collaborators } = fakes([], makeGrid(1, 32));
    expect(reconstructLineWords(line({ transcription: '' }), store, collaborators)).toEqual({ words: [], gaps: [] });
    expect(align).not.toHaveBeenCalled();
  });

  test('identical inputs give identical boxes with the default collaborators', () => {
    const store = new LogitsStore();
    // h peaks at frame 1, i at frame 5
    const dense = Array.from({ length: 8 }, (_, f) => [f === 1 ? 5 : -5, f === 5 ? 5 : -5, 2]);
    store.attach({ id: 'l1' }, SparseMatrix.fromDense(dense), ['h', 'i']);
    const target = line({ baseline: [[0, 100], [64, 100]], heights: [8, 8] });
    const first = reconstructLineWords(target, store);
    const second = reconstructLineWords(target, store);
    expect(second).toEqual(first);
    expect(first.words).toHaveLength(1);
    expect(first.words[0].content).toBe('hi');
  });
});
