// Alignment columns per frame; the crop grid has roughly this many columns per frame.
export const COLUMNS_PER_FRAME = 4;

export interface ColumnSpan {
  start: number;
  end: number;
}

export interface WordSpan {
  text: string;
  hpos: number; // alignment column
  width: number;
  gap?: ColumnSpan; // whitespace after the word; every word but the last has one
}

interface Token {
  text: string;
  // Alphabet symbols among the whitespace that follows, up to the next word.
  separators: number;
}

function tokenize(transcription: string, symbols: ReadonlySet<string>): { leading: number; tokens: Token[] } {
  const count = (s: string) => [...s].filter((c) => symbols.has(c)).length;
  const matches = [...transcription.matchAll(/\S+/g)];
  const starts = matches.map((m) => m.index ?? 0);
  const tokens = matches.map((m, i): Token => {
    const after = starts[i] + m[0].length;
    const next = i + 1 < matches.length ? starts[i + 1] : after;
    return { text: m[0], separators: count(transcription.slice(after, next)) };
  });
  const leading = matches.length ? count(transcription.slice(0, starts[0])) : 0;
  return { leading, tokens };
}

/**
 * Assigns alignment columns to every whitespace-separated word of `transcription`
 * and to the gap after it, from a narrowed alignment path.
 *
 * For each word the whole path is scanned from frame 0, counting non-blank frames.
 * A word starts at the first non-blank frame once the letters of earlier words are
 * consumed and ends at the frame of its last letter. Whitespace that is part of the
 * alphabet occupies labels and is consumed with the word before it.
 *
 * When the path runs out before the next word starts, the current word becomes the
 * last one: its gap is empty and all remaining words get zero width at the line end.
 */
export function walkWordBoundaries(transcription: string, path: readonly number[], alphabet: readonly string[]): WordSpan[] {
  const blank = alphabet.length;
  const lineEnd = COLUMNS_PER_FRAME * path.length;
  const { leading, tokens } = tokenize(transcription, new Set(alphabet));
  const spans: WordSpan[] = [];

  let consumed = leading;
  let exhausted = false;
  tokens.forEach((token, w) => {
    if (exhausted) {
      spans.push({ text: token.text, hpos: lineEnd, width: 0 });
      return;
    }
    const length = [...token.text].length;
    const isLast = w === tokens.length - 1;
    const nextStart = consumed + length + token.separators;

    let seen = 0;
    let hpos: number | undefined;
    let end: number | undefined;
    let gapEnd: number | undefined;
    for (let a = 0; a < path.length; a++) {
      if (path[a] === blank) continue;
      if (end === undefined) {
        if (hpos === undefined && seen === consumed) hpos = COLUMNS_PER_FRAME * a;
        if (hpos !== undefined && seen + 1 - consumed === length) {
          end = COLUMNS_PER_FRAME * a;
          if (isLast) break;
        }
      } else if (seen === nextStart) {
        gapEnd = COLUMNS_PER_FRAME * a;
        break;
      }
      seen++;
    }

    if (hpos === undefined) {
      exhausted = true;
      spans.push({ text: token.text, hpos: lineEnd, width: 0 });
      return;
    }
    const wordEnd = end ?? lineEnd;
    const span: WordSpan = { text: token.text, hpos, width: wordEnd - hpos };
    if (!isLast) {
      if (gapEnd === undefined) exhausted = true;
      span.gap = { start: wordEnd, end: gapEnd ?? wordEnd };
    }
    spans.push(span);
    consumed = nextStart;
  });
  return spans;
}
