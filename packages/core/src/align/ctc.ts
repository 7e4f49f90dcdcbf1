/**
 * Produces one label per frame for a known label sequence. `negLogProbs` is
 * frames × classes with the blank class at index `blank`.
 */
export interface ForceAligner {
  align(negLogProbs: number[][], labels: number[], blank: number): number[];
}

/** Viterbi alignment over the blank-interleaved label sequence (CTC topology). */
export class CtcForceAligner implements ForceAligner {
  align(negLogProbs: number[][], labels: number[], blank: number): number[] {
    const frames = negLogProbs.length;
    if (!frames) return [];
    const states = [blank];
    for (const l of labels) states.push(l, blank);
    const S = states.length;

    const cost: Float64Array[] = [];
    const back: Int32Array[] = [];
    const first = new Float64Array(S).fill(Infinity);
    first[0] = negLogProbs[0][states[0]];
    if (S > 1) first[1] = negLogProbs[0][states[1]];
    cost.push(first);
    back.push(new Int32Array(S).fill(-1));

    for (let t = 1; t < frames; t++) {
      const prev = cost[t - 1];
      const cur = new Float64Array(S).fill(Infinity);
      const from = new Int32Array(S).fill(-1);
      for (let s = 0; s < S; s++) {
        let best = prev[s];
        let arg = s;
        if (s > 0 && prev[s - 1] < best) { best = prev[s - 1]; arg = s - 1; }
        if (s > 1 && states[s] !== blank && states[s] !== states[s - 2] && prev[s - 2] < best) {
          best = prev[s - 2];
          arg = s - 2;
        }
        if (best === Infinity) continue;
        cur[s] = best + negLogProbs[t][states[s]];
        from[s] = arg;
      }
      cost.push(cur);
      back.push(from);
    }

    const last = cost[frames - 1];
    let state = S - 1;
    if (S > 1 && last[S - 2] < last[S - 1]) state = S - 2;
    if (last[state] === Infinity) {
      throw new RangeError(`Cannot align ${labels.length} labels in ${frames} frames`);
    }
    const path = new Array<number>(frames);
    for (let t = frames - 1; t >= 0; t--) {
      path[t] = states[state];
      state = back[t][state];
    }
    return path;
  }
}
