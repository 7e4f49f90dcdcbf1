/**
 * Compressed sparse row matrix. Zeros are not stored; a stored zero is allowed but
 * decodes the same as a structural one.
 */
export class SparseMatrix {
  readonly rows: number;
  readonly cols: number;
  readonly indptr: Int32Array; // rows + 1 offsets into indices/data
  readonly indices: Int32Array;
  readonly data: Float64Array;

  constructor(rows: number, cols: number, indptr: Int32Array, indices: Int32Array, data: Float64Array) {
    if (indptr.length !== rows + 1) throw new RangeError(`indptr length ${indptr.length} does not match ${rows} rows`);
    if (indices.length !== data.length) throw new RangeError("indices and data differ in length");
    if (indptr[rows] !== data.length) throw new RangeError("indptr does not cover data");
    for (let i = 0; i < indices.length; i++) {
      if (indices[i] < 0 || indices[i] >= cols) throw new RangeError(`column index ${indices[i]} out of range`);
    }
    this.rows = rows;
    this.cols = cols;
    this.indptr = indptr;
    this.indices = indices;
    this.data = data;
  }

  static fromDense(dense: number[][], cols = dense[0]?.length ?? 0): SparseMatrix {
    const indptr = new Int32Array(dense.length + 1);
    const indices: number[] = [];
    const data: number[] = [];
    dense.forEach((row, r) => {
      if (row.length !== cols) throw new RangeError(`row ${r} has ${row.length} columns, expected ${cols}`);
      row.forEach((v, c) => {
        if (v !== 0) {
          indices.push(c);
          data.push(v);
        }
      });
      indptr[r + 1] = data.length;
    });
    return new SparseMatrix(dense.length, cols, indptr, Int32Array.from(indices), Float64Array.from(data));
  }

  get nnz(): number {
    return this.data.length;
  }

  get(r: number, c: number): number {
    for (let k = this.indptr[r]; k < this.indptr[r + 1]; k++) {
      if (this.indices[k] === c) return this.data[k];
    }
    return 0;
  }

  /** Dense copy; every zero entry (stored or not) becomes `fill`. */
  toDense(fill = 0): number[][] {
    const out: number[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row = new Array<number>(this.cols).fill(fill);
      for (let k = this.indptr[r]; k < this.indptr[r + 1]; k++) {
        const v = this.data[k];
        row[this.indices[k]] = v === 0 ? fill : v;
      }
      out.push(row);
    }
    return out;
  }
}
