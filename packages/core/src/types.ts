export type Point = [number, number]; // [x, y] in pixels
export type Polyline = Point[];

/** [ascent, descent]: extent above and below the baseline, in pixels. */
export type Heights = [number, number];

export interface Box {
  hpos: number; // left
  vpos: number; // top
  width: number;
  height: number;
}

export interface PageSize {
  height: number;
  width: number;
}

export interface TextLine {
  id: string; // unique in the page; key of the logits side table
  baseline?: Polyline;
  polygon?: Polyline;
  heights?: Heights;
  // undefined: never annotated. '': annotated as blank.
  transcription?: string;
}

export interface Region {
  id: string;
  polygon: Polyline;
  transcription?: string;
  lines: TextLine[];
}

export interface Page {
  id: string; // source image name
  size: PageSize;
  regions: Region[]; // export order, not necessarily reading order
}

/** rows × cols grid of pixel positions along a curved line; one column per quarter frame. */
export type CoordinateGrid = Point[][];

export interface Provenance {
  creator: string;
  name: string;
  version: string;
}
