export type LayoutErrorCode = "MALFORMED_DOCUMENT" | "MISSING_PREREQUISITE" | "MISSING_LINE_DATA";

export class LayoutError extends Error {
  readonly code: LayoutErrorCode;

  constructor(code: LayoutErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Source document cannot be turned into a page model. Raised before anything is returned. */
export class MalformedDocumentError extends LayoutError {
  constructor(message: string) {
    super("MALFORMED_DOCUMENT", message);
  }
}

export type Prerequisite = "transcription" | "baseline" | "heights" | "logits" | "alphabet";

/** A line lacks something word reconstruction needs. Only that line is affected. */
export class MissingPrerequisiteError extends LayoutError {
  readonly lineId: string;
  readonly missing: Prerequisite;

  constructor(lineId: string, missing: Prerequisite, detail?: string) {
    super("MISSING_PREREQUISITE", `Line ${lineId}: missing ${missing}${detail ? ` (${detail})` : ""}.`);
    this.lineId = lineId;
    this.missing = missing;
  }
}

/** Logits snapshot has no entry for a line of the page. */
export class MissingLineDataError extends LayoutError {
  readonly lineId: string;

  constructor(lineId: string) {
    super("MISSING_LINE_DATA", `Missing line id ${lineId} in logits snapshot.`);
    this.lineId = lineId;
  }
}

export function isLayoutError(err: unknown): err is LayoutError {
  return err instanceof LayoutError;
}
