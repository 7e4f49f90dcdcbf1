export * from "./types";
export * from "./errors";
export * from "./geometry";
export * from "./model";
export { getLogger } from "./logger";
export type { Logger } from "./logger";

export { SparseMatrix } from "./logits/sparse";
export { LogitsStore, logSoftmax, DEFAULT_MISSING_LOGIT } from "./logits/store";
export type { LineLogits } from "./logits/store";
export { saveSnapshot, loadSnapshot, LINE_CHARACTERS_KEY } from "./logits/snapshot";

export { decodePage, encodePage, PAGE_NAMESPACE } from "./codecs/page";
export { decodeAlto, encodeAlto, ALTO_NAMESPACE, DEFAULT_PROVENANCE } from "./codecs/alto";
export type { AltoEncodeOptions } from "./codecs/alto";
export { parseHeights, formatHeights } from "./codecs/heights";

export { narrowLabels, mostConfidentFrame } from "./align/narrow";
export type { NarrowOptions } from "./align/narrow";
export { walkWordBoundaries, COLUMNS_PER_FRAME } from "./align/boundaries";
export type { WordSpan, ColumnSpan } from "./align/boundaries";
export { projectColumns } from "./align/projection";
export { reconstructLineWords, defaultCollaborators } from "./align/reconstruct";
export type { WordBox, LineWords, Collaborators, ReconstructOptions } from "./align/reconstruct";
export { CtcForceAligner } from "./align/ctc";
export type { ForceAligner } from "./align/ctc";
export { BaselineCropper } from "./crop/baseline";
export type { LineCropper } from "./crop/baseline";
