export { Cursor, LineTable } from './cursor.js';
export type {
  BlockEnd,
  BlockKind,
  BlockSpan,
  DelimitedBlockKind,
  OpenBlock,
  ResolvedBlock,
  TransformStats,
} from './model.js';
export { classifyLine, isQuartoColonOpening } from './classify.js';
export type { BlockOpening } from './classify.js';
export { findBlockEnd, isClosingFence } from './match.js';
export { admonitionHeader, renderBlock, renderRange } from './render.js';
export { normalizeColonFence, transform, transformLines } from './transform.js';
export type { TransformResult } from './transform.js';
export { convertMarkdown, joinDocument, splitDocument } from './document.js';
export type { ConvertMarkdownResult } from './document.js';
export { checkMarkdown } from './validate.js';
export type { CheckMarkdownResult } from './validate.js';
export { checkFile, convertFile } from './api.js';
export type { ConvertFileOptions, ConvertFileResult } from './api.js';
export { convertNav, navEntrySchema } from './nav.js';
export type { NavEntry } from './nav.js';
export { TransformError, toDiagnostic } from './errors.js';
export type { Diagnostic, TransformErrorCode, TransformErrorDetails } from './errors.js';
