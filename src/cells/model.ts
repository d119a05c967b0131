import type { Cursor } from './cursor.js';

/**
 * Block model for rendered Quarto markdown.
 *
 * Notes:
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 * - A span's `end` is a tagged variant so a span cannot be rendered before its
 *   closing fence has been found.
 */
export type DelimitedBlockKind = 'cell' | 'cellElement' | 'cellElementAlternate' | 'codeBlock';

/** `html` is reserved: nothing classifies a line as raw HTML yet. */
export type BlockKind = DelimitedBlockKind | 'html';

export type BlockEnd =
  | { state: 'unresolved' }
  | {
      state: 'resolved';
      /** Column 0 of the closing fence line. */
      close: Cursor;
    };

export const UNRESOLVED_END: Extract<BlockEnd, { state: 'unresolved' }> = { state: 'unresolved' };

export interface BlockSpan<E extends BlockEnd = BlockEnd> {
  kind: BlockKind;
  /** Exact fence run (`::::`, ```` ``` ````); its width is significant. */
  delimiter: string;
  /**
   * Kind-dependent attributes: the language tag for code blocks, the output
   * class tokens for cell elements, the raw attribute group for cells.
   */
  attributes: string[];
  /** Column 0 of the opening fence line. */
  start: Cursor;
  end: E;
}

export type OpenBlock = BlockSpan<Extract<BlockEnd, { state: 'unresolved' }>>;
export type ResolvedBlock = BlockSpan<Extract<BlockEnd, { state: 'resolved' }>>;

/** Per-document counters reported alongside converted output. */
export interface TransformStats {
  cells: number;
  codeBlocks: number;
  outputs: number;
  normalizedFences: number;
}

export function emptyStats(): TransformStats {
  return { cells: 0, codeBlocks: 0, outputs: 0, normalizedFences: 0 };
}

export function resolveSpan(span: OpenBlock, close: Cursor): ResolvedBlock {
  return { ...span, end: { state: 'resolved', close } };
}

/** Human-readable kind label used in diagnostics. */
export function describeKind(kind: BlockKind): string {
  switch (kind) {
    case 'cell':
      return 'cell';
    case 'cellElement':
      return 'cell output element';
    case 'cellElementAlternate':
      return 'cell output element (bare display)';
    case 'codeBlock':
      return 'code block';
    case 'html':
      return 'raw HTML';
  }
}
