import {
  CELL_ELEMENT_ALT_OPEN_RE,
  CELL_ELEMENT_OPEN_RE,
  CELL_OPEN_RE,
  CODE_BLOCK_OPEN_RE,
} from './constants.js';
import type { Cursor, LineTable } from './cursor.js';
import type { DelimitedBlockKind, OpenBlock } from './model.js';
import { UNRESOLVED_END } from './model.js';
import { createLogger } from '../logger.js';

const log = createLogger('classify');

export interface BlockOpening {
  kind: DelimitedBlockKind;
  delimiter: string;
  attributes: string[];
}

/**
 * Classify a line as a block opening.
 *
 * Patterns are tried in priority order (cell, cell element, bare display
 * element, code block); the first match wins. Returns `undefined` for
 * anything else, which callers pass through as plain text.
 */
export function classifyLine(line: string): BlockOpening | undefined {
  const cell = line.match(CELL_OPEN_RE);
  if (cell) {
    const attributes = line.slice((cell[1] ?? '').length).trim();
    return { kind: 'cell', delimiter: cell[1] ?? '', attributes: [attributes] };
  }

  const element = line.match(CELL_ELEMENT_OPEN_RE);
  if (element) {
    const attributes = [element[2], element[3], element[4]]
      .filter((group): group is string => group !== undefined)
      .map((group) => group.trim());
    return { kind: 'cellElement', delimiter: element[1] ?? '', attributes };
  }

  const alternate = line.match(CELL_ELEMENT_ALT_OPEN_RE);
  if (alternate) {
    return {
      kind: 'cellElementAlternate',
      delimiter: alternate[1] ?? '',
      attributes: [(alternate[2] ?? '').trim()],
    };
  }

  const code = line.match(CODE_BLOCK_OPEN_RE);
  if (code) {
    return { kind: 'codeBlock', delimiter: code[1] ?? '', attributes: [code[2] ?? ''] };
  }

  return undefined;
}

/**
 * True if `line` opens a colon-fenced Quarto block (cell or cell element).
 *
 * Code block openings are excluded: they never start with `:::`.
 */
export function isQuartoColonOpening(line: string): boolean {
  return (
    CELL_OPEN_RE.test(line) ||
    CELL_ELEMENT_OPEN_RE.test(line) ||
    CELL_ELEMENT_ALT_OPEN_RE.test(line)
  );
}

/**
 * Try to open a block at `cursor`.
 */
export function tryOpenBlock(table: LineTable, cursor: Cursor): OpenBlock | undefined {
  const line = table.lineAt(cursor);
  const opening = classifyLine(line);
  if (!opening) return undefined;

  log.debug(`line ${cursor.line}: ${opening.kind} ${JSON.stringify(opening.attributes)}`);
  return {
    kind: opening.kind,
    delimiter: opening.delimiter,
    attributes: opening.attributes,
    start: cursor.copy(),
    end: UNRESOLVED_END,
  };
}
