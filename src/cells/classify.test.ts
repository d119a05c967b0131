import { describe, expect, it } from 'vitest';
import { classifyLine, isQuartoColonOpening, tryOpenBlock } from './classify.js';
import { Cursor, LineTable } from './cursor.js';

describe('classifyLine', () => {
  it('recognizes a cell and keeps the fence width', () => {
    expect(classifyLine(':::::: {.cell execution_count="1"}')).toEqual({
      kind: 'cell',
      delimiter: '::::::',
      attributes: ['{.cell execution_count="1"}'],
    });
  });

  it('recognizes a cell output element', () => {
    expect(classifyLine('::: {.cell-output .cell-output-stdout}')).toEqual({
      kind: 'cellElement',
      delimiter: ':::',
      attributes: ['.cell-output', '.cell-output-stdout'],
    });
  });

  it('captures the execution count annotation of an element', () => {
    expect(classifyLine('::: {.cell-output .cell-output-display execution_count="2"}')).toEqual({
      kind: 'cellElement',
      delimiter: ':::',
      attributes: ['.cell-output', '.cell-output-display', 'execution_count="2"'],
    });
  });

  it('recognizes the bare display element spelling', () => {
    expect(classifyLine(':::::: cell-output-display')).toEqual({
      kind: 'cellElementAlternate',
      delimiter: '::::::',
      attributes: ['cell-output-display'],
    });
  });

  it('recognizes code blocks with and without extra classes', () => {
    expect(classifyLine('``` {.python .cell-code}')).toEqual({
      kind: 'codeBlock',
      delimiter: '```',
      attributes: ['python'],
    });
    expect(classifyLine('````{.r}')).toEqual({
      kind: 'codeBlock',
      delimiter: '````',
      attributes: ['r'],
    });
  });

  it('ignores look-alike syntax', () => {
    expect(classifyLine('::: foo.main.hello')).toBeUndefined();
    expect(classifyLine(':::')).toBeUndefined();
    expect(classifyLine('```python')).toBeUndefined();
    expect(classifyLine(':: {.cell x="1"}')).toBeUndefined();
    expect(classifyLine(' ::: {.cell x="1"}')).toBeUndefined();
    expect(classifyLine('::: {.callout-note}')).toBeUndefined();
  });
});

describe('isQuartoColonOpening', () => {
  it('accepts only colon-fenced cell syntax', () => {
    expect(isQuartoColonOpening(':::: {.cell x="1"}')).toBe(true);
    expect(isQuartoColonOpening('::: {.cell-output .cell-output-stderr}')).toBe(true);
    expect(isQuartoColonOpening('::: cell-output-display')).toBe(true);
    expect(isQuartoColonOpening('``` {.python .cell-code}')).toBe(false);
    expect(isQuartoColonOpening('::: pathlib.Path')).toBe(false);
  });
});

describe('tryOpenBlock', () => {
  it('opens an unresolved span at the cursor', () => {
    const table = new LineTable(['text', '``` {.python .cell-code}']);
    const span = tryOpenBlock(table, new Cursor(1, 0));
    expect(span?.kind).toBe('codeBlock');
    expect(span?.start.toString()).toBe('1:0');
    expect(span?.end).toEqual({ state: 'unresolved' });
    expect(tryOpenBlock(table, new Cursor(0, 0))).toBeUndefined();
  });
});
