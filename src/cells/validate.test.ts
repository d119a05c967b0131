import { describe, expect, it } from 'vitest';
import { toDiagnostic } from './errors.js';
import { checkMarkdown } from './validate.js';

describe('checkMarkdown', () => {
  it('warns when there is nothing to convert', () => {
    expect(checkMarkdown('plain text\n')).toEqual({
      errors: [],
      warnings: [{ severity: 'warning', code: 'NO_CELLS', message: 'No Quarto cells found in document.' }],
    });
  });

  it('warns about each narrowed fence', () => {
    const { errors, warnings } = checkMarkdown('::::: pathlib.Path\n');
    expect(errors).toEqual([]);
    expect(warnings.map((w) => [w.code, w.line])).toEqual([
      ['NORMALIZED_FENCE', 0],
      ['NO_CELLS', undefined],
    ]);
  });

  it('reports a conversion failure as an error diagnostic', () => {
    expect(checkMarkdown(':::: {.cell execution_count="1"}\nx\n')).toEqual({
      errors: [
        {
          severity: 'error',
          code: 'UNTERMINATED_BLOCK',
          message: 'Unterminated cell opened with "::::" at line 1',
          line: 0,
        },
      ],
      warnings: [],
    });
  });

  it('has nothing to say about a well-formed cell', () => {
    expect(checkMarkdown('::: {.cell-output .cell-output-stdout}\n    ok\n:::\n')).toEqual({
      errors: [],
      warnings: [],
    });
  });
});

describe('toDiagnostic', () => {
  it('rethrows errors that did not come from the transformer', () => {
    expect(() => toDiagnostic(new Error('boom'))).toThrow('boom');
  });
});
