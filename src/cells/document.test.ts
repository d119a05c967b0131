import { describe, expect, it } from 'vitest';
import { convertMarkdown, joinDocument, splitDocument } from './document.js';

describe('splitDocument', () => {
  it('drops the empty element after a final newline', () => {
    expect(splitDocument('a\nb\n')).toEqual({ lines: ['a', 'b'], trailingNewline: true });
  });

  it('accepts CRLF line endings', () => {
    expect(splitDocument('a\r\nb')).toEqual({ lines: ['a', 'b'], trailingNewline: false });
  });

  it('round-trips through joinDocument', () => {
    const { lines, trailingNewline } = splitDocument('x\n\ny\n');
    expect(joinDocument(lines, trailingNewline)).toBe('x\n\ny\n');
  });
});

describe('convertMarkdown', () => {
  it('converts a document and keeps its trailing newline', () => {
    const input = [
      'Intro',
      '',
      ':::: {.cell execution_count="1"}',
      '``` {.python .cell-code}',
      '1 / 0',
      '```',
      '',
      '::: {.cell-output .cell-output-error}',
      '    ZeroDivisionError: division by zero',
      ':::',
      '::::',
      '',
    ].join('\n');

    const result = convertMarkdown(input);
    expect(result.markdown).toBe(
      [
        'Intro',
        '',
        '```python',
        '1 / 0',
        '```',
        '',
        '???+ danger "error"',
        '',
        '        ZeroDivisionError: division by zero',
        '',
        '',
      ].join('\n')
    );
    expect(result.stats).toEqual({ cells: 1, codeBlocks: 1, outputs: 1, normalizedFences: 0 });
  });

  it('returns text without cells unchanged', () => {
    expect(convertMarkdown('# Title\n\nSome *text*.\n').markdown).toBe('# Title\n\nSome *text*.\n');
  });
});
