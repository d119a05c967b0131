import { describe, expect, it } from 'vitest';
import { Cursor, LineTable } from './cursor.js';
import { TransformError } from './errors.js';
import type { ResolvedBlock } from './model.js';
import { emptyStats } from './model.js';
import type { RenderScope } from './render.js';
import { admonitionHeader, isWrappedInDiv, renderBlock, renderRange, tryStartBlock } from './render.js';

function scopeFor(lines: string[]): RenderScope {
  return { table: new LineTable(lines), stats: emptyStats(), enclosing: [] };
}

function renderAt(lines: string[], line = 0): string[] {
  const scope = scopeFor(lines);
  const block = tryStartBlock(scope, new Cursor(line, 0), scope.table.end());
  if (!block) throw new Error(`no block opens at line ${line}`);
  return renderBlock(scope, block);
}

function elementBlock(attributes: string[]): ResolvedBlock {
  return {
    kind: 'cellElement',
    delimiter: ':::',
    attributes,
    start: new Cursor(4, 0),
    end: { state: 'resolved', close: new Cursor(6, 0) },
  };
}

describe('admonitionHeader', () => {
  it('maps each output class to its own admonition', () => {
    const headers = [
      admonitionHeader(elementBlock(['.cell-output', '.cell-output-stdout'])),
      admonitionHeader(elementBlock(['.cell-output', '.cell-output-stderr'])),
      admonitionHeader(elementBlock(['.cell-output', '.cell-output-error'])),
      admonitionHeader(elementBlock(['.cell-output', '.cell-output-display'])),
    ];
    expect(headers).toEqual([
      '???+ note "output"',
      '???+ warning "stderr"',
      '???+ danger "error"',
      '???+ note "Display"',
    ]);
    expect(new Set(headers).size).toBe(4);
  });

  it('fails on an output class it does not know', () => {
    expect(() => admonitionHeader(elementBlock(['.cell-output', '.cell-output-markdown']))).toThrow(
      'Could not map attributes [".cell-output",".cell-output-markdown"] to an admonition type (line 5)'
    );
  });
});

describe('renderBlock', () => {
  it('re-emits a code block with the language on the fence', () => {
    expect(renderAt(['``` {.python .cell-code}', 'x = 1', 'print(x)', '```'])).toEqual([
      '```python',
      'x = 1',
      'print(x)',
      '```',
    ]);
  });

  it('accepts a closing fence with one trailing space', () => {
    expect(renderAt(['```` {.r .cell-code}', 'x <- 1', '```` '])).toEqual(['````r', 'x <- 1', '````']);
  });

  it('turns an output element into an indented admonition', () => {
    expect(renderAt(['::: {.cell-output .cell-output-stdout}', '    hello', '', '    world', ':::'])).toEqual([
      '???+ note "output"',
      '',
      '        hello',
      '    ',
      '        world',
      '',
    ]);
  });

  it('renders the bare display spelling', () => {
    expect(renderAt([':::: cell-output-display', '![](figure.png)', '::::'])).toEqual([
      '???+ note',
      '',
      '    ![](figure.png)',
      '',
    ]);
  });

  it('drops the fences of a cell and keeps its rendered interior', () => {
    const scope = scopeFor([
      ':::: {.cell execution_count="1"}',
      '``` {.python .cell-code}',
      'print("hi")',
      '```',
      '',
      '::: {.cell-output .cell-output-stdout}',
      '    hi',
      ':::',
      '::::',
    ]);
    const block = tryStartBlock(scope, new Cursor(0, 0), scope.table.end());
    if (!block) throw new Error('expected a cell');
    expect(renderBlock(scope, block)).toEqual([
      '```python',
      'print("hi")',
      '```',
      '',
      '???+ note "output"',
      '',
      '        hi',
      '',
    ]);
    expect(scope.stats).toEqual({ cells: 1, codeBlocks: 1, outputs: 1, normalizedFences: 0 });
  });

  it('keeps a styled HTML table and flags it as markdown', () => {
    expect(
      renderAt([
        '::: {.cell-output .cell-output-display execution_count="4"}',
        '<div>',
        '<style scoped>',
        '    .dataframe tbody tr th {',
        '</style>',
        '<table class="dataframe">',
        '</table>',
        '</div>',
        ':::',
      ])
    ).toEqual([
      '???+ note "Display"',
      '',
      '    <div markdown="block">',
      '    <style scoped>',
      '        .dataframe tbody tr th {',
      '    </style>',
      '    <table class="dataframe">',
      '    </table>',
      '    </div>',
      '',
    ]);
  });

  it('does not scan raw HTML bodies for nested blocks', () => {
    expect(
      renderAt([':::: cell-output-display', '<div>', '``` {.python .cell-code}', '</div>', '::::'])
    ).toEqual(['???+ note', '', '    <div>', '    ``` {.python .cell-code}', '    </div>', '']);
  });

  it('fails when a rendered block still starts a line with :::', () => {
    const scope = scopeFor([':::: {.cell execution_count="1"}', 'text', '::: stray', '::::']);
    const block = tryStartBlock(scope, new Cursor(0, 0), scope.table.end());
    if (!block) throw new Error('expected a cell');
    let caught: unknown;
    try {
      renderBlock(scope, block);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TransformError);
    if (!(caught instanceof TransformError)) return;
    expect(caught.code).toBe('ESCAPED_FENCE');
    expect(caught.line).toBe(0);
    expect(caught.details.context).toEqual(['0: text', '1: ::: stray']);
  });

  it('rejects the reserved html kind', () => {
    const scope = scopeFor(['<span>', '</span>']);
    const block: ResolvedBlock = {
      kind: 'html',
      delimiter: '',
      attributes: [],
      start: new Cursor(0, 0),
      end: { state: 'resolved', close: new Cursor(1, 0) },
    };
    expect(() => renderBlock(scope, block)).toThrow('Rendering raw HTML blocks is not supported (line 1)');
  });
});

describe('renderRange', () => {
  it('keeps plain text around nested blocks in order', () => {
    const scope = scopeFor(['before', '``` {.bash .cell-code}', 'ls', '```', 'after']);
    expect(renderRange(scope, new Cursor(0, 0), scope.table.end())).toEqual([
      'before',
      '```bash',
      'ls',
      '```',
      'after',
    ]);
  });
});

describe('isWrappedInDiv', () => {
  it('looks at the first and last non-blank lines', () => {
    expect(isWrappedInDiv(['', '<div>', '<p>x</p>', '</div>', ''])).toBe(true);
    expect(isWrappedInDiv(['<div>', 'text'])).toBe(false);
    expect(isWrappedInDiv(['<div class="x">', '</div>'])).toBe(false);
    expect(isWrappedInDiv(['', ''])).toBe(false);
  });
});
