/**
 * Quarto markdown output conventions.
 *
 * These patterns are defined by what `quarto render --to=markdown` emits and
 * are matched against whole lines, anchored at column 0.
 */

/** `:::: {.cell execution_count="1"}` or `:::::: {.cell layout-align="default"}` */
export const CELL_OPEN_RE = /^(:{3,}) \{\.cell .*\}\s*$/;

/** `::: {.cell-output .cell-output-stdout}`, optionally with `execution_count="N"` */
export const CELL_ELEMENT_OPEN_RE =
  /^(:{3,}) \{(\.cell-\w+)\s?(\.cell-[\w-]+)?( execution_count="\d+")?\}$/;

/** `::::: cell-output-display` */
export const CELL_ELEMENT_ALT_OPEN_RE = /^(:{3,})\s*(cell-output-display\s*)$/;

/** ```` ``` {.python .cell-code} ```` */
export const CODE_BLOCK_OPEN_RE = /^(`{3,})\s?\{\.(\w+)(?:\}|\s[^}]*\})/;

/**
 * A colon fence that is not Quarto cell syntax: a bare closing fence or a
 * mkdocstrings directive such as `::::: pathlib.Path`. Quarto wraps these in
 * extra colons when they sit inside nested divs.
 */
export const LOOSE_COLON_FENCE_RE = /^(:{3,})(\s+(?!\{).*)?$/;

export const COLON_FENCE_MARKER = ':::';
export const NORMALIZED_COLON_FENCE = ':::';

/** Admonition body indentation. */
export const INDENT_UNIT = '    ';

/** Deepest block nesting accepted before failing with `NESTING_TOO_DEEP`. */
export const MAX_NESTING_DEPTH = 64;

/** Lines of context shown around offending output lines in errors. */
export const ERROR_CONTEXT_LINES = 2;

/**
 * Cell output class token to admonition opening line.
 *
 * `???+` opens a collapsible block that starts expanded.
 */
export const OUTPUT_ADMONITIONS: ReadonlyMap<string, string> = new Map([
  ['.cell-output-stdout', '???+ note "output"'],
  ['.cell-output-stderr', '???+ warning "stderr"'],
  ['.cell-output-error', '???+ danger "error"'],
  ['.cell-output-display', '???+ note "Display"'],
  ['cell-output-display', '???+ note'],
]);

export const MARKDOWN_DIV_OPEN = '<div markdown="block">';
