import { convertMarkdown } from './document.js';
import type { Diagnostic } from './errors.js';
import { toDiagnostic, warningDiagnostic } from './errors.js';

/**
 * Dry-run checker for rendered Quarto markdown.
 *
 * Runs the full conversion and reports what it would do (or why it cannot)
 * as diagnostics instead of throwing.
 */
export interface CheckMarkdownResult {
  errors: Diagnostic[];
  warnings: Diagnostic[];
}

export function checkMarkdown(text: string): CheckMarkdownResult {
  let converted: ReturnType<typeof convertMarkdown>;
  try {
    converted = convertMarkdown(text);
  } catch (error) {
    return { errors: [toDiagnostic(error)], warnings: [] };
  }

  const warnings: Diagnostic[] = converted.normalizedLines.map((line) =>
    warningDiagnostic(
      'NORMALIZED_FENCE',
      'Colon fence is not Quarto cell syntax; narrowed to :::',
      line
    )
  );

  const { cells, codeBlocks, outputs } = converted.stats;
  if (cells + codeBlocks + outputs === 0) {
    warnings.push(warningDiagnostic('NO_CELLS', 'No Quarto cells found in document.'));
  }

  return { errors: [], warnings };
}
