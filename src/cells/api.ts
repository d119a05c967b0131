import type { QuartoCellConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { convertMarkdown } from './document.js';
import type { TransformStats } from './model.js';
import {
  defaultOutputPath,
  readDocFile,
  readEtagIfExists,
  resolveDocPath,
  sha256Hex,
  writeFileAtomic,
} from './storage.js';
import type { CheckMarkdownResult } from './validate.js';
import { checkMarkdown } from './validate.js';

const log = createLogger('api');

/**
 * Public API for file-level conversion.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - conversion and checking (`document.ts`, `validate.ts`)
 *
 * Paths are resolved against `config.rootDir` and may not escape it.
 */
export interface ConvertFileOptions {
  /** Source document, relative to the root. */
  path: string;
  /** Destination, relative to the root. Defaults to the source with a `.md` extension. */
  outPath?: string;
  /** Convert and report without writing. */
  dryRun?: boolean;
  /** Expected etag of the existing destination; the write is refused on mismatch. */
  ifMatch?: string;
}

export interface ConvertFileResult {
  path: string;
  outPath: string;
  /** SHA-256 of the converted text. */
  etag: string;
  written: boolean;
  stats: TransformStats;
  markdown: string;
}

export async function convertFile(
  config: QuartoCellConfig,
  options: ConvertFileOptions
): Promise<ConvertFileResult> {
  const source = await readDocFile(config, options.path);
  const outPath =
    options.outPath !== undefined
      ? resolveDocPath(config, options.outPath)
      : defaultOutputPath(source.absolutePath);

  if (options.outPath === undefined && outPath === source.absolutePath) {
    throw new Error(
      `Refusing to overwrite ${options.path} in place; pass an explicit output path`
    );
  }

  const { markdown, stats } = convertMarkdown(source.text);
  const etag = sha256Hex(markdown);

  if (options.ifMatch !== undefined) {
    const current = await readEtagIfExists(outPath);
    if (current !== options.ifMatch) {
      throw new Error(
        `Etag mismatch for ${outPath}: expected ${options.ifMatch}, found ${current ?? '(missing)'}`
      );
    }
  }

  const dryRun = options.dryRun ?? false;
  if (!dryRun) {
    await writeFileAtomic(outPath, markdown);
    log.info(`wrote ${outPath} (${stats.cells} cell(s), ${stats.outputs} output(s))`);
  }

  return {
    path: source.absolutePath,
    outPath,
    etag,
    written: !dryRun,
    stats,
    markdown,
  };
}

export async function checkFile(
  config: QuartoCellConfig,
  options: { path: string }
): Promise<CheckMarkdownResult> {
  const { text, absolutePath } = await readDocFile(config, options.path);
  log.info(`checking ${absolutePath}`);
  return checkMarkdown(text);
}
