import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, extname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { QuartoCellConfig } from '../config.js';

/**
 * Filesystem helpers for converting rendered documents.
 *
 * Responsibilities:
 * - Ensure all reads/writes stay within `config.rootDir`.
 * - Provide content hashing (etag) and atomic writes.
 */
export interface ReadDocFileResult {
  absolutePath: string;
  text: string;
  etag: string;
}

/**
 * Hex-encoded SHA-256 digest, used as the etag of a document's content.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * This is a lexical guard only; symlinks under `rootDir` are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  if (rel.split(sep).includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

/**
 * Resolve a document path (relative to the root, or absolute) inside the root.
 */
export function resolveDocPath(config: QuartoCellConfig, path: string): string {
  if (!path.trim()) throw new Error('Document path must not be empty');
  const rootDir = resolve(config.rootDir);
  const absolutePath = resolve(rootDir, path);
  assertPathWithinRoot(rootDir, absolutePath);
  return absolutePath;
}

/**
 * Output path for a converted document: the same path with a `.md` extension.
 *
 * A `.md` source maps to itself; callers refuse that unless asked explicitly.
 */
export function defaultOutputPath(absolutePath: string): string {
  const extension = extname(absolutePath);
  const stem = extension ? absolutePath.slice(0, -extension.length) : absolutePath;
  return `${stem}.md`;
}

export async function readDocFile(
  config: QuartoCellConfig,
  path: string
): Promise<ReadDocFileResult> {
  const absolutePath = resolveDocPath(config, path);
  const text = await readFile(absolutePath, 'utf8');
  return { absolutePath, text, etag: sha256Hex(text) };
}

/**
 * Read a file's etag, or `undefined` when it does not exist.
 */
export async function readEtagIfExists(absolutePath: string): Promise<string | undefined> {
  try {
    return sha256Hex(await readFile(absolutePath, 'utf8'));
  } catch (error) {
    if ((error as NodeJS.ErrnoException | undefined)?.code === 'ENOENT') return undefined;
    throw error;
  }
}

/**
 * Write a file via a temporary path and atomic rename.
 */
export async function writeFileAtomic(absolutePath: string, text: string): Promise<void> {
  await mkdir(dirname(absolutePath), { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}
