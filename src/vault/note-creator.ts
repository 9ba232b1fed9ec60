// Note creation: filename derivation, collision probing, templated content

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { type Configuration, NOTE_EXTENSION } from './types.js';
import { VaultError, describeCause } from './errors.js';
import { isInsideDirectory } from './space-resolver.js';
import { debug, warn } from '../utils/logger.js';

const MAX_FILENAME_BYTES = 255;
// Leaves room for a `-<n>` collision suffix and the extension
const MAX_SLUG_BYTES = MAX_FILENAME_BYTES - 15;
const MAX_LINK_ATTEMPTS = 100;

function truncateUtf8(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, 'utf8') <= maxBytes) return value;
  let bytes = 0;
  let result = '';
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) break;
    bytes += size;
    result += char;
  }
  return result;
}

function trimSlug(slug: string): string {
  return slug.replace(/^[-.]+|[-.]+$/g, '');
}

/**
 * Derive a filename stem from a title: lower-case, with each run of
 * whitespace or path-unsafe characters collapsed to a single `-`.
 * Long stems are cut on a character boundary to fit a filename.
 */
export function slugifyTitle(title: string): string {
  const slug = trimSlug(
    title
      .trim()
      .toLowerCase()
      .replace(/[\s/\\?%*:|"<>#\u0000-\u001f]+/g, '-')
      .replace(/-{2,}/g, '-')
  );
  return trimSlug(truncateUtf8(slug, MAX_SLUG_BYTES));
}

export interface TemplateValues {
  title: string;
  date: string;
}

export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{\{\s*(title|date)\s*\}\}/g, (_match, key: string) =>
    key === 'title' ? values.title : values.date
  );
}

// lstat so that a dangling symlink still counts as taken
function pathTaken(candidate: string): boolean {
  try {
    fs.lstatSync(candidate);
    return true;
  } catch {
    return false;
  }
}

/**
 * First unused name in the sequence `slug.md`, `slug-2.md`, `slug-3.md`, ...
 */
export function nextAvailableNotePath(directory: string, slug: string): string {
  for (let attempt = 1; ; attempt++) {
    const filename = attempt === 1 ? `${slug}${NOTE_EXTENSION}` : `${slug}-${attempt}${NOTE_EXTENSION}`;
    const candidate = path.join(directory, filename);
    if (!pathTaken(candidate)) return candidate;
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Hard-link the fully written temp file to the first free note name.
 * A link never replaces an existing entry, so a note created by another
 * process since the probe fails with EEXIST and the next name is tried.
 */
function linkIntoPlace(tempPath: string, directory: string, slug: string): string {
  let lastError: unknown;
  for (let attempt = 0; attempt < MAX_LINK_ATTEMPTS; attempt++) {
    const candidate = nextAvailableNotePath(directory, slug);
    try {
      fs.linkSync(tempPath, candidate);
      return candidate;
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
      lastError = err;
    }
  }
  throw lastError;
}

function removeTempFile(tempPath: string): void {
  try {
    fs.rmSync(tempPath, { force: true });
  } catch (err) {
    warn(`Could not remove temp file ${tempPath}:`, describeCause(err));
  }
}

export interface CreateNoteOptions {
  now?: Date;
}

/**
 * Create a note in an existing directory and return its absolute path.
 *
 * Content is written to a hidden temp file first, so the note only becomes
 * visible once complete. An existing file is never replaced.
 */
export function createNote(
  config: Configuration,
  directory: string,
  title: string,
  options: CreateNoteOptions = {}
): string {
  const trimmedTitle = title.trim();
  if (!trimmedTitle) {
    throw new VaultError('TitleEmpty', 'Note title is required');
  }

  const slug = slugifyTitle(trimmedTitle);
  if (!slug) {
    throw new VaultError('TitleEmpty', `Title "${trimmedTitle}" does not produce a usable filename`);
  }

  if (!isInsideDirectory(directory, config.rootPath)) {
    throw new VaultError('PathEscape', `Directory is outside the notes root: ${directory}`, { path: directory });
  }

  let isDirectory = false;
  try {
    isDirectory = fs.statSync(directory).isDirectory();
  } catch (err) {
    debug(`stat failed for ${directory}:`, describeCause(err));
  }
  if (!isDirectory) {
    throw new VaultError('WriteError', `Target directory does not exist: ${directory}`, { path: directory });
  }

  const now = options.now ?? new Date();
  const content = renderTemplate(config.noteTemplate, { title: trimmedTitle, date: now.toISOString() });

  // Hidden temp names are skipped by the corpus scanner
  const tempPath = path.join(directory, `.${uuidv4()}.tmp`);
  let notePath: string;
  try {
    fs.writeFileSync(tempPath, content, { encoding: 'utf-8', flag: 'wx' });
    notePath = linkIntoPlace(tempPath, directory, slug);
  } catch (err) {
    throw new VaultError('WriteError', `Failed to write note "${slug}" in ${directory}: ${describeCause(err)}`, {
      path: directory,
      cause: err,
    });
  } finally {
    removeTempFile(tempPath);
  }

  debug(`Created note ${notePath}`);
  return notePath;
}
