// Lazy, deterministic walk over the note corpus

import * as fs from 'fs';
import * as path from 'path';
import { type Configuration, NOTE_EXTENSION, type NoteRecord } from './types.js';
import { VaultError, describeCause } from './errors.js';
import { spaceDirectory } from './config-store.js';
import { spaceOf } from './space-resolver.js';
import { countWords, extractH1Title } from './markdown.js';
import { warn } from '../utils/logger.js';

export type ScanErrorHandler = (error: VaultError) => void;

export interface ScanOptions {
  /** Called for each unreadable file or directory; the walk continues. Defaults to a logged warning. */
  onError?: ScanErrorHandler;
}

export function reportScanError(error: VaultError): void {
  warn(error.message);
}

// Code-unit order, independent of locale
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isNoteFilename(name: string): boolean {
  return !name.startsWith('.') && name.endsWith(NOTE_EXTENSION);
}

export function createNoteRecord(filePath: string, space: string, spaceDir: string, stats: fs.Stats): NoteRecord {
  let content: string | undefined;

  const readContent = (): string => {
    if (content === undefined) {
      try {
        content = fs.readFileSync(filePath, 'utf-8');
      } catch (err) {
        throw new VaultError('ScanError', `Cannot read ${filePath}: ${describeCause(err)}`, {
          path: filePath,
          cause: err,
        });
      }
    }
    return content;
  };

  return {
    path: filePath,
    space,
    relativePath: path.relative(spaceDir, filePath).split(path.sep).join('/'),
    size: stats.size,
    modifiedAt: stats.mtime,
    createdAt: stats.birthtime,
    readContent,
    wordCount: () => countWords(readContent()),
    title: () => extractH1Title(readContent()) ?? path.basename(filePath, NOTE_EXTENSION),
  };
}

function statOrReport(target: string, onError: ScanErrorHandler): fs.Stats | null {
  try {
    return fs.statSync(target);
  } catch (err) {
    onError(new VaultError('ScanError', `Cannot stat ${target}: ${describeCause(err)}`, { path: target, cause: err }));
    return null;
  }
}

function* walkDirectory(
  dirPath: string,
  space: string,
  spaceDir: string,
  onError: ScanErrorHandler
): Generator<NoteRecord> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (err) {
    onError(new VaultError('ScanError', `Cannot list ${dirPath}: ${describeCause(err)}`, { path: dirPath, cause: err }));
    return;
  }

  entries.sort((a, b) => compareNames(a.name, b.name));

  for (const entry of entries) {
    // Hidden entries (.git, .obsidian, temp files) are never part of the corpus
    if (entry.name.startsWith('.')) continue;

    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      yield* walkDirectory(entryPath, space, spaceDir, onError);
    } else if (entry.isFile() && isNoteFilename(entry.name)) {
      const stats = statOrReport(entryPath, onError);
      if (stats) {
        yield createNoteRecord(entryPath, space, spaceDir, stats);
      }
    }
  }
}

function* walkScope(
  config: Configuration,
  scope: string,
  space: string,
  onError: ScanErrorHandler
): Generator<NoteRecord> {
  const spaceDir = spaceDirectory(config, space);
  const stats = statOrReport(scope, onError);
  if (!stats) return;

  if (stats.isDirectory()) {
    yield* walkDirectory(scope, space, spaceDir, onError);
  } else if (stats.isFile() && isNoteFilename(path.basename(scope))) {
    yield createNoteRecord(scope, space, spaceDir, stats);
  }
}

function* walkAllSpaces(config: Configuration, onError: ScanErrorHandler): Generator<NoteRecord> {
  for (const space of config.spaces) {
    const spaceDir = spaceDirectory(config, space);
    yield* walkDirectory(spaceDir, space, spaceDir, onError);
  }
}

/**
 * Enumerate notes in every configured space, or only under `scope`.
 *
 * The result is a fresh generator on every call. File content is not read
 * until a record's `readContent`, `wordCount` or `title` is used.
 */
export function scanCorpus(config: Configuration, scope?: string, options: ScanOptions = {}): Iterable<NoteRecord> {
  const onError = options.onError ?? reportScanError;

  if (scope === undefined) {
    return walkAllSpaces(config, onError);
  }

  const resolvedScope = path.resolve(scope);
  const space = spaceOf(config, resolvedScope);
  if (!space) {
    throw new VaultError('UnknownSpace', `Scan scope is not inside a configured space: ${resolvedScope}`, {
      path: resolvedScope,
    });
  }
  return walkScope(config, resolvedScope, space, onError);
}
