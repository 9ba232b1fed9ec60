// egrep-style line search over notes

import type { NoteRecord, SearchMatch } from './types.js';
import { VaultError, describeCause, isVaultError } from './errors.js';
import { type ScanErrorHandler, reportScanError } from './corpus-scanner.js';

export interface SearchOptions {
  ignoreCase?: boolean;
  onError?: ScanErrorHandler;
}

export function compilePattern(pattern: string, options: { ignoreCase?: boolean } = {}): RegExp {
  try {
    // No `g` flag: a global RegExp keeps lastIndex between test() calls
    return new RegExp(pattern, options.ignoreCase ? 'i' : '');
  } catch (err) {
    throw new VaultError('InvalidPattern', `Invalid regular expression "${pattern}": ${describeCause(err)}`, {
      cause: err,
    });
  }
}

/**
 * Split note text into lines; a final newline does not start another line
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function* matchRecords(
  records: Iterable<NoteRecord>,
  regex: RegExp,
  onError: ScanErrorHandler
): Generator<SearchMatch> {
  for (const record of records) {
    let content: string;
    try {
      content = record.readContent();
    } catch (err) {
      if (isVaultError(err, 'ScanError')) {
        onError(err);
        continue;
      }
      throw err;
    }

    const lines = splitLines(content);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      const match = regex.exec(line);
      if (!match) continue;

      yield {
        path: record.path,
        space: record.space,
        lineNumber: i + 1,
        lineText: line,
        matchStart: match.index,
        matchEnd: match.index + match[0].length,
      };
    }
  }
}

/**
 * Lazily yield every matching line across `records`, in record order.
 * The pattern is compiled immediately, so an invalid pattern fails before
 * any note is read.
 */
export function searchNotes(
  records: Iterable<NoteRecord>,
  pattern: string,
  options: SearchOptions = {}
): Iterable<SearchMatch> {
  const regex = compilePattern(pattern, { ignoreCase: options.ignoreCase });
  return matchRecords(records, regex, options.onError ?? reportScanError);
}
