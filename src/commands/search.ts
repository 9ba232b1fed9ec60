// search: egrep-like search in a space, a path under a space, or everywhere

import { loadConfig, getConfigPath } from '../vault/config-store.js';
import { resolveSpacePath } from '../vault/space-resolver.js';
import { scanCorpus, type ScanErrorHandler } from '../vault/corpus-scanner.js';
import { searchNotes } from '../vault/search.js';
import { formatMatch } from '../utils/formatter.js';
import { debug } from '../utils/logger.js';
import { type CommandOutput, stdoutOutput } from './output.js';

export interface SearchCommandOptions {
  ignoreCase?: boolean;
  configPath?: string;
  onError?: ScanErrorHandler;
}

/**
 * Print every matching line as `path:line:text`; returns the number of matches
 */
export function searchCommand(
  target: string | undefined,
  pattern: string,
  options: SearchCommandOptions = {},
  output: CommandOutput = stdoutOutput
): number {
  const config = loadConfig(options.configPath ?? getConfigPath());
  const scope = target === undefined ? undefined : resolveSpacePath(config, target);

  const records = scanCorpus(config, scope, { onError: options.onError });
  const matches = searchNotes(records, pattern, { ignoreCase: options.ignoreCase, onError: options.onError });

  let count = 0;
  for (const match of matches) {
    output.write(formatMatch(match));
    count++;
  }
  debug(`${count} matching line(s)`);
  return count;
}
