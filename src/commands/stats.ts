// stats: note count, most active space, total words

import { loadConfig, getConfigPath } from '../vault/config-store.js';
import { resolveSpacePath } from '../vault/space-resolver.js';
import { scanCorpus, type ScanErrorHandler } from '../vault/corpus-scanner.js';
import { aggregateStats } from '../vault/stats.js';
import type { StatsReport } from '../vault/types.js';
import { formatStats } from '../utils/formatter.js';
import { type CommandOutput, stdoutOutput } from './output.js';

export interface StatsCommandOptions {
  configPath?: string;
  onError?: ScanErrorHandler;
}

export function statsCommand(
  target: string | undefined,
  options: StatsCommandOptions = {},
  output: CommandOutput = stdoutOutput
): StatsReport {
  const config = loadConfig(options.configPath ?? getConfigPath());
  const scope = target === undefined ? undefined : resolveSpacePath(config, target);

  const records = scanCorpus(config, scope, { onError: options.onError });
  const report = aggregateStats(records, {
    spaces: scope === undefined ? config.spaces : [],
    onError: options.onError,
  });

  for (const line of formatStats(report)) {
    output.write(line);
  }
  return report;
}
