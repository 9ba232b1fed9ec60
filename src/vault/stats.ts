// Corpus statistics

import type { NoteRecord, SpaceCount, StatsReport, TagCount } from './types.js';
import { isVaultError } from './errors.js';
import { extractFrontmatterTags } from './markdown.js';
import { type ScanErrorHandler, compareNames, reportScanError } from './corpus-scanner.js';

export const TOP_TAG_LIMIT = 5;

export interface AggregateOptions {
  /** Spaces to list in `spaceCounts` even when they hold no notes, in this order */
  spaces?: readonly string[];
  onError?: ScanErrorHandler;
  topTagLimit?: number;
}

/**
 * Space with the most notes; ties go to the name that sorts first
 */
export function pickMostActiveSpace(counts: ReadonlyMap<string, number>): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [space, count] of counts) {
    if (count === 0) continue;
    if (best === null || count > bestCount || (count === bestCount && compareNames(space, best) < 0)) {
      best = space;
      bestCount = count;
    }
  }
  return best;
}

export function aggregateStats(records: Iterable<NoteRecord>, options: AggregateOptions = {}): StatsReport {
  const onError = options.onError ?? reportScanError;
  const topTagLimit = options.topTagLimit ?? TOP_TAG_LIMIT;

  const perSpace = new Map<string, number>();
  for (const space of options.spaces ?? []) {
    perSpace.set(space, 0);
  }
  const tagCounter = new Map<string, number>();

  let noteCount = 0;
  let totalWords = 0;

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

    noteCount++;
    totalWords += record.wordCount();
    perSpace.set(record.space, (perSpace.get(record.space) ?? 0) + 1);

    for (const tag of extractFrontmatterTags(content)) {
      tagCounter.set(tag, (tagCounter.get(tag) ?? 0) + 1);
    }
  }

  const spaceCounts: SpaceCount[] = [...perSpace].map(([space, count]) => ({ space, noteCount: count }));

  const topTags: TagCount[] = [...tagCounter]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || compareNames(a.tag, b.tag))
    .slice(0, topTagLimit);

  return {
    noteCount,
    mostActiveSpace: pickMostActiveSpace(perSpace),
    totalWords,
    spaceCounts,
    topTags,
  };
}
