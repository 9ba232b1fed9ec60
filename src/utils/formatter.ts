import type { SearchMatch, StatsReport } from '../vault/types.js';

export function formatMatch(match: SearchMatch): string {
  return `${match.path}:${match.lineNumber}:${match.lineText}`;
}

export function formatStats(report: StatsReport): string[] {
  const lines = [
    `note_count: ${report.noteCount}`,
    `most_active_space: ${report.mostActiveSpace ?? 'none'}`,
    `total_words: ${report.totalWords}`,
  ];

  if (report.spaceCounts.length > 0) {
    lines.push('spaces:');
    for (const { space, noteCount } of report.spaceCounts) {
      lines.push(`  ${space}: ${noteCount}`);
    }
  }

  if (report.topTags.length > 0) {
    lines.push('top_tags:');
    for (const { tag, count } of report.topTags) {
      lines.push(`  ${tag}: ${count}`);
    }
  }

  return lines;
}
