// vfm types

export interface Configuration {
  rootPath: string;
  spaces: string[];
  noteTemplate: string;
  editorCommand?: string;
}

export interface NoteRecord {
  path: string; // absolute
  space: string;
  relativePath: string; // relative to the space directory, '/'-separated
  size: number;
  modifiedAt: Date;
  createdAt: Date;
  /** Reads the note once and caches the text. Throws a ScanError VaultError. */
  readContent(): string;
  wordCount(): number;
  /** First `# Heading`, else the filename without `.md`. */
  title(): string;
}

export interface SearchMatch {
  path: string;
  space: string;
  lineNumber: number; // 1-based
  lineText: string;
  matchStart: number;
  matchEnd: number;
}

export interface SpaceCount {
  space: string;
  noteCount: number;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface StatsReport {
  noteCount: number;
  mostActiveSpace: string | null;
  totalWords: number;
  spaceCounts: SpaceCount[];
  topTags: TagCount[];
}

export const NOTE_EXTENSION = '.md';

export const DEFAULT_SPACES = ['vfm.space', 'vfm.private', 'vfm.public'] as const;

export const DEFAULT_NOTE_TEMPLATE = `---
tags:
  - add-tag
---

# {{title}}

_Created:_ {{date}}
`;
