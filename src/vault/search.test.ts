import { describe, it, expect } from 'vitest';
import { compilePattern, searchNotes, splitLines } from './search.js';
import { VaultError, isVaultError } from './errors.js';
import { countWords } from './markdown.js';
import type { NoteRecord } from './types.js';

function fakeNote(name: string, content: string, space = 'private'): NoteRecord {
  return {
    path: `/notes/${space}/${name}`,
    space,
    relativePath: name,
    size: content.length,
    modifiedAt: new Date(0),
    createdAt: new Date(0),
    readContent: () => content,
    wordCount: () => countWords(content),
    title: () => name,
  };
}

describe('splitLines', () => {
  it('does not treat a trailing newline as another line', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('')).toEqual([]);
  });

  it('keeps interior blank lines and strips carriage returns', () => {
    expect(splitLines('a\r\n\r\nb')).toEqual(['a', '', 'b']);
  });
});

describe('compilePattern', () => {
  it('fails with InvalidPattern for an expression that does not compile', () => {
    let caught: unknown;
    try {
      compilePattern('(unclosed');
    } catch (err) {
      caught = err;
    }
    expect(isVaultError(caught, 'InvalidPattern')).toBe(true);
  });

  it('is case-sensitive unless asked otherwise', () => {
    expect(compilePattern('todo').test('TODO')).toBe(false);
    expect(compilePattern('todo', { ignoreCase: true }).test('TODO')).toBe(true);
  });
});

describe('searchNotes', () => {
  it('returns one match at line 1 for a TODO heading', () => {
    const matches = [...searchNotes([fakeNote('fix.md', '# TODO: fix\n')], 'TODO')];

    expect(matches).toEqual([
      {
        path: '/notes/private/fix.md',
        space: 'private',
        lineNumber: 1,
        lineText: '# TODO: fix',
        matchStart: 2,
        matchEnd: 6,
      },
    ]);
  });

  it('fails before reading any note when the pattern is invalid', () => {
    const untouchable: Iterable<NoteRecord> = {
      [Symbol.iterator]: () => {
        throw new Error('records must not be read');
      },
    };
    expect(() => searchNotes(untouchable, '[a-')).toThrow(VaultError);
  });

  it('matches substrings, not whole lines', () => {
    const matches = [...searchNotes([fakeNote('a.md', 'alpha\nbeta gamma\ndelta')], 'amm|^del')];
    expect(matches.map((m) => [m.lineNumber, m.lineText])).toEqual([
      [2, 'beta gamma'],
      [3, 'delta'],
    ]);
  });

  it('yields one match per line even with several occurrences', () => {
    const matches = [...searchNotes([fakeNote('a.md', 'x x x')], 'x')];
    expect(matches).toHaveLength(1);
  });

  it('preserves record order, then ascending line order', () => {
    const records = [fakeNote('b.md', 'hit\nmiss\nhit'), fakeNote('a.md', 'hit', 'public')];
    const matches = [...searchNotes(records, 'hit')];

    expect(matches.map((m) => `${m.path}:${m.lineNumber}`)).toEqual([
      '/notes/private/b.md:1',
      '/notes/private/b.md:3',
      '/notes/public/a.md:1',
    ]);
  });

  it('honours ignoreCase', () => {
    const record = fakeNote('a.md', 'Meeting notes');
    expect([...searchNotes([record], 'meeting')]).toHaveLength(0);
    expect([...searchNotes([record], 'meeting', { ignoreCase: true })]).toHaveLength(1);
  });

  it('skips unreadable notes and keeps searching', () => {
    const unreadable: NoteRecord = {
      ...fakeNote('locked.md', ''),
      readContent: () => {
        throw new VaultError('ScanError', 'Cannot read /notes/private/locked.md');
      },
    };
    const errors: VaultError[] = [];
    const matches = [...searchNotes([unreadable, fakeNote('ok.md', 'needle')], 'needle', { onError: (e) => errors.push(e) })];

    expect(matches.map((m) => m.path)).toEqual(['/notes/private/ok.md']);
    expect(errors.map((e) => e.code)).toEqual(['ScanError']);
  });

  it('produces nothing for an empty corpus', () => {
    expect([...searchNotes([], 'anything')]).toEqual([]);
  });
});
