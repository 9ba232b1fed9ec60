import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { initCommand, parseSpaceList } from './init.js';
import { newCommand } from './new.js';
import { statsCommand } from './stats.js';
import { searchCommand } from './search.js';
import type { CommandOutput } from './output.js';
import { isVaultError } from '../vault/errors.js';

let tempDir: string;
let rootPath: string;
let configPath: string;
let lines: string[];
let output: CommandOutput;

const NOW = new Date('2025-09-30T12:00:00.000Z');

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vfm-cmd-'));
  rootPath = path.join(tempDir, 'forest');
  configPath = path.join(tempDir, 'config.json');
  lines = [];
  output = { write: (line) => lines.push(line) };
  // keep warnings out of the test output
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function errorCodeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isVaultError(err) ? err.code : 'not-a-vault-error';
  }
  return undefined;
}

function init(): void {
  initCommand({ root: rootPath, spaces: 'private,public', configPath }, { write: () => undefined });
}

describe('parseSpaceList', () => {
  it('splits on commas and drops blanks', () => {
    expect(parseSpaceList(' private, public ,,freeform')).toEqual(['private', 'public', 'freeform']);
  });
});

describe('initCommand', () => {
  it('prints each ensured directory and the config file', () => {
    initCommand({ root: rootPath, spaces: 'private,public', configPath }, output);

    expect(lines).toEqual([
      `Ensured directory: ${path.join(rootPath, 'private')}`,
      `Ensured directory: ${path.join(rootPath, 'public')}`,
      `Created config file: ${configPath}`,
    ]);
  });

  it('reports an already initialized layout on the second run', () => {
    init();
    initCommand({ root: rootPath, spaces: 'private,public', configPath }, output);
    expect(lines[lines.length - 1]).toBe(`Already initialized: ${configPath}`);
  });

  it('reads the note template from a file', () => {
    const templatePath = path.join(tempDir, 'template.md');
    fs.writeFileSync(templatePath, 'Title: {{title}}\n');

    const result = initCommand({ root: rootPath, spaces: 'private', template: templatePath, configPath }, output);
    expect(result.config.noteTemplate).toBe('Title: {{title}}\n');
  });

  it('fails with InvalidConfig for an unreadable template file', () => {
    const missing = path.join(tempDir, 'missing.md');
    expect(errorCodeOf(() => initCommand({ root: rootPath, template: missing, configPath }, output))).toBe(
      'InvalidConfig'
    );
  });
});

describe('newCommand', () => {
  it('creates a note in the first space by default and prints its path', () => {
    init();
    const notePath = newCommand(undefined, { title: 'First Thought', configPath, now: NOW }, output);

    expect(notePath).toBe(path.join(rootPath, 'private', 'first-thought.md'));
    expect(lines).toEqual([notePath]);
    expect(fs.readFileSync(notePath, 'utf-8')).toContain('# First Thought\n\n_Created:_ 2025-09-30T12:00:00.000Z');
  });

  it('creates a note under a path inside a space', () => {
    init();
    fs.mkdirSync(path.join(rootPath, 'public', 'essays'));

    const notePath = newCommand('public/essays', { title: 'On Trees', configPath, now: NOW }, output);
    expect(notePath).toBe(path.join(rootPath, 'public', 'essays', 'on-trees.md'));
  });

  it('propagates resolution and title errors', () => {
    init();
    expect(errorCodeOf(() => newCommand('journal', { title: 'x', configPath }, output))).toBe('UnknownSpace');
    expect(errorCodeOf(() => newCommand('private/../..', { title: 'x', configPath }, output))).toBe('PathEscape');
    expect(errorCodeOf(() => newCommand('private', { title: ' ', configPath }, output))).toBe('TitleEmpty');
  });

  it('fails with ConfigNotFound before init', () => {
    expect(errorCodeOf(() => newCommand('private', { title: 'x', configPath }, output))).toBe('ConfigNotFound');
  });

  it('still creates the note when --open has no editor configured', () => {
    init();
    const notePath = newCommand('private', { title: 'Open Me', open: true, configPath, now: NOW }, output);
    expect(fs.existsSync(notePath)).toBe(true);
  });
});

describe('statsCommand', () => {
  it('prints zero counts for an empty corpus', () => {
    init();
    statsCommand(undefined, { configPath }, output);

    expect(lines).toEqual([
      'note_count: 0',
      'most_active_space: none',
      'total_words: 0',
      'spaces:',
      '  private: 0',
      '  public: 0',
    ]);
  });

  it('summarizes notes created by newCommand', () => {
    init();
    const silent: CommandOutput = { write: () => undefined };
    newCommand('private', { title: 'One', configPath, now: NOW }, silent);
    newCommand('private', { title: 'Two', configPath, now: NOW }, silent);
    newCommand('public', { title: 'Three', configPath, now: NOW }, silent);

    const report = statsCommand(undefined, { configPath }, output);

    // default template: "---", "tags:", "-", "add-tag", "---", "#", title, "_Created:_", date
    expect(report.noteCount).toBe(3);
    expect(report.mostActiveSpace).toBe('private');
    expect(report.totalWords).toBe(27);
    expect(report.topTags).toEqual([{ tag: 'add-tag', count: 3 }]);
    expect(lines.slice(0, 3)).toEqual(['note_count: 3', 'most_active_space: private', 'total_words: 27']);
  });

  it('limits statistics to a target space', () => {
    init();
    fs.writeFileSync(path.join(rootPath, 'public', 'a.md'), 'one two');
    fs.writeFileSync(path.join(rootPath, 'private', 'b.md'), 'three');

    const report = statsCommand('public', { configPath }, output);
    expect(report.noteCount).toBe(1);
    expect(report.mostActiveSpace).toBe('public');
    expect(report.totalWords).toBe(2);
  });
});

describe('searchCommand', () => {
  beforeEach(() => {
    init();
    fs.writeFileSync(path.join(rootPath, 'private', 'tasks.md'), '# TODO: fix\nnothing\ntodo later\n');
    fs.writeFileSync(path.join(rootPath, 'public', 'post.md'), 'draft\nTODO publish\n');
  });

  it('prints path:line:text for every match across all spaces', () => {
    const count = searchCommand(undefined, 'TODO', { configPath }, output);

    expect(count).toBe(2);
    expect(lines).toEqual([
      `${path.join(rootPath, 'private', 'tasks.md')}:1:# TODO: fix`,
      `${path.join(rootPath, 'public', 'post.md')}:2:TODO publish`,
    ]);
  });

  it('restricts the search to a target and supports ignoreCase', () => {
    const count = searchCommand('private', 'todo', { ignoreCase: true, configPath }, output);

    const prefix = `${path.join(rootPath, 'private', 'tasks.md')}:`;
    expect(count).toBe(2);
    expect(lines.map((line) => line.slice(prefix.length))).toEqual(['1:# TODO: fix', '3:todo later']);
  });

  it('returns zero without error when nothing matches', () => {
    expect(searchCommand(undefined, 'absent', { configPath }, output)).toBe(0);
    expect(lines).toEqual([]);
  });

  it('fails with InvalidPattern or UnknownSpace', () => {
    expect(errorCodeOf(() => searchCommand(undefined, '(', { configPath }, output))).toBe('InvalidPattern');
    expect(errorCodeOf(() => searchCommand('archive', 'x', { configPath }, output))).toBe('UnknownSpace');
  });
});
