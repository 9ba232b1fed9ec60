// new: create a note from the configured template

import { loadConfig, getConfigPath } from '../vault/config-store.js';
import { resolveSpacePath } from '../vault/space-resolver.js';
import { createNote } from '../vault/note-creator.js';
import { openInEditor } from '../utils/editor.js';
import { warn } from '../utils/logger.js';
import { type CommandOutput, stdoutOutput } from './output.js';

export interface NewCommandOptions {
  title: string;
  open?: boolean;
  configPath?: string;
  now?: Date;
}

export function newCommand(
  target: string | undefined,
  options: NewCommandOptions,
  output: CommandOutput = stdoutOutput
): string {
  const config = loadConfig(options.configPath ?? getConfigPath());

  // Defaults to the first configured space
  const directory = resolveSpacePath(config, target ?? config.spaces[0] ?? '');
  const notePath = createNote(config, directory, options.title, { now: options.now });
  output.write(notePath);

  if (options.open) {
    if (!config.editorCommand) {
      warn('No editor configured; run `vfm init --editor <command>` to set one.');
    } else {
      try {
        const status = openInEditor(config.editorCommand, notePath);
        if (status !== 0) warn(`Editor exited with status ${status}`);
      } catch (err) {
        warn(err instanceof Error ? err.message : String(err));
      }
    }
  }

  return notePath;
}
