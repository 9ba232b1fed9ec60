// init: create the root, the space directories and the configuration file

import * as fs from 'fs';
import { initConfig, getConfigPath, spaceDirectory, type InitResult } from '../vault/config-store.js';
import { VaultError, describeCause } from '../vault/errors.js';
import { type CommandOutput, stdoutOutput } from './output.js';

export interface InitCommandOptions {
  root?: string;
  spaces?: string;
  template?: string;
  editor?: string;
  configPath?: string;
}

export function parseSpaceList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function readTemplateFile(templatePath: string): string {
  try {
    return fs.readFileSync(templatePath, 'utf-8');
  } catch (err) {
    throw new VaultError('InvalidConfig', `Cannot read template file ${templatePath}: ${describeCause(err)}`, {
      path: templatePath,
      cause: err,
    });
  }
}

export function initCommand(options: InitCommandOptions = {}, output: CommandOutput = stdoutOutput): InitResult {
  const configPath = options.configPath ?? getConfigPath();

  const result = initConfig(
    {
      rootPath: options.root,
      spaces: options.spaces === undefined ? undefined : parseSpaceList(options.spaces),
      noteTemplate: options.template === undefined ? undefined : readTemplateFile(options.template),
      editorCommand: options.editor,
    },
    configPath
  );

  for (const space of result.config.spaces) {
    output.write(`Ensured directory: ${spaceDirectory(result.config, space)}`);
  }
  output.write(
    result.configWritten ? `Created config file: ${configPath}` : `Already initialized: ${configPath}`
  );
  return result;
}
