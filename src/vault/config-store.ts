// Configuration persistence and layout bootstrap

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { type Configuration, DEFAULT_NOTE_TEMPLATE, DEFAULT_SPACES } from './types.js';
import { VaultError, describeCause, isVaultError } from './errors.js';
import { debug } from '../utils/logger.js';

const CONFIG_ENV_VAR = 'VFM_CONFIG';

/**
 * Return a reason the space list is unusable, or null when it is valid.
 * A space name is a single path segment; names must be unique.
 */
export function validateSpaceNames(spaces: readonly string[]): string | null {
  if (spaces.length === 0) return 'At least one space is required';

  const seen = new Set<string>();
  for (const name of spaces) {
    if (!name.trim() || name !== name.trim()) return `Invalid space name: "${name}"`;
    if (name === '.' || name === '..' || /[\\/]/.test(name)) return `Invalid space name: "${name}"`;
    if (seen.has(name)) return `Duplicate space name: "${name}"`;
    seen.add(name);
  }
  return null;
}

// On disk the record uses snake_case keys
const configFileSchema = z
  .object({
    root_path: z.string().min(1).refine((value) => path.isAbsolute(value), {
      message: 'root_path must be an absolute path',
    }),
    spaces: z.array(z.string()).superRefine((spaces, ctx) => {
      const problem = validateSpaceNames(spaces);
      if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }),
    note_template: z.string(),
    editor_command: z.string().optional(),
  })
  .transform(
    (raw): Configuration => ({
      rootPath: raw.root_path,
      spaces: raw.spaces,
      noteTemplate: raw.note_template,
      ...(raw.editor_command ? { editorCommand: raw.editor_command } : {}),
    })
  );

/**
 * Location of the configuration file. VFM_CONFIG overrides ~/.vfm/config.json.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_ENV_VAR];
  if (override && override.trim()) {
    return path.resolve(override.trim());
  }
  return path.join(os.homedir(), '.vfm', 'config.json');
}

export function serializeConfiguration(config: Configuration): string {
  const record = {
    root_path: config.rootPath,
    spaces: config.spaces,
    note_template: config.noteTemplate,
    editor_command: config.editorCommand,
  };
  return JSON.stringify(record, null, 2) + '\n';
}

export function parseConfiguration(content: string, source = 'configuration'): Configuration {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new VaultError('ConfigCorrupt', `${source} is not valid JSON: ${describeCause(err)}`, {
      path: source,
      cause: err,
    });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new VaultError('ConfigCorrupt', `${source} is malformed: ${issues}`, { path: source });
  }
  return parsed.data;
}

function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

export function spaceDirectory(config: Configuration, space: string): string {
  return path.join(config.rootPath, space);
}

/**
 * Check that the root and every space directory exist
 */
export function validateLayout(config: Configuration): void {
  if (!isDirectory(config.rootPath)) {
    throw new VaultError('InvalidConfig', `Root path is not an existing directory: ${config.rootPath}`, {
      path: config.rootPath,
    });
  }
  for (const space of config.spaces) {
    const dir = spaceDirectory(config, space);
    if (!isDirectory(dir)) {
      throw new VaultError('InvalidConfig', `Space "${space}" has no directory at ${dir}. Run \`vfm init\` again.`, {
        path: dir,
      });
    }
  }
}

/**
 * Load and validate the configuration
 */
export function loadConfig(configPath: string = getConfigPath()): Configuration {
  if (!fs.existsSync(configPath)) {
    throw new VaultError('ConfigNotFound', `No configuration found at ${configPath}. Run \`vfm init\` first.`, {
      path: configPath,
    });
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new VaultError('ConfigCorrupt', `Cannot read ${configPath}: ${describeCause(err)}`, {
      path: configPath,
      cause: err,
    });
  }

  const config = parseConfiguration(content, configPath);
  validateLayout(config);
  debug(`Loaded configuration from ${configPath} (${config.spaces.length} spaces)`);
  return config;
}

function removeQuietly(target: string): void {
  try {
    fs.rmSync(target, { recursive: true, force: true });
  } catch (err) {
    debug(`Could not remove ${target}:`, describeCause(err));
  }
}

/**
 * Persist the configuration atomically: write a temp file beside the target, then rename over it
 */
export function saveConfig(config: Configuration, configPath: string = getConfigPath()): void {
  const dir = path.dirname(configPath);
  const tempPath = path.join(dir, `.${path.basename(configPath)}.${uuidv4()}.tmp`);

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tempPath, serializeConfiguration(config), { encoding: 'utf-8', flag: 'wx' });
    fs.renameSync(tempPath, configPath);
  } catch (err) {
    if (fs.existsSync(tempPath)) {
      removeQuietly(tempPath);
    }
    throw new VaultError('WriteError', `Failed to write configuration ${configPath}: ${describeCause(err)}`, {
      path: configPath,
      cause: err,
    });
  }
}

export interface InitOptions {
  rootPath?: string;
  spaces?: readonly string[];
  noteTemplate?: string;
  editorCommand?: string;
}

export interface InitResult {
  config: Configuration;
  createdDirectories: string[];
  configWritten: boolean;
}

function readExistingConfigText(configPath: string): string | null {
  try {
    return fs.readFileSync(configPath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Create the root and space directories and save a configuration for them.
 *
 * Re-running with the same arguments on an initialized layout changes nothing.
 * If any step fails, directories created by this call are removed again.
 */
export function initConfig(options: InitOptions = {}, configPath: string = getConfigPath()): InitResult {
  const rootPath = path.resolve(options.rootPath ?? process.cwd());
  const spaces = [...(options.spaces ?? DEFAULT_SPACES)];

  const problem = validateSpaceNames(spaces);
  if (problem) {
    throw new VaultError('InvalidConfig', problem);
  }

  const config: Configuration = {
    rootPath,
    spaces,
    noteTemplate: options.noteTemplate ?? DEFAULT_NOTE_TEMPLATE,
    ...(options.editorCommand ? { editorCommand: options.editorCommand } : {}),
  };

  // Conflicts are checked up front so nothing is created when one exists
  if (fs.existsSync(rootPath) && !isDirectory(rootPath)) {
    throw new VaultError('PathConflict', `Root path exists and is not a directory: ${rootPath}`, { path: rootPath });
  }
  for (const space of spaces) {
    const dir = spaceDirectory(config, space);
    if (fs.existsSync(dir) && !isDirectory(dir)) {
      throw new VaultError('PathConflict', `Space path exists and is not a directory: ${dir}`, { path: dir });
    }
  }

  const createdDirectories: string[] = [];
  try {
    if (!fs.existsSync(rootPath)) {
      // mkdirSync returns the topmost directory it had to create
      const firstCreated = fs.mkdirSync(rootPath, { recursive: true });
      createdDirectories.push(firstCreated ?? rootPath);
    }
    for (const space of spaces) {
      const dir = spaceDirectory(config, space);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir);
        createdDirectories.push(dir);
      }
    }

    const serialized = serializeConfiguration(config);
    const configWritten = readExistingConfigText(configPath) !== serialized;
    if (configWritten) {
      saveConfig(config, configPath);
    }

    return { config, createdDirectories, configWritten };
  } catch (err) {
    for (const dir of [...createdDirectories].reverse()) {
      removeQuietly(dir);
    }
    if (isVaultError(err)) throw err;
    throw new VaultError('WriteError', `Failed to initialize ${rootPath}: ${describeCause(err)}`, {
      path: rootPath,
      cause: err,
    });
  }
}
