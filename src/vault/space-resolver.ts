// Map a user-supplied space/path token to a directory under the configured root

import * as path from 'path';
import Fuse, { type IFuseOptions } from 'fuse.js';
import type { Configuration } from './types.js';
import { VaultError } from './errors.js';
import { spaceDirectory } from './config-store.js';

const suggestionOptions: IFuseOptions<string> = {
  threshold: 0.4,
  includeScore: true,
  ignoreLocation: true,
};

export function isInsideDirectory(candidatePath: string, rootPath: string): boolean {
  const resolvedCandidate = path.resolve(candidatePath);
  const resolvedRoot = path.resolve(rootPath);
  return resolvedCandidate === resolvedRoot || resolvedCandidate.startsWith(`${resolvedRoot}${path.sep}`);
}

/**
 * Closest configured space name for a mistyped one, if any is close enough
 */
export function suggestSpace(config: Configuration, name: string): string | undefined {
  if (!name) return undefined;
  const fuse = new Fuse(config.spaces, suggestionOptions);
  const [best] = fuse.search(name, { limit: 1 });
  return best?.item;
}

function splitToken(token: string): string[] {
  return token
    .trim()
    .replace(/\\/g, '/')
    .replace(/^\/+|\/+$/g, '')
    .split('/');
}

/**
 * Resolve `space` or `space/sub/path` to an absolute path inside that space.
 *
 * The first segment must equal a configured space name exactly. The rest is
 * joined under the space directory and must not climb out of it.
 */
export function resolveSpacePath(config: Configuration, token: string): string {
  const [spaceName = '', ...rest] = splitToken(token);

  if (!config.spaces.includes(spaceName)) {
    const suggestion = suggestSpace(config, spaceName);
    const hint = suggestion ? ` Did you mean "${suggestion}"?` : '';
    throw new VaultError(
      'UnknownSpace',
      `Unknown space "${spaceName}". Configured spaces: ${config.spaces.join(', ')}.${hint}`
    );
  }

  const spaceDir = spaceDirectory(config, spaceName);
  const resolved = path.resolve(spaceDir, ...rest);

  if (!isInsideDirectory(resolved, spaceDir)) {
    throw new VaultError('PathEscape', `Path "${token}" escapes space "${spaceName}"`, { path: resolved });
  }

  return resolved;
}

/**
 * Which configured space an absolute path lives in
 */
export function spaceOf(config: Configuration, absolutePath: string): string | undefined {
  return config.spaces.find((space) => isInsideDirectory(absolutePath, spaceDirectory(config, space)));
}
