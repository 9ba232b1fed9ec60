// Launch the configured editor on a file

import { spawnSync } from 'child_process';

/**
 * Split an editor command line into program and arguments. Quoted segments
 * ("..." or '...') keep their spaces.
 */
export function splitCommandLine(command: string): string[] {
  const parts: string[] = [];
  const pattern = /"([^"]*)"|'([^']*)'|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(command)) !== null) {
    parts.push(match[1] ?? match[2] ?? match[3] ?? '');
  }
  return parts;
}

/**
 * Run the editor and wait for it. Uses spawnSync with array arguments, never a shell.
 */
export function openInEditor(editorCommand: string, filePath: string): number {
  const [program, ...args] = splitCommandLine(editorCommand);
  if (!program) {
    throw new Error('Editor command is empty');
  }

  const result = spawnSync(program, [...args, filePath], { stdio: 'inherit' });
  if (result.error) {
    throw new Error(`Failed to launch editor "${program}": ${result.error.message}`);
  }
  return result.status ?? 0;
}
