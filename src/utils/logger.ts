// stderr logger; stdout is reserved for command output

const PREFIX = '[vfm]';

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function debug(...args: unknown[]): void {
  if (verbose) {
    console.error(`${PREFIX} [debug]`, ...args);
  }
}

export function warn(...args: unknown[]): void {
  console.error(`${PREFIX} [warn]`, ...args);
}

export function error(...args: unknown[]): void {
  console.error(`${PREFIX} [error]`, ...args);
}
