export type VaultErrorCode =
  | 'ConfigNotFound'
  | 'ConfigCorrupt'
  | 'InvalidConfig'
  | 'PathConflict'
  | 'UnknownSpace'
  | 'PathEscape'
  | 'TitleEmpty'
  | 'WriteError'
  | 'ScanError'
  | 'InvalidPattern';

export class VaultError extends Error {
  code: VaultErrorCode;
  path?: string;

  constructor(code: VaultErrorCode, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'VaultError';
    this.code = code;
    this.path = options.path;
  }
}

export function isVaultError(err: unknown, code?: VaultErrorCode): err is VaultError {
  return err instanceof VaultError && (code === undefined || err.code === code);
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
