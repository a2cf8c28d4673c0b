export enum SettingsErrorCode {
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  INVALID_JSON = 'INVALID_JSON',
  INVALID_SHAPE = 'INVALID_SHAPE',
  READ_FAILED = 'READ_FAILED',
  NO_INPUT = 'NO_INPUT',
  INVALID_OPTION = 'INVALID_OPTION',
}

export interface SettingsErrorDetails {
  filePath?: string;
  suggestion?: string;
}

export class SettingsError extends Error {
  public readonly code: SettingsErrorCode;
  public readonly filePath?: string;
  public readonly suggestion?: string;

  constructor(message: string, code: SettingsErrorCode, details: SettingsErrorDetails = {}) {
    super(message);
    this.name = 'SettingsError';
    this.code = code;
    this.filePath = details.filePath;
    this.suggestion = details.suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, SettingsError.prototype);
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
