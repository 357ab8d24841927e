export class ArchiverError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ArchiverError';
  }
}

export class ConfigError extends ArchiverError {
  constructor(message: string, details?: Record<string, unknown>, code = 'CONFIG_ERROR') {
    super(message, code, details);
    this.name = 'ConfigError';
  }
}

export type FetchErrorKind =
  | 'NetworkUnreachable'
  | 'HTTPStatus'
  | 'Timeout'
  | 'AuthRejected'
  | 'MalformedResponse'
  | 'Empty';

export class FetchError extends ArchiverError {
  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    details?: Record<string, unknown> & { status?: number },
  ) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }

  get status(): number | undefined {
    const status = this.details?.['status'];
    return typeof status === 'number' ? status : undefined;
  }
}

export class ArchiveWriteError extends ArchiverError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ARCHIVE_WRITE_ERROR', details);
    this.name = 'ArchiveWriteError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
