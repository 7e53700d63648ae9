export type ErrorCode =
  | 'REGISTRY_CONFLICT'
  | 'REGISTRY_DATA_INVALID'
  | 'OVERRIDE_TABLE_INVALID'
  | 'DOCUMENT_LOAD_FAILED';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toJSON(): { code: ErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

export class RegistryConflictError extends AppError {
  constructor(canonicalName: string, conflicts: Array<{ kind: string; key: string; owner: string }>) {
    const summary = conflicts.map(c => `${c.kind} "${c.key}" (owned by ${c.owner})`).join(', ');
    super('REGISTRY_CONFLICT', `Cannot register ${canonicalName}: ${summary}`, { canonicalName, conflicts });
    this.name = 'RegistryConflictError';
  }
}

export class RegistryDataError extends AppError {
  constructor(source: string, issues: string[]) {
    super('REGISTRY_DATA_INVALID', `Invalid entity registry data in ${source}`, { source, issues });
    this.name = 'RegistryDataError';
  }
}

export class OverrideTableError extends AppError {
  constructor(source: string, issues: string[]) {
    super('OVERRIDE_TABLE_INVALID', `Invalid override table in ${source}`, { source, issues });
    this.name = 'OverrideTableError';
  }
}

export class DocumentLoadError extends AppError {
  constructor(location: string, reason: string) {
    super('DOCUMENT_LOAD_FAILED', `Failed to load document ${location}: ${reason}`, { location, reason });
    this.name = 'DocumentLoadError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
