/**
 * Utility to handle database errors gracefully
 */

export interface ApiErrorBody {
  code: string;
  message: string;
  details?: string;
  fields?: Record<string, string>;
}

export interface HandledError {
  status: number;
  error: ApiErrorBody;
}

export const getErrorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export function isDatabaseBusyError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED') return true;
  if (code?.startsWith('SQLITE_BUSY_') || code?.startsWith('SQLITE_LOCKED_')) return true;

  return getErrorMessage(error).toLowerCase().includes('database is locked');
}

export function isConstraintError(error: unknown): boolean {
  return getErrorCode(error)?.startsWith('SQLITE_CONSTRAINT') ?? false;
}

export function isDatabaseError(error: unknown): boolean {
  return getErrorCode(error)?.startsWith('SQLITE_') ?? false;
}

export function handleDatabaseError(error: unknown, defaultMessage: string = 'Database operation failed'): HandledError {
  const details = process.env.NODE_ENV === 'development' ? getErrorMessage(error) : undefined;

  if (isDatabaseBusyError(error)) {
    console.error('Database busy:', { code: getErrorCode(error), message: getErrorMessage(error) });

    return {
      status: 503, // Service Unavailable
      error: {
        code: 'DATABASE_BUSY',
        message: 'Database is busy. Please try again shortly.',
        details,
      },
    };
  }

  if (isConstraintError(error)) {
    return {
      status: 409,
      error: {
        code: 'CONSTRAINT_VIOLATION',
        message: 'The request conflicts with existing data.',
        details,
      },
    };
  }

  return {
    status: 500,
    error: {
      code: 'DATABASE_ERROR',
      message: defaultMessage,
      details,
    },
  };
}
