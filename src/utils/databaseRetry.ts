import { getErrorCode, isDatabaseBusyError } from './dbErrorHandler';

export const withRetry = async <T>(
    operation: () => Promise<T> | T,
    maxRetries = 3,
    delayMs = 50
  ): Promise<T> => {
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        // Only a busy or locked database is worth another attempt
        if (!isDatabaseBusyError(error) || attempt === maxRetries) {
          throw error;
        }

        console.warn(`⚠️  Database busy (attempt ${attempt}/${maxRetries}), retrying in ${delayMs * attempt}ms...`, {
          code: getErrorCode(error),
        });

        const backoffDelay = delayMs * attempt + Math.random() * delayMs;
        await new Promise(resolve => setTimeout(resolve, backoffDelay));
      }
    }

    throw lastError ?? new Error('Max retries exceeded');
  };
