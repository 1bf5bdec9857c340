const TAG = '[Typeset]';

export function logError(error: unknown, context?: string): void {
  if (context) {
    console.error(TAG, context, error);
  } else {
    console.error(TAG, error);
  }
}

export function logWarning(message: string, details?: Record<string, unknown>): void {
  if (details) {
    console.warn(TAG, message, details);
  } else {
    console.warn(TAG, message);
  }
}

export function logInfo(message: string, details?: Record<string, unknown>): void {
  if (details) {
    console.info(TAG, message, details);
  } else {
    console.info(TAG, message);
  }
}

/**
 * Keys already warned about. One instance lives per editing session so a
 * repeated condition (e.g. a missing font) is reported a single time.
 */
export class WarningRegistry {
  private readonly seen = new Set<string>();

  warnOnce(key: string, message: string, details?: Record<string, unknown>): boolean {
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    logWarning(message, details);
    return true;
  }

  has(key: string): boolean {
    return this.seen.has(key);
  }

  reset(): void {
    this.seen.clear();
  }
}
