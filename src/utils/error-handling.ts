import { TypesetError, TypesetErrorCode, type ErrorMessage } from '@/types/typeset-errors';
import type { Bbox } from '@/types/geometry';

export const ERROR_MESSAGES: Record<TypesetErrorCode, ErrorMessage> = {
  [TypesetErrorCode.INFEASIBLE_FIT]: {
    code: TypesetErrorCode.INFEASIBLE_FIT,
    message: 'Text does not fit the box at any allowed font size.',
    recoverySuggestion: 'Enlarge the box, shorten the translation, or lower the minimum font size.',
  },
  [TypesetErrorCode.DEGENERATE_BOX]: {
    code: TypesetErrorCode.DEGENERATE_BOX,
    message: 'Box has no writable area after padding.',
    recoverySuggestion: 'Enlarge the box or reduce the inner padding.',
  },
  [TypesetErrorCode.UNKNOWN_FONT]: {
    code: TypesetErrorCode.UNKNOWN_FONT,
    message: 'Font family is not available; the default family was used.',
    recoverySuggestion: 'Register the font file or pick an installed family.',
  },
  [TypesetErrorCode.MASK_CLAMPED_TO_ZERO]: {
    code: TypesetErrorCode.MASK_CLAMPED_TO_ZERO,
    message: 'Box lies outside the image and was left out of the mask.',
    recoverySuggestion: 'Move the box back onto the page.',
  },
  [TypesetErrorCode.INVALID_BOX]: {
    code: TypesetErrorCode.INVALID_BOX,
    message: 'Box must have a positive width and height.',
    recoverySuggestion: 'Drag the box handles apart before applying the edit.',
  },
  [TypesetErrorCode.REGION_NOT_FOUND]: {
    code: TypesetErrorCode.REGION_NOT_FOUND,
    message: 'Region does not exist.',
    recoverySuggestion: 'Refresh the region list; it may have been deleted or re-detected.',
  },
  [TypesetErrorCode.INVALID_CONFIG]: {
    code: TypesetErrorCode.INVALID_CONFIG,
    message: 'Engine configuration is invalid.',
    recoverySuggestion: 'Check the configuration values against their allowed ranges.',
  },
  [TypesetErrorCode.COLLABORATOR_FAILED]: {
    code: TypesetErrorCode.COLLABORATOR_FAILED,
    message: 'An external processing step failed.',
    recoverySuggestion: 'Retry the step; the remaining regions are unaffected.',
  },
};

export function formatErrorMessage(error: unknown): ErrorMessage {
  if (error instanceof TypesetError) {
    const fallback = ERROR_MESSAGES[error.code];
    return {
      code: error.code,
      message: error.message || fallback.message,
      recoverySuggestion: fallback.recoverySuggestion,
    };
  }

  const generic = ERROR_MESSAGES[TypesetErrorCode.COLLABORATOR_FAILED];
  if (error instanceof Error) {
    return {
      code: TypesetErrorCode.COLLABORATOR_FAILED,
      message: error.message || generic.message,
      recoverySuggestion: generic.recoverySuggestion,
    };
  }

  return { ...generic };
}

export function createInvalidBoxError(box: Bbox): TypesetError {
  return new TypesetError(
    `Box must have a positive width and height (got ${box.width}x${box.height}).`,
    TypesetErrorCode.INVALID_BOX,
    true
  );
}

export function createRegionNotFoundError(id: string): TypesetError {
  return new TypesetError(`Region "${id}" does not exist.`, TypesetErrorCode.REGION_NOT_FOUND, true);
}

export function createInvalidConfigError(issues: string[]): TypesetError {
  return new TypesetError(
    `Invalid engine configuration: ${issues.join('; ')}.`,
    TypesetErrorCode.INVALID_CONFIG,
    false
  );
}

export function createCollaboratorError(step: string, cause: unknown): TypesetError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new TypesetError(`${step} failed: ${detail}`, TypesetErrorCode.COLLABORATOR_FAILED, true);
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: {
    delaysMs?: number[];
    onRetry?: (error: unknown, attempt: number) => void;
  } = {}
): Promise<T> {
  const delays = options.delaysMs ?? [250, 500, 1000];
  let attempt = 0;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      const delay = delays[attempt];
      if (delay === undefined) {
        throw error;
      }
      attempt += 1;
      options.onRetry?.(error, attempt);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
