export enum TypesetErrorCode {
  INFEASIBLE_FIT = 'INFEASIBLE_FIT',
  DEGENERATE_BOX = 'DEGENERATE_BOX',
  UNKNOWN_FONT = 'UNKNOWN_FONT',
  MASK_CLAMPED_TO_ZERO = 'MASK_CLAMPED_TO_ZERO',
  INVALID_BOX = 'INVALID_BOX',
  REGION_NOT_FOUND = 'REGION_NOT_FOUND',
  INVALID_CONFIG = 'INVALID_CONFIG',
  COLLABORATOR_FAILED = 'COLLABORATOR_FAILED',
}

export interface ErrorMessage {
  code: TypesetErrorCode;
  message: string;
  recoverySuggestion?: string;
}

export class TypesetError extends Error {
  public readonly code: TypesetErrorCode;
  public readonly recoverable: boolean;

  constructor(message: string, code: TypesetErrorCode, recoverable: boolean = true) {
    super(message);
    this.name = 'TypesetError';
    this.code = code;
    this.recoverable = recoverable;
  }
}
