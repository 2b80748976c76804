export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  ActionNotFound: 'action_not_found',
  ActionAlreadyExists: 'action_already_exists',
  InvalidTransition: 'invalid_transition',
  ConfigInvalid: 'config_invalid',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Failure codes carried on ExecutionResult.error. These never surface as
 * thrown errors; every per-action failure ends in a result the caller reads.
 */
export const ExecutionFailure = {
  RollbackNotAvailable: 'rollback_not_available',
  RollbackNotImplemented: 'rollback_not_implemented',
  NoOriginalData: 'no_original_data',
  InvalidState: 'invalid_state',
  UnexpectedStatus: 'unexpected_status',
} as const;

export type ExecutionFailure = typeof ExecutionFailure[keyof typeof ExecutionFailure];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const errorMessage = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
