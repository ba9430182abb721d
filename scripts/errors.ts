/**
 * Typed failures for the swap pipeline.
 *
 * Every component returns a Result instead of throwing; the orchestrator
 * surfaces the first failure verbatim together with the stage it reached.
 */

export type SwapErrorKind =
  | 'ConnectivityError'
  | 'InvalidIntent'
  | 'TokenInfoUnavailable'
  | 'InsufficientBalance'
  | 'ApprovalFailed'
  | 'QuoteUnavailable'
  | 'EncodingError'
  | 'SubmissionFailed'
  | 'TransactionReverted'
  | 'ConfirmationTimeout'
  | 'UnexpectedError';

export interface SwapError {
  kind: SwapErrorKind;
  message: string;
  context: Record<string, string>;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: SwapError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: SwapErrorKind,
  message: string,
  context: Record<string, string> = {}
): Result<T> {
  return { ok: false, error: { kind, message, context } };
}

/**
 * Pull a readable message out of whatever ethers (or anything else) threw.
 * ethers v5 puts the revert reason on `reason` and nests RPC errors under `error`.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    if ('reason' in error && typeof error.reason === 'string' && error.reason.length > 0) {
      return error.reason;
    }
    return error.message;
  }
  return String(error);
}

export function formatSwapError(error: SwapError): string {
  const details = Object.entries(error.context)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
  return details ? `${error.kind}: ${error.message} (${details})` : `${error.kind}: ${error.message}`;
}
