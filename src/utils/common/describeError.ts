import { BaseError } from 'viem';

/**
 * @notice Turns a caught value into a one-line message safe to show or log
 * @dev viem errors are reduced to their short message; the long form embeds the request URL.
 */
export function describeError(error: unknown) {
  if (error instanceof BaseError) return error.shortMessage;
  if (error instanceof Error) return error.message;
  return String(error);
}
