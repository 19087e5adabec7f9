import { errorMessage } from '../core/result.js';

export const INVALID_FILENAME_MESSAGE = 'Invalid characters in filename';

/** The `code` of a Node system error, if it has one. */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** User-facing text for a failed file write. */
export function describeWriteError(error: unknown): string {
  if (systemErrorCode(error) === 'EINVAL') {
    return INVALID_FILENAME_MESSAGE;
  }
  return errorMessage(error);
}
