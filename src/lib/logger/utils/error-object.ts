import { errorToString } from '../../error-to-string';
import { DOUBLE_EOL } from '../../constants';

/**
 * Prepare an error object for logging with an optional prefix
 */
export function prepareErrorObjectLog(prefix: string, error: unknown): string {
  const trimmed = prefix.trim();
  const prefixLine = trimmed.length > 0 ? trimmed + ':' + DOUBLE_EOL : '';

  return prefixLine + errorToString(error);
}
