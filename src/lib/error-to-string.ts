import { EOL, INDENT } from './constants';

function safeStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'object':
      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    default:
      return String(value);
  }
}

function indentLines(text: string): string {
  return text
    .split(EOL)
    .map((line) => INDENT + line)
    .join(EOL);
}

/**
 * Renders an error (or anything thrown) as `Key: Value` lines.
 *
 * Understands the `errPrefix` / `errType` / `errCode` / `additionalInfo`
 * convention used by this package's errors, nested `cause` chains, and
 * `sensitiveFieldNames` for masking additional info values.
 */
export function errorToString(error: unknown, includeStack = true): string {
  if (!error || typeof error !== 'object') {
    return `Value: ${safeStringify(error)}`;
  }

  const err: Record<string, unknown> = { ...error };

  // Error's own properties are not enumerable, so spread misses them
  if (error instanceof Error) {
    err['name'] = error.name;
    err['message'] = error.message;
    err['stack'] = error.stack;
    err['cause'] = error.cause;
  }

  const lines: string[] = [];
  const addRow = (key: string, value: unknown): void => {
    if (value !== undefined && value !== null && value !== '') {
      lines.push(`${key}: ${safeStringify(value)}`);
    }
  };

  addRow('Message', err['message']);
  addRow('Name', err['name']);
  addRow('Code', err['code']);
  addRow('Errno', err['errno']);
  addRow('Prefix', err['errPrefix']);
  addRow('errType', err['errType']);
  addRow('errCode', err['errCode']);

  const additionalInfo = err['additionalInfo'];

  if (additionalInfo && typeof additionalInfo === 'object') {
    const sensitive = Array.isArray(err['sensitiveFieldNames'])
      ? err['sensitiveFieldNames']
      : [];

    for (const [key, value] of Object.entries(additionalInfo)) {
      addRow(
        `AdditionalInfo.${key}`,
        sensitive.includes(key) ? '***' : value,
      );
    }
  }

  if (err['cause'] !== undefined) {
    lines.push('Cause:');
    lines.push(indentLines(errorToString(err['cause'], false)));
  }

  if (includeStack && typeof err['stack'] === 'string') {
    lines.push('Stack:');
    lines.push(indentLines(err['stack']));
  }

  return lines.join(EOL);
}
