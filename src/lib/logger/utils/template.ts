const PLACEHOLDER_PATTERN = /{{\s*([\w.]+)\s*}}/g;

function lookup(params: Record<string, unknown>, path: string): unknown {
  let current: unknown = params;

  for (const part of path.split('.')) {
    if (current === null || typeof current !== 'object' || !(part in current)) {
      return undefined;
    }

    current = Reflect.get(current, part);
  }

  return current;
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map(stringify).join(', ');
  }

  if (value instanceof Error) {
    return value.message;
  }

  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }

  return String(value);
}

/**
 * Fill `{{key}}` / `{{nested.key}}` placeholders from params.
 * Missing or null values render as the fallback.
 */
export function renderTemplate(
  template: string,
  params: Record<string, unknown>,
  fallback = '(null)',
): string {
  if (!template.includes('{{')) {
    return template;
  }

  return template.replace(PLACEHOLDER_PATTERN, (_match, path: string) => {
    const value = lookup(params, path);
    return value === undefined || value === null ? fallback : stringify(value);
  });
}
