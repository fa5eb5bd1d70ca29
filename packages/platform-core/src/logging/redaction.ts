// Matched against meta keys, not values
const SECRET_KEY =
  /authorization|set-cookie|api[-_]?key|token|secret|password|bearer|connection[-_]?string|(database|redis)[-_]?url/i;

export function isSecretKey(key: string): boolean {
  return SECRET_KEY.test(key);
}

/**
 * Copy of a log meta value with secret-looking keys replaced by [REDACTED].
 * Objects nested deeper than `depth` collapse to [Object].
 */
export function redact(value: unknown, depth = 4): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (depth <= 0) {
    return '[Object]';
  }
  if (Array.isArray(value)) {
    return value.map(item => redact(item, depth - 1));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, item]) => [key, isSecretKey(key) ? '[REDACTED]' : redact(item, depth - 1)])
  );
}

export function stringifyMeta(value: unknown, maxLength = 10000): string {
  let json: string;
  try {
    json = JSON.stringify(redact(value));
  } catch {
    return '[UNSERIALIZABLE]';
  }
  return json.length > maxLength ? `${json.slice(0, maxLength)}...[TRUNCATED]` : json;
}
