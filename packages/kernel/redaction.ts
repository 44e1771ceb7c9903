/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to log metadata.
 * Documents carry personal data (user emails), so those keys are masked too.
 */

// Patterns for detecting sensitive fields (by key name)
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^authorization$/i,
  /^cookie$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
];

// Keys that are masked rather than dropped
const MASKED_FIELD_PATTERNS: readonly RegExp[] = [
  /^e-?mail$/i,
];

// Patterns for detecting sensitive values (by content)
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^[a-zA-Z0-9_-]+\.eyJ/,         // JWT token
  /^Bearer\s+[a-zA-Z0-9_-]+/,     // Bearer token
  /^Basic\s+[a-zA-Z0-9=]+$/,      // Basic auth
  /^ApiKey\s+[a-zA-Z0-9=]+$/,     // Elasticsearch API key header
];

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Check if a value looks like sensitive data
 */
export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive value, showing only first 2 and last 2 characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.substring(0, 2) + '****' + value.substring(value.length - 2);
}

/** Type for sanitized output */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 */
export function sanitizeForLogging(data: unknown, depth = 0, maxDepth = 10): SanitizedData {
  if (depth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return isSensitiveValue(data) ? maskValue(data) : data;
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (typeof data === 'function' || typeof data === 'symbol') {
    return `[${typeof data}]`;
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeForLogging(item, depth + 1, maxDepth));
  }

  const sanitized: Record<string, SanitizedData> = {};
  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveField(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (MASKED_FIELD_PATTERNS.some(pattern => pattern.test(key))) {
      sanitized[key] = typeof value === 'string' ? maskValue(value) : '[MASKED]';
    } else {
      sanitized[key] = sanitizeForLogging(value, depth + 1, maxDepth);
    }
  }
  return sanitized;
}

/**
 * Sanitize URL for logging by redacting credentials embedded in it.
 * Elasticsearch node URLs may carry basic-auth userinfo.
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      parsed.username = '***';
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return '[Invalid URL]';
  }
}
