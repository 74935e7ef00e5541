const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'key', 'authorization', 'apiKey', 'access_token'];

const MAX_LOGGED_BODY_LENGTH = 1000;

/** Redacts credentials and truncates large bodies before they reach the logs. */
export function sanitizeRequestBody(body: unknown): unknown {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return body;
  }

  const sanitized: Record<string, unknown> = { ...body };
  for (const field of SENSITIVE_FIELDS) {
    if (field in sanitized) {
      sanitized[field] = '[REDACTED]';
    }
  }

  const bodyString = JSON.stringify(sanitized);
  if (bodyString.length > MAX_LOGGED_BODY_LENGTH) {
    return {
      _truncated: true,
      _originalSize: bodyString.length,
      _preview: bodyString.substring(0, 500) + '...',
    };
  }

  return sanitized;
}
