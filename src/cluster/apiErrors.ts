// Kubernetes API failures carry an HTTP status in `code` and the response (often a V1Status) in `body`
interface ApiErrorLike {
  code: number;
  body?: unknown;
}

function isApiErrorLike(error: unknown): error is ApiErrorLike {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number';
}

function parseBody(body: unknown): unknown {
  if (typeof body !== 'string') return body;
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

function statusMessage(body: unknown): string | undefined {
  const parsed = parseBody(body);
  if (typeof parsed === 'string') return parsed.length > 0 ? parsed : undefined;
  if (typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string') {
    return parsed.message;
  }
  return undefined;
}

export function describeApiError(error: unknown): string {
  if (isApiErrorLike(error)) {
    const message = statusMessage(error.body);
    return message ? `${error.code} - ${message}` : `${error.code}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
