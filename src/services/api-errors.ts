/**
 * External API Error Classes
 *
 * FAIL-FAST: a non-success status aborts the call chain it belongs to.
 * Nothing here is retried.
 */

type ApiErrorCategory =
  | 'REGISTRY_API_ERROR'
  | 'REGISTRY_SERVER_ERROR'
  | 'REGISTRY_MALFORMED_RESPONSE'
  | 'LITERATURE_API_ERROR'
  | 'LITERATURE_SERVER_ERROR'
  | 'LITERATURE_MALFORMED_RESPONSE';

/** Response bodies are truncated to this many characters in messages */
export const MAX_BODY_SNIPPET = 500;

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly category: ApiErrorCategory,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class RegistryAPIError extends ApiError {
  constructor(message: string, statusCode?: number, malformed = false) {
    super(
      message,
      malformed
        ? 'REGISTRY_MALFORMED_RESPONSE'
        : statusCode !== undefined && statusCode >= 500
          ? 'REGISTRY_SERVER_ERROR'
          : 'REGISTRY_API_ERROR',
      statusCode
    );
    this.name = 'RegistryAPIError';
  }
}

export class LiteratureAPIError extends ApiError {
  constructor(message: string, statusCode?: number, malformed = false) {
    super(
      message,
      malformed
        ? 'LITERATURE_MALFORMED_RESPONSE'
        : statusCode !== undefined && statusCode >= 500
          ? 'LITERATURE_SERVER_ERROR'
          : 'LITERATURE_API_ERROR',
      statusCode
    );
    this.name = 'LiteratureAPIError';
  }
}

/**
 * Read a failed response body for an error message, truncated
 */
export async function bodySnippet(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, MAX_BODY_SNIPPET);
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}
