/**
 * Endpoint model types
 */

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * A single path + method pair declared by an API specification.
 * Two endpoints are the same endpoint when both fields are equal.
 */
export interface Endpoint {
  readonly path: string;
  readonly method: HttpMethod;
}
