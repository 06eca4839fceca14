/**
 * Application constants
 */

/**
 * HTTP verbs recognized as method keys in the schema tree
 */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

/**
 * Verbs whose non-path parameters travel in the query string
 */
export const QUERY_PARAMETER_METHODS: readonly HttpMethod[] = ['GET', 'DELETE'];

export const OPENAPI_VERSION = '3.0.3';

export const SCHEMA_REF_PREFIX = '#/components/schemas/';

/**
 * Error responses attached to every operation
 */
export const ERROR_RESPONSES = {
  400: 'Bad Request - Invalid input parameters or malformed request',
  401: 'Unauthorized - Authentication required or invalid credentials',
  403: 'Forbidden - Insufficient permissions for the requested operation',
  404: 'Not Found - Requested resource does not exist',
  422: 'Unprocessable Entity - Request is well-formed but contains semantic errors',
  500: 'Internal Server Error - Unexpected server error',
  503: 'Service Unavailable - Service temporarily unavailable',
} as const;

export const DEFAULTS = {
  EVALUATOR_TIMEOUT_MS: 60000,
  // apidoc.js for a full cluster evaluates to tens of megabytes of JSON
  EVALUATOR_MAX_BUFFER_BYTES: 256 * 1024 * 1024,
  CACHE_MAX_ENTRIES: 8,
  SERVER_HOST: 'localhost',
} as const;

/**
 * Path item key for each verb
 */
export const PATH_ITEM_KEYS = {
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  DELETE: 'delete',
  PATCH: 'patch',
} as const satisfies Record<HttpMethod, string>;
