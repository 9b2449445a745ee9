/**
 * User-facing error messages returned in the structured error body.
 */

export const BACKEND_ERROR_MESSAGE = 'Something went wrong on our side. Please try again later.';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid payload.';

export const MALFORMED_JSON_MESSAGE = 'Malformed JSON body.';

export const NOT_FOUND_MESSAGE = 'Resource not found.';

export const TOO_MANY_REQUESTS_MESSAGE = 'Too many requests.';
