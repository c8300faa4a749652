// src/types.ts

import type { RequestContext } from './request';
import type { ResponseContext } from './response';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export type HTTPMethod = (typeof HTTP_METHODS)[number];

// Value of one extracted path parameter. `int` and `float` placeholders yield numbers.
export type ParamValue = string | number;

export type RouteParams = Record<string, ParamValue>;

export type FormFields = Record<string, string | string[]>;

// The request body, decoded according to its Content-Type.
export type RequestBody =
    | { type: 'form'; value: FormFields }
    | { type: 'json'; value: unknown }
    | { type: 'raw'; value: Buffer };

// A handler mutates the response in place; resolving signals the response is ready.
export type Handler = (
    request: RequestContext,
    response: ResponseContext,
    params: RouteParams,
) => void | Promise<void>;

// Middleware runs before the handler and may annotate the request, never answer it.
export type Middleware = (request: RequestContext) => void | Promise<void>;

export interface Route {
    readonly pattern: string;
    readonly method: HTTPMethod;
    readonly handler: Handler;
    readonly middlewares: readonly Middleware[];
}

export interface ResolvedRoute {
    handler: Handler;
    params: RouteParams;
    middlewares: readonly Middleware[];
}

export function isHTTPMethod(value: string): value is HTTPMethod {
    return (HTTP_METHODS as readonly string[]).includes(value);
}

// A custom error class for HTTP-specific errors,
// allowing us to send a proper HTTP error response.
export class HTTPError extends Error {
    constructor(public statusCode: number, message: string) {
        super(message);
        this.name = 'HTTPError';
    }
}

// Unreadable request bytes. Not an HTTPError: the connection answers it with a 500.
export class MalformedRequestError extends Error {
    constructor(message: string = 'Malformed request') {
        super(message);
        this.name = 'MalformedRequestError';
    }
}

export class NotFoundError extends HTTPError {
    constructor(message: string = 'Route not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

// Raised at registration time; never a per-request condition.
export class MiddlewareConfigurationError extends Error {
    constructor(message: string = 'Middlewares must be functions') {
        super(message);
        this.name = 'MiddlewareConfigurationError';
    }
}

/**
 * Extracts an error message from an unknown thrown value
 */
export function extractErrorMessage(error: unknown, defaultMessage: string = 'An error occurred'): string {
    if (error instanceof Error) {
        return error.message || defaultMessage;
    }
    if (typeof error === 'string' && error) {
        return error;
    }
    if (typeof error === 'object' && error !== null && 'message' in error) {
        const { message } = error;
        if (typeof message === 'string') {
            return message;
        }
    }
    return defaultMessage;
}
