// src/http_handler.ts

import { HTTPError, NotFoundError, extractErrorMessage } from './types';
import type { Middleware } from './types';
import type { RequestContext } from './request';
import { ResponseContext } from './response';
import type { UrlResolver } from './response';
import type { RouteTable } from './route_table';
import { errorResponse } from './http_writer';
import type { Logger } from './logger';

export interface Dispatcher {
    routes: RouteTable;
    middlewares: readonly Middleware[];
    logger: Logger;
    urlFor?: UrlResolver;
}

async function runMiddlewares(middlewares: readonly Middleware[], request: RequestContext): Promise<void> {
    for (const middleware of middlewares) {
        await middleware(request);
    }
}

// Maps anything thrown while serving a request to an error page.
export function responseForError(error: unknown): ResponseContext {
    if (error instanceof HTTPError) {
        return errorResponse(error.statusCode, error.message);
    }
    return errorResponse(500, extractErrorMessage(error, 'Internal Server Error'));
}

// Global middleware, route lookup, route middleware, then the handler.
export async function handleRequest(request: RequestContext, { routes, middlewares, logger, urlFor }: Dispatcher): Promise<ResponseContext> {
    logger.debug(`- Handling request: ${request.method} ${request.path}`);

    try {
        await runMiddlewares(middlewares, request);

        const resolved = routes.resolve(request.path, request.method);
        if (!resolved) {
            throw new NotFoundError('Route not found');
        }

        await runMiddlewares(resolved.middlewares, request);

        const response = new ResponseContext();
        response.resolveUrl = urlFor;
        await resolved.handler(request, response, resolved.params);
        return response;
    } catch (e) {
        if (!(e instanceof HTTPError)) {
            logger.error(`Error while handling ${request.method} ${request.path}:`, e);
        }
        return responseForError(e);
    }
}
