// src/route_table.ts

import { URLPattern, hasPlaceholders } from './url_pattern';
import { MiddlewareConfigurationError, isHTTPMethod } from './types';
import type { Handler, HTTPMethod, Middleware, ResolvedRoute, Route } from './types';

interface PatternRoute extends Route {
    readonly matcher: URLPattern;
}

function assertMiddlewares(middlewares: readonly unknown[]): void {
    for (const middleware of middlewares) {
        if (typeof middleware !== 'function') {
            throw new MiddlewareConfigurationError('Only functions can be registered as middlewares');
        }
    }
}

/**
 * Literal paths live in an exact-match index keyed by path and method; templates with
 * placeholders are kept in registration order and the first one that matches wins.
 *
 * Routes are registered at startup and only read while requests are served.
 */
export class RouteTable {
    private readonly exact = new Map<string, Map<HTTPMethod, Route>>();
    private readonly patterns: PatternRoute[] = [];
    private readonly templates = new Map<Handler, string>();

    register(path: string, method: HTTPMethod, handler: Handler, middlewares: readonly Middleware[] = []): Route {
        if (typeof handler !== 'function') {
            throw new TypeError(`Handler for ${method} ${path} must be a function`);
        }
        assertMiddlewares(middlewares);

        const route: Route = { pattern: path, method, handler, middlewares: [...middlewares] };
        if (hasPlaceholders(path)) {
            this.patterns.push({ ...route, matcher: new URLPattern(path) });
        } else {
            let byMethod = this.exact.get(path);
            if (!byMethod) {
                byMethod = new Map();
                this.exact.set(path, byMethod);
            }
            // Last registration wins.
            byMethod.set(method, route);
        }
        this.templates.set(handler, path);
        return route;
    }

    resolve(path: string, method: string): ResolvedRoute | null {
        if (!isHTTPMethod(method)) {
            return null;
        }
        const exact = this.exact.get(path)?.get(method);
        if (exact) {
            return { handler: exact.handler, params: {}, middlewares: exact.middlewares };
        }
        for (const route of this.patterns) {
            if (route.method !== method) {
                continue;
            }
            const params = route.matcher.match(path);
            if (params) {
                return { handler: route.handler, params, middlewares: route.middlewares };
            }
        }
        return null;
    }

    // The template a handler was last registered under, for reverse routing.
    templateFor(handler: Handler): string | undefined {
        return this.templates.get(handler);
    }

    routes(): Route[] {
        const exact = [...this.exact.values()].flatMap((byMethod) => [...byMethod.values()]);
        return [...exact, ...this.patterns.map(({ pattern, method, handler, middlewares }) => ({ pattern, method, handler, middlewares }))];
    }
}
