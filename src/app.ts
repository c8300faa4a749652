// src/app.ts

import { HTTP_METHODS, MiddlewareConfigurationError } from './types';
import type { Handler, HTTPMethod, Middleware, RouteParams } from './types';
import { RouteTable } from './route_table';
import { URLPattern } from './url_pattern';
import { handleRequest } from './http_handler';
import { HttpServer } from './server';
import type { RequestContext } from './request';
import type { ResponseContext } from './response';
import { defaultConfig } from './config';
import type { ServerConfig } from './config';
import { createLogger } from './logger';
import type { Logger } from './logger';

export interface AppOptions {
    middlewares?: Middleware[];
    logger?: Partial<Logger>;
}

// Verb-named handlers grouped under one path.
export type Controller = Partial<Record<HTTPMethod, Handler>>;

/**
 * The application: global middleware plus the route table, and the entry point the server
 * hands every parsed request to.
 *
 * ```ts
 * const app = new App();
 * app.get('/greet/<name>', (req, res, { name }) => {
 *     res.send(`Hello, ${name}`);
 * });
 * await app.listen({ port: 8000 });
 * ```
 */
export class App {
    readonly routes = new RouteTable();
    readonly logger: Logger;
    private readonly middlewares: Middleware[] = [];

    constructor(options: AppOptions = {}) {
        this.logger = createLogger(options.logger);
        for (const middleware of options.middlewares ?? []) {
            this.use(middleware);
        }
    }

    use(middleware: Middleware): this {
        if (typeof middleware !== 'function') {
            throw new MiddlewareConfigurationError('Only functions can be registered as middlewares');
        }
        this.middlewares.push(middleware);
        return this;
    }

    // Returns the handler unchanged, so registration can wrap a function declaration.
    add(path: string, method: HTTPMethod, handler: Handler, middlewares: Middleware[] = []): Handler {
        this.routes.register(path, method, handler, middlewares);
        return handler;
    }

    get(path: string, handler: Handler, middlewares?: Middleware[]): Handler {
        return this.add(path, 'GET', handler, middlewares);
    }

    post(path: string, handler: Handler, middlewares?: Middleware[]): Handler {
        return this.add(path, 'POST', handler, middlewares);
    }

    put(path: string, handler: Handler, middlewares?: Middleware[]): Handler {
        return this.add(path, 'PUT', handler, middlewares);
    }

    delete(path: string, handler: Handler, middlewares?: Middleware[]): Handler {
        return this.add(path, 'DELETE', handler, middlewares);
    }

    patch(path: string, handler: Handler, middlewares?: Middleware[]): Handler {
        return this.add(path, 'PATCH', handler, middlewares);
    }

    // Registers every verb the controller defines under the same path and middlewares.
    route<C extends Controller>(path: string, controller: C, middlewares: Middleware[] = []): C {
        for (const method of HTTP_METHODS) {
            const handler = controller[method];
            if (handler) {
                this.add(path, method, handler, middlewares);
            }
        }
        return controller;
    }

    urlFor(handler: Handler, params: Partial<RouteParams> = {}): string {
        const template = this.routes.templateFor(handler);
        if (template === undefined) {
            throw new Error(`No route found for handler ${handler.name || '<anonymous>'}`);
        }
        return new URLPattern(template).build(params);
    }

    handle(request: RequestContext): Promise<ResponseContext> {
        return handleRequest(request, {
            routes: this.routes,
            middlewares: this.middlewares,
            logger: this.logger,
            urlFor: (handler, params) => this.urlFor(handler, params),
        });
    }

    async listen(config: Partial<ServerConfig> = {}): Promise<HttpServer> {
        const server = new HttpServer((request) => this.handle(request), { ...defaultConfig, ...config }, this.logger);
        await server.listen();
        return server;
    }
}
