import assert from 'node:assert/strict';
import { describe, it, mock } from 'node:test';

import { handleRequest, responseForError } from './http_handler';
import { parseHttpRequest } from './http_parser';
import { RouteTable } from './route_table';
import { HTTPError } from './types';
import type { Middleware } from './types';
import { createLogger, silentLogger } from './logger';

function get(path: string) {
    return parseHttpRequest(Buffer.from(`GET ${path} HTTP/1.1\r\nHost: x\r\n\r\n`));
}

describe('handleRequest', () => {
    it('runs global middleware, route middleware, then the handler', async () => {
        const calls: string[] = [];
        const routes = new RouteTable();
        const routeMiddleware: Middleware = () => {
            calls.push('route');
        };
        routes.register('/users/<int:id>', 'GET', (_request, response, params) => {
            calls.push(`handler:${params.id}`);
            response.send('ok');
        }, [routeMiddleware]);

        const globalMiddleware: Middleware = async () => {
            calls.push('global');
        };
        const response = await handleRequest(get('/users/5'), {
            routes,
            middlewares: [globalMiddleware],
            logger: silentLogger,
        });

        assert.deepEqual(calls, ['global', 'route', 'handler:5']);
        assert.equal(response.status, '200 OK');
        assert.equal(response.body, 'ok');
    });

    it('lets middleware annotate the request for the handler', async () => {
        const routes = new RouteTable();
        routes.register('/whoami', 'GET', (request, response) => {
            response.send(String(request.locals.get('user')));
        });
        const authenticate: Middleware = (request) => {
            request.locals.set('user', 'ada');
        };

        const response = await handleRequest(get('/whoami'), { routes, middlewares: [authenticate], logger: silentLogger });
        assert.equal(response.body, 'ada');
    });

    it('answers 404 when no route matches, after global middleware ran', async () => {
        const globalMiddleware = mock.fn();
        const response = await handleRequest(get('/missing'), {
            routes: new RouteTable(),
            middlewares: [globalMiddleware],
            logger: silentLogger,
        });

        assert.equal(globalMiddleware.mock.callCount(), 1);
        assert.equal(response.status, '404 Not Found');
        assert.equal(response.body, '<h1>404 Not Found</h1>\n<p>Route not found</p>');
        assert.equal(response.getHeader('Content-Type'), 'text/html');
    });

    it('turns handler errors into a 500 carrying the message and logs them', async () => {
        const error = mock.fn();
        const routes = new RouteTable();
        routes.register('/boom', 'GET', async () => {
            throw new Error('database unavailable');
        });

        const response = await handleRequest(get('/boom'), {
            routes,
            middlewares: [],
            logger: createLogger({ error, debug: () => {} }),
        });

        assert.equal(response.status, '500 Internal Server Error');
        assert.equal(response.body, '<h1>500 Internal Server Error</h1>\n<p>database unavailable</p>');
        assert.equal(error.mock.callCount(), 1);
    });

    it('carries markup characters of the error message into the page unchanged', async () => {
        const routes = new RouteTable();
        const message = 'expected <int> & got "x"';
        routes.register('/convert', 'GET', () => {
            throw new Error(message);
        });

        const response = await handleRequest(get('/convert'), { routes, middlewares: [], logger: silentLogger });
        assert.ok(String(response.body).includes(message));
        assert.equal(response.body, `<h1>500 Internal Server Error</h1>\n<p>${message}</p>`);
    });

    it('uses the status of HTTP errors thrown by middleware', async () => {
        const routes = new RouteTable();
        const handler = mock.fn();
        routes.register('/admin', 'GET', handler, [() => {
            throw new HTTPError(403, 'Admins only');
        }]);

        const response = await handleRequest(get('/admin'), { routes, middlewares: [], logger: silentLogger });
        assert.equal(response.status, '403 Forbidden');
        assert.equal(response.body, '<h1>403 Forbidden</h1>\n<p>Admins only</p>');
        assert.equal(handler.mock.callCount(), 0);
    });
});

describe('responseForError', () => {
    it('describes non-Error throws with a generic message', () => {
        assert.equal(responseForError(undefined).body, '<h1>500 Internal Server Error</h1>\n<p>Internal Server Error</p>');
        assert.equal(responseForError('plain text').body, '<h1>500 Internal Server Error</h1>\n<p>plain text</p>');
    });
});
