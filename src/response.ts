// src/response.ts

import type { Handler, RouteParams } from './types';

export type HeaderPair = [name: string, value: string];

export type ResponseBody = string | Buffer;

// Turns a registered handler back into its URL; supplied by the app that dispatched the request.
export type UrlResolver = (handler: Handler, params?: Partial<RouteParams>) => string;

// Integer status codes get " OK" appended; pass the full "<code> <reason>" form for anything else.
export function normalizeStatus(status: string | number): string {
    return typeof status === 'number' ? `${status} OK` : status;
}

/**
 * The outbound response under construction. Handlers mutate it in place; the connection
 * serializes it once the handler resolves.
 */
export class ResponseContext {
    status: string;
    headers: HeaderPair[];
    body: ResponseBody;
    resolveUrl?: UrlResolver;

    constructor(status: string = '200 OK', body: ResponseBody = '', headers: HeaderPair[] = [['Content-Type', 'text/plain']]) {
        this.status = status;
        this.body = body;
        this.headers = headers;
    }

    get statusCode(): number {
        return Number.parseInt(this.status, 10);
    }

    getHeader(name: string): string | undefined {
        const lower = name.toLowerCase();
        for (let i = this.headers.length - 1; i >= 0; i--) {
            if (this.headers[i][0].toLowerCase() === lower) {
                return this.headers[i][1];
            }
        }
        return undefined;
    }

    // Replaces the first header with this name (case-insensitive), or appends it.
    setHeader(name: string, value: string): this {
        const lower = name.toLowerCase();
        const index = this.headers.findIndex(([existing]) => existing.toLowerCase() === lower);
        if (index === -1) {
            this.headers.push([name, value]);
        } else {
            this.headers[index] = [name, value];
        }
        return this;
    }

    // Appends without replacing; for headers that may repeat, such as Set-Cookie.
    addHeader(name: string, value: string): this {
        this.headers.push([name, value]);
        return this;
    }

    removeHeader(name: string): this {
        const lower = name.toLowerCase();
        this.headers = this.headers.filter(([existing]) => existing.toLowerCase() !== lower);
        return this;
    }

    send(text: unknown = '', status: string | number = '200 OK'): this {
        this.body = Buffer.isBuffer(text) ? text : String(text);
        this.status = normalizeStatus(status);
        return this;
    }

    json(value: unknown, status: string | number = '200 OK'): this {
        this.setHeader('Content-Type', 'application/json');
        this.body = JSON.stringify(value) ?? 'null';
        this.status = normalizeStatus(status);
        return this;
    }

    html(markup: string, status: string | number = '200 OK'): this {
        this.setHeader('Content-Type', 'text/html');
        return this.send(markup, status);
    }

    // `target` is a URL, or a handler registered on the app serving this response.
    redirect(target: string | Handler, permanent: boolean = false, params: Partial<RouteParams> = {}): this {
        let location: string;
        if (typeof target === 'string') {
            location = target;
        } else if (this.resolveUrl) {
            location = this.resolveUrl(target, params);
        } else {
            throw new Error(`Cannot redirect to handler ${target.name || '<anonymous>'} outside an app`);
        }
        this.status = permanent ? '301 Moved Permanently' : '302 Found';
        this.setHeader('Location', location);
        this.body = `Redirecting to ${location}`;
        return this;
    }
}
