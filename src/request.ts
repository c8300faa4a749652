// src/request.ts

import type { RequestBody } from './types';

// Header names are looked up upper-cased with `-` replaced by `_`, e.g. CONTENT_TYPE.
export function normalizeHeaderName(name: string): string {
    return name.trim().toUpperCase().replace(/-/g, '_');
}

export interface RequestInit {
    method: string;
    path: string;
    protocol: string;
    queryString: string;
    query: Record<string, string>;
    headers: Map<string, string>;
    body: RequestBody;
    rawBody: Buffer;
    remoteAddress?: string;
}

/**
 * The parsed inbound request. Built once per connection and never reused.
 *
 * Middleware annotates a request through `locals`; every other field is fixed once parsing
 * finishes.
 */
export class RequestContext {
    readonly method: string;
    readonly path: string;
    readonly protocol: string;
    readonly queryString: string;
    readonly query: Readonly<Record<string, string>>;
    readonly headers: ReadonlyMap<string, string>;
    readonly body: RequestBody;
    readonly rawBody: Buffer;
    readonly remoteAddress?: string;
    readonly locals = new Map<string, unknown>();

    constructor(init: RequestInit) {
        this.method = init.method;
        this.path = init.path;
        this.protocol = init.protocol;
        this.queryString = init.queryString;
        this.query = init.query;
        this.headers = init.headers;
        this.body = init.body;
        this.rawBody = init.rawBody;
        this.remoteAddress = init.remoteAddress;
    }

    get contentType(): string {
        return this.header('Content-Type') ?? '';
    }

    // Accepts either `Content-Type` or `CONTENT_TYPE`.
    header(name: string): string | undefined {
        return this.headers.get(normalizeHeaderName(name));
    }

    getQueryParam(key: string): string | undefined;
    getQueryParam(key: string, defaultValue: string): string;
    getQueryParam(key: string, defaultValue?: string): string | undefined {
        return Object.hasOwn(this.query, key) ? this.query[key] : defaultValue;
    }

    // Looks a field up in a form body or a JSON object body.
    getBodyParam(key: string, defaultValue?: unknown): unknown {
        const { body } = this;
        if (body.type === 'form') {
            return Object.hasOwn(body.value, key) ? body.value[key] : defaultValue;
        }
        if (body.type === 'json' && typeof body.value === 'object' && body.value !== null && !Array.isArray(body.value)) {
            const fields: object = body.value;
            if (Object.hasOwn(fields, key)) {
                return Reflect.get(fields, key);
            }
        }
        return defaultValue;
    }
}
