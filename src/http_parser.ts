// src/http_parser.ts

import { HTTPError, MalformedRequestError } from './types';
import type { FormFields, RequestBody } from './types';
import { RequestContext, normalizeHeaderName } from './request';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { K_MAX_BODY_LEN, K_MAX_HEADER_LEN } from './config';

const HEADER_TERMINATOR = '\r\n\r\n';

export interface ParseLimits {
    maxHeaderSize: number;
    maxBodySize: number;
}

export interface ParseOptions {
    remoteAddress?: string;
    logger?: Logger;
}

interface RequestHead {
    method: string;
    target: string;
    protocol: string;
    headers: Map<string, string>;
}

const defaultLimits: ParseLimits = { maxHeaderSize: K_MAX_HEADER_LEN, maxBodySize: K_MAX_BODY_LEN };

function parseRequestLine(line: string): [string, string, string] {
    const parts = line.split(' ');
    if (parts.length !== 3 || parts.some((part) => part === '')) {
        throw new MalformedRequestError('Malformed request line');
    }
    const [method, target, protocol] = parts;
    if (!/^HTTP\/\d\.\d$/i.test(protocol)) {
        throw new MalformedRequestError('Malformed request line');
    }
    const version = protocol.toUpperCase();
    if (version !== 'HTTP/1.1' && version !== 'HTTP/1.0') {
        throw new HTTPError(505, 'HTTP Version Not Supported');
    }
    return [method.toUpperCase(), target, version];
}

// Lines without a colon are not headers and are skipped.
function parseHeader(line: string): [string, string] | null {
    const index = line.indexOf(':');
    if (index === -1) {
        return null;
    }
    const key = normalizeHeaderName(line.substring(0, index));
    const value = line.substring(index + 1).trim();
    return [key, value];
}

// Request line plus headers, up to the first empty line.
function parseHead(text: string): RequestHead {
    const lines = text.split('\r\n');
    const [method, target, protocol] = parseRequestLine(lines[0]);

    const headers = new Map<string, string>();
    for (let i = 1; i < lines.length && lines[i] !== ''; i++) {
        const header = parseHeader(lines[i]);
        if (header) {
            headers.set(header[0], header[1]);
        }
    }
    return { method, target, protocol, headers };
}

function readContentLength(headers: Map<string, string>): number {
    const raw = headers.get('CONTENT_LENGTH');
    if (raw === undefined) {
        return 0;
    }
    if (!/^\d+$/.test(raw)) {
        throw new MalformedRequestError('Invalid Content-Length');
    }
    return Number.parseInt(raw, 10);
}

/**
 * Works out how many bytes the request in `buffer` occupies, so the connection knows when to
 * stop reading. Returns null while the header block is still incomplete.
 */
export function expectedRequestLength(buffer: Buffer, limits: ParseLimits = defaultLimits): number | null {
    const headerEndIndex = buffer.indexOf(HEADER_TERMINATOR);
    if (headerEndIndex === -1) {
        if (buffer.length > limits.maxHeaderSize) {
            throw new HTTPError(413, 'Header is too large');
        }
        return null;
    }
    if (headerEndIndex > limits.maxHeaderSize) {
        throw new HTTPError(413, 'Header is too large');
    }

    const { headers } = parseHead(buffer.subarray(0, headerEndIndex).toString('latin1'));
    if (headers.get('TRANSFER_ENCODING')?.toLowerCase().includes('chunked')) {
        throw new HTTPError(501, 'Chunked transfer encoding is not supported');
    }
    const contentLength = readContentLength(headers);
    if (contentLength > limits.maxBodySize) {
        throw new HTTPError(413, 'Request body is too large');
    }
    return headerEndIndex + HEADER_TERMINATOR.length + contentLength;
}

// Decodes each run of %XX escapes as UTF-8. A stray '%' stays as it is, and invalid UTF-8
// becomes U+FFFD.
function decodePath(rawPath: string): string {
    return rawPath.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf8'));
}

// Blank values are dropped; later duplicates overwrite earlier ones.
export function parseQueryString(queryString: string): Record<string, string> {
    return Object.fromEntries([...new URLSearchParams(queryString)].filter(([, value]) => value !== ''));
}

export function parseFormBody(text: string): FormFields {
    const params = new URLSearchParams(text);
    const fields: FormFields = {};
    for (const key of new Set(params.keys())) {
        const values = params.getAll(key).filter((value) => value !== '');
        if (values.length > 0) {
            fields[key] = values.length === 1 ? values[0] : values;
        }
    }
    return fields;
}

export function decodeBody(contentType: string, raw: Buffer, logger: Logger = silentLogger): RequestBody {
    const mediaType = contentType.toLowerCase();
    if (mediaType.includes('application/x-www-form-urlencoded')) {
        return { type: 'form', value: parseFormBody(raw.toString('utf8')) };
    }
    if (mediaType.includes('application/json')) {
        if (raw.length === 0) {
            return { type: 'json', value: {} };
        }
        try {
            return { type: 'json', value: JSON.parse(raw.toString('utf8')) };
        } catch (e) {
            // Malformed JSON degrades to an empty object instead of failing the request.
            logger.debug('Ignoring malformed JSON body:', e instanceof Error ? e.message : e);
            return { type: 'json', value: {} };
        }
    }
    return { type: 'raw', value: raw };
}

// Parses one complete HTTP request out of the raw bytes read from a connection.
export function parseHttpRequest(buffer: Buffer, options: ParseOptions = {}): RequestContext {
    const headerEndIndex = buffer.indexOf(HEADER_TERMINATOR);
    const headData = headerEndIndex === -1 ? buffer : buffer.subarray(0, headerEndIndex);
    let bodyData = headerEndIndex === -1 ? Buffer.alloc(0) : buffer.subarray(headerEndIndex + HEADER_TERMINATOR.length);

    const { method, target, protocol, headers } = parseHead(headData.toString('latin1'));

    if (headers.has('CONTENT_LENGTH')) {
        bodyData = bodyData.subarray(0, readContentLength(headers));
    }

    const queryIndex = target.indexOf('?');
    const rawPath = queryIndex === -1 ? target : target.substring(0, queryIndex);
    const queryString = queryIndex === -1 ? '' : target.substring(queryIndex + 1);

    return new RequestContext({
        method,
        path: decodePath(rawPath),
        protocol,
        queryString,
        query: parseQueryString(queryString),
        headers,
        body: decodeBody(headers.get('CONTENT_TYPE') ?? '', bodyData, options.logger),
        rawBody: bodyData,
        remoteAddress: options.remoteAddress,
    });
}
