// src/http_writer.ts

import type { Socket } from 'net';
import { STATUS_CODES } from 'http';
import { ResponseContext } from './response';
import type { HeaderPair, ResponseBody } from './response';

function toBuffer(body: ResponseBody): Buffer {
    return typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
}

export function reasonPhrase(statusCode: number): string {
    return STATUS_CODES[statusCode] ?? 'Error';
}

/**
 * Frames a status line, headers and body into the bytes written to the socket.
 *
 * Headers keep the order they were given in. `Content-Length` is added from the body's byte
 * length unless already present, and `Connection: close` is always appended since every
 * connection carries exactly one request.
 */
export function buildHttpResponse(status: string, headers: readonly HeaderPair[], body: ResponseBody): Buffer {
    const payload = toBuffer(body);
    const headerLines: string[] = [`HTTP/1.1 ${status}`];

    for (const [name, value] of headers) {
        headerLines.push(`${name}: ${value}`);
    }
    if (!headers.some(([name]) => name.toLowerCase() === 'content-length')) {
        headerLines.push(`Content-Length: ${payload.length}`);
    }
    headerLines.push('Connection: close');

    const headerString = headerLines.join('\r\n') + '\r\n\r\n';
    return Buffer.concat([Buffer.from(headerString, 'utf8'), payload]);
}

export function serializeResponse(response: ResponseContext): Buffer {
    return buildHttpResponse(response.status, response.headers, response.body);
}

// A two-line HTML page naming the status, with the message written in as given.
export function errorResponse(statusCode: number, message: string): ResponseContext {
    const status = `${statusCode} ${reasonPhrase(statusCode)}`;
    const body = `<h1>${status}</h1>\n<p>${message}</p>`;
    return new ResponseContext(status, body, [['Content-Type', 'text/html']]);
}

// Error pages share the framing of every other response.
export function buildErrorResponse(statusCode: number, message: string): Buffer {
    return serializeResponse(errorResponse(statusCode, message));
}

// Writes the response and closes the connection once it has been flushed.
export function writeHttpResponse(socket: Socket, payload: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
        if (socket.destroyed || !socket.writable) {
            reject(new Error('Socket is no longer writable'));
            return;
        }
        socket.once('error', reject);
        socket.end(payload, () => {
            socket.removeListener('error', reject);
            resolve();
        });
    });
}
