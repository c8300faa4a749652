// src/server.ts

import * as net from 'net';
import type { AddressInfo } from 'net';
import { expectedRequestLength, parseHttpRequest } from './http_parser';
import { serializeResponse, writeHttpResponse } from './http_writer';
import { responseForError } from './http_handler';
import type { RequestContext } from './request';
import type { ResponseContext } from './response';
import type { ServerConfig } from './config';
import type { Logger } from './logger';

export type RequestListener = (request: RequestContext) => Promise<ResponseContext>;

/**
 * Owns the listening socket. Every accepted connection carries exactly one request: it is
 * read until the header block and the declared body have arrived, answered, then closed.
 */
export class HttpServer {
    private readonly server: net.Server;
    private readonly connections = new Set<net.Socket>();

    constructor(
        private readonly listener: RequestListener,
        private readonly config: ServerConfig,
        private readonly logger: Logger,
    ) {
        // Half-open sockets let a client shut down its side and still read the response.
        this.server = net.createServer({ allowHalfOpen: true }, (socket) => this.handleConnection(socket));
        if (config.maxConnections > 0) {
            this.server.maxConnections = config.maxConnections;
        }
        this.server.on('drop', (data?: net.DropArgument) => {
            this.logger.warn(`Connection limit reached, dropped ${data?.remoteAddress ?? 'unknown client'}`);
        });
    }

    get address(): AddressInfo | null {
        const address = this.server.address();
        return address !== null && typeof address === 'object' ? address : null;
    }

    get listening(): boolean {
        return this.server.listening;
    }

    listen(): Promise<AddressInfo> {
        const { host, port } = this.config;
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(port, host, () => {
                this.server.removeListener('error', reject);
                const address = this.address;
                if (!address) {
                    reject(new Error('Server is not bound to a TCP address'));
                    return;
                }
                this.logger.info(`Server listening on ${address.address}:${address.port}`);
                resolve(address);
            });
        });
    }

    // Stops accepting; in-flight connections finish unless `force` destroys them.
    close(force: boolean = false): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => (err ? reject(err) : resolve()));
            if (force) {
                this.destroyConnections();
            }
        });
    }

    destroyConnections(): void {
        for (const socket of this.connections) {
            socket.destroy();
        }
    }

    private handleConnection(socket: net.Socket): void {
        const peer = `${socket.remoteAddress}:${socket.remotePort}`;
        this.logger.debug(`New connection from ${peer}`);
        this.connections.add(socket);

        let buffer = Buffer.alloc(0);
        let dispatched = false;

        const dispatch = (payload: Promise<Buffer>) => {
            dispatched = true;
            socket.removeListener('data', onData);
            payload
                .then((bytes) => writeHttpResponse(socket, bytes))
                .catch((err: unknown) => {
                    this.logger.warn(`Failed to respond to ${peer}:`, err);
                    socket.destroy();
                });
        };

        const onData = (chunk: Buffer) => {
            buffer = Buffer.concat([buffer, chunk]);
            let expected: number | null;
            try {
                expected = expectedRequestLength(buffer, this.config);
            } catch (e) {
                dispatch(Promise.resolve(serializeResponse(responseForError(e))));
                return;
            }
            if (expected !== null && buffer.length >= expected) {
                dispatch(this.process(buffer.subarray(0, expected), socket));
            }
        };

        socket.on('data', onData);
        socket.on('end', () => {
            if (dispatched) {
                return;
            }
            if (buffer.length === 0) {
                socket.end();
                return;
            }
            // The client stopped sending: answer with whatever arrived.
            dispatch(this.process(buffer, socket));
        });
        socket.on('error', (err) => {
            this.logger.warn(`Socket error for ${peer}:`, err.message);
            socket.destroy();
        });
        socket.on('close', () => {
            this.connections.delete(socket);
            this.logger.debug(`Connection closed: ${peer}`);
        });
    }

    private async process(data: Buffer, socket: net.Socket): Promise<Buffer> {
        try {
            const request = parseHttpRequest(data, { remoteAddress: socket.remoteAddress, logger: this.logger });
            const response = await this.listener(request);
            this.logger.info(`${request.method} ${request.path} ${response.status}`);
            return serializeResponse(response);
        } catch (e) {
            this.logger.warn('Failed to process request:', e instanceof Error ? e.message : e);
            return serializeResponse(responseForError(e));
        }
    }
}
