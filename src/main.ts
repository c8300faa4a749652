// src/main.ts

import { App } from './app';
import { loadConfig } from './config';

const app = new App();

app.use((request) => {
    request.locals.set('receivedAt', Date.now());
});

app.get('/', (_request, response) => {
    response.send('barehttp is running');
});

app.get('/greet/<name>', (_request, response, { name }) => {
    response.send(`Hello, ${name}`);
});

app.get('/users/<int:id>', (_request, response, { id }) => {
    response.json({ id });
});

app.post('/echo', (request, response) => {
    if (request.body.type === 'raw') {
        response.setHeader('Content-Type', request.contentType || 'application/octet-stream');
        response.send(request.body.value);
    } else {
        response.json(request.body.value);
    }
});

async function main(): Promise<void> {
    const config = loadConfig();
    const server = await app.listen(config);
    console.log('To stop the server, press Ctrl+C');

    // --- Graceful Shutdown ---
    // The first signal waits for in-flight requests; a second one drops them.
    let closing = false;
    const gracefulShutdown = (signal: NodeJS.Signals) => {
        if (closing) {
            console.log(`\nReceived ${signal} again. Dropping open connections...`);
            server.destroyConnections();
            return;
        }
        closing = true;
        console.log(`\nReceived ${signal}. Shutting down gracefully...`);
        server.close().then(
            () => {
                console.log('Server is closed. Exiting.');
                process.exit(0);
            },
            (err: unknown) => {
                console.error('Error while closing the server:', err);
                process.exit(1);
            },
        );
    };
    process.on('SIGINT', gracefulShutdown);
    process.on('SIGTERM', gracefulShutdown);
}

main().catch((err: unknown) => {
    console.error('Failed to start server:', err);
    process.exit(1);
});
