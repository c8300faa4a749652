// src/config.ts

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;
export const K_MAX_HEADER_LEN = 8 * 1024; // 8KB
export const K_MAX_BODY_LEN = 1024 * 1024; // 1MB

export interface ServerConfig {
    host: string;
    port: number;
    maxHeaderSize: number;
    maxBodySize: number;
    // 0 leaves concurrency unbounded.
    maxConnections: number;
}

export const defaultConfig: Readonly<ServerConfig> = {
    host: DEFAULT_HOST,
    port: DEFAULT_PORT,
    maxHeaderSize: K_MAX_HEADER_LEN,
    maxBodySize: K_MAX_BODY_LEN,
    maxConnections: 0,
};

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number, max: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw.trim());
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new Error(`Invalid ${name}: expected an integer between ${min} and ${max}, got "${raw}"`);
    }
    return value;
}

/**
 * Builds the server configuration from environment variables, filling the rest from defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<ServerConfig> = {}): ServerConfig {
    const fromEnv: ServerConfig = {
        host: env.HOST?.trim() || defaultConfig.host,
        port: readInteger(env, 'PORT', defaultConfig.port, 0, 65535),
        maxHeaderSize: readInteger(env, 'MAX_HEADER_SIZE', defaultConfig.maxHeaderSize, 1, Number.MAX_SAFE_INTEGER),
        maxBodySize: readInteger(env, 'MAX_BODY_SIZE', defaultConfig.maxBodySize, 0, Number.MAX_SAFE_INTEGER),
        maxConnections: readInteger(env, 'MAX_CONNECTIONS', defaultConfig.maxConnections, 0, Number.MAX_SAFE_INTEGER),
    };
    return { ...fromEnv, ...overrides };
}
