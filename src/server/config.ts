import type { RegistryPolicy, StatusChangeAuthority } from '../registry-core/Registry.js';

/**
 * Server configuration from environment variables (.env is loaded by main.ts).
 */
export interface ServerConfig {
    port: number;
    host: string;
    dbPath: string;
    policy: RegistryPolicy;
}

const DEFAULT_PORT = 3000;

function parsePort(value: string | undefined): number {
    const port = parseInt(value || String(DEFAULT_PORT), 10);
    if (!Number.isSafeInteger(port) || port < 0 || port > 65535) {
        console.warn(`[DeedServer] Ignoring invalid PORT "${value ?? ''}"; using ${DEFAULT_PORT}`);
        return DEFAULT_PORT;
    }
    return port;
}

function parseAuthority(value: string | undefined): StatusChangeAuthority {
    return value?.toUpperCase() === 'OWNER' ? 'OWNER' : 'ANY';
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === '') return fallback;
    return !['false', '0', 'no', 'off'].includes(value.toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    return {
        port: parsePort(env.PORT),
        host: env.HOST || 'localhost',
        dbPath: env.DEED_DB_PATH || 'deeds.db',
        policy: {
            statusChangeAuthority: parseAuthority(env.STATUS_CHANGE_AUTHORITY),
            enforceGrantExpiry: parseFlag(env.ENFORCE_GRANT_EXPIRY, true),
        },
    };
}
