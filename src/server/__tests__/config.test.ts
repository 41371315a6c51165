import { describe, test, expect } from '@jest/globals';
import { loadConfig } from '../config.js';

describe('Server configuration', () => {
    test('Defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 3000,
            host: 'localhost',
            dbPath: 'deeds.db',
            policy: { statusChangeAuthority: 'ANY', enforceGrantExpiry: true }
        });
    });

    test('Environment overrides', () => {
        const config = loadConfig({
            PORT: '8080',
            HOST: '0.0.0.0',
            DEED_DB_PATH: '/tmp/deeds-test.db',
            STATUS_CHANGE_AUTHORITY: 'owner',
            ENFORCE_GRANT_EXPIRY: 'false'
        });
        expect(config).toEqual({
            port: 8080,
            host: '0.0.0.0',
            dbPath: '/tmp/deeds-test.db',
            policy: { statusChangeAuthority: 'OWNER', enforceGrantExpiry: false }
        });
    });

    test('A non-numeric or out-of-range PORT falls back to the default', () => {
        expect(loadConfig({ PORT: 'http' }).port).toBe(3000);
        expect(loadConfig({ PORT: '70000' }).port).toBe(3000);
        expect(loadConfig({ PORT: '0' }).port).toBe(0);
    });
});
