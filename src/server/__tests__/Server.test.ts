import { describe, test, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import { DeedServer } from '../Server.js';
import { RegistryPlatform } from '../../Platform/RegistryPlatform.js';

const lot = {
    title: 'Lot 7',
    description: 'Corner parcel',
    location: 'North Ward',
    category: 'residential',
    area: 1000,
    unit: 'sqft'
};

describe('Deed Server API', () => {
    let platform: RegistryPlatform;
    let server: DeedServer;

    beforeEach(() => {
        platform = RegistryPlatform.create();
        server = new DeedServer(platform);
    });

    test('POST /calls registers and returns the receipt', async () => {
        const res = await request(server.App)
            .post('/calls')
            .set('x-caller', 'registrar')
            .send({ operation: 'register', callId: 'reg-1', args: { ...lot, initialOwner: 'alice' } });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ ok: true, callId: 'reg-1', operation: 'register', value: 1, height: 1 });
    });

    test('Caller falls back to the body', async () => {
        await request(server.App).post('/calls').send({ operation: 'register', caller: 'alice', args: { ...lot, initialOwner: 'alice' } });
        const res = await request(server.App)
            .post('/calls')
            .send({ operation: 'transfer', caller: 'alice', args: { propertyId: 1, newOwner: 'bob', reason: 'sale', amount: 500 } });

        expect(res.status).toBe(200);
        expect(res.body.value).toBe(1);
    });

    test('Rejections map to HTTP status codes', async () => {
        await request(server.App).post('/calls').set('x-caller', 'alice').send({ operation: 'register', args: { ...lot, initialOwner: 'alice' } });

        const unauthorized = await request(server.App)
            .post('/calls')
            .set('x-caller', 'mallory')
            .send({ operation: 'transfer', args: { propertyId: 1, newOwner: 'mallory' } });
        expect(unauthorized.status).toBe(403);
        expect(unauthorized.body.error).toEqual({
            code: 'UNAUTHORIZED',
            numericCode: 1001,
            boundary: 'AUTHORIZATION',
            message: 'mallory is not the current owner'
        });

        const missing = await request(server.App).post('/calls').set('x-caller', 'alice').send({ operation: 'verify', args: { propertyId: 9 } });
        expect(missing.status).toBe(404);

        await request(server.App).post('/calls').set('x-caller', 'surveyor').send({ operation: 'verify', args: { propertyId: 1 } });
        const again = await request(server.App).post('/calls').set('x-caller', 'surveyor').send({ operation: 'verify', args: { propertyId: 1 } });
        expect(again.status).toBe(409);

        const badData = await request(server.App)
            .post('/calls')
            .set('x-caller', 'alice')
            .send({ operation: 'register', args: { ...lot, area: 0, initialOwner: 'alice' } });
        expect(badData.status).toBe(422);
    });

    test('Malformed calls are 400', async () => {
        const noCaller = await request(server.App).post('/calls').send({ operation: 'register' });
        expect(noCaller.status).toBe(400);
        expect(noCaller.body).toEqual({ error: 'Missing caller', code: 'INVALID_CALL' });

        const unknown = await request(server.App).post('/calls').set('x-caller', 'alice').send({ operation: 'demolish' });
        expect(unknown.status).toBe(400);
        expect(unknown.body).toEqual({ error: 'Unknown operation demolish', code: 'INVALID_CALL', issues: [] });
    });

    test('GET /properties/:id', async () => {
        await request(server.App).post('/calls').set('x-caller', 'alice').send({ operation: 'register', args: { ...lot, initialOwner: 'alice' } });

        const found = await request(server.App).get('/properties/1');
        expect(found.status).toBe(200);
        expect(found.body.value).toEqual({
            propertyId: 1,
            owner: 'alice',
            metadata: { ...lot, registeredAt: 1, lastModified: 1, status: 'ACTIVE' }
        });

        expect((await request(server.App).get('/properties/2')).status).toBe(404);
        expect((await request(server.App).get('/properties/abc')).status).toBe(400);
    });

    test('GET /statistics, /audit and /health', async () => {
        await request(server.App).post('/calls').set('x-caller', 'alice').send({ operation: 'register', args: { ...lot, initialOwner: 'alice' } });

        const stats = await request(server.App).get('/statistics');
        expect(stats.body.value).toEqual({ totalProperties: 1, totalTransfers: 0, totalVerified: 0, currentHeight: 1, stateVersion: 1 });

        const audit = await request(server.App).get('/audit');
        expect(audit.status).toBe(200);
        expect(audit.body).toHaveLength(1);
        expect(audit.body[0].call).toMatchObject({ operation: 'register', caller: 'alice', height: 1 });

        const health = await request(server.App).get('/health');
        expect(health.body).toEqual({ status: 'OK', height: 1, integrity: true });
    });
});
