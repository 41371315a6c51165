import express from 'express';
import type { Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server as HttpServer } from 'http';
import { RegistryPlatform } from '../Platform/RegistryPlatform.js';
import type { CallReceipt } from '../Platform/RegistryPlatform.js';
import { InvalidCallError, PlatformError } from '../Platform/Errors.js';
import { ErrorCode } from '../registry-core/Errors.js';

const REJECTION_STATUS: Record<ErrorCode, number> = {
    [ErrorCode.UNAUTHORIZED]: 403,
    [ErrorCode.PROPERTY_NOT_FOUND]: 404,
    [ErrorCode.TRANSFER_NOT_FOUND]: 404,
    [ErrorCode.DOCUMENT_NOT_FOUND]: 404,
    [ErrorCode.GRANT_NOT_FOUND]: 404,
    [ErrorCode.ALREADY_VERIFIED]: 409,
    [ErrorCode.INVALID_STATUS]: 409,
    [ErrorCode.INVALID_OWNER]: 422,
    [ErrorCode.INVALID_PROPERTY_DATA]: 422,
    [ErrorCode.INVALID_ACCESS_LEVEL]: 422
};

export function statusFor(receipt: CallReceipt): number {
    return receipt.ok ? 200 : REJECTION_STATUS[receipt.error.code];
}

function callerOf(req: Request): string | undefined {
    const header = req.header('x-caller');
    if (header !== undefined && header !== '') return header;
    const body: unknown = req.body;
    if (typeof body === 'object' && body !== null && 'caller' in body && typeof body.caller === 'string') {
        return body.caller;
    }
    return undefined;
}

function sendError(res: Response, e: unknown): void {
    if (e instanceof InvalidCallError) {
        res.status(400).json({ error: e.message, code: e.code, ...e.metadata });
        return;
    }
    const message = e instanceof Error ? e.message : String(e);
    const code = e instanceof PlatformError ? e.code : 'INTERNAL';
    console.error(`[DeedServer] ${code}: ${message}`);
    res.status(500).json({ error: message, code });
}

export class DeedServer {
    private app: express.Express;
    private listener: HttpServer | null = null;

    constructor(private readonly platform: RegistryPlatform, private readonly port: number = 3000, private readonly host: string = 'localhost') {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public get App(): express.Express { return this.app; }

    /**
     * Replays the audit log into the registry, then starts listening.
     */
    public async start(): Promise<HttpServer> {
        console.log('[DeedServer] Replaying history...');
        const report = await this.platform.restore();
        console.log(`[DeedServer] Registry restored at height ${report.lastHeight}.`);

        return new Promise((resolve) => {
            const listener = this.app.listen(this.port, this.host, () => {
                console.log(`[DeedServer] Listening on http://${this.host}:${this.port}`);
                resolve(listener);
            });
            this.listener = listener;
        });
    }

    public async close(): Promise<void> {
        const listener = this.listener;
        if (!listener) return;
        this.listener = null;
        await new Promise<void>((resolve, reject) => {
            listener.close((err) => (err ? reject(err) : resolve()));
        });
    }

    private async read(res: Response, operation: string, args: Record<string, unknown>, caller = ''): Promise<void> {
        try {
            const receipt = await this.platform.submit({ operation, args, caller });
            res.status(statusFor(receipt)).json(receipt);
        } catch (e) {
            sendError(res, e);
        }
    }

    private setupRoutes() {
        this.app.use((req, _res, next) => {
            console.log(`[DeedServer] ${req.method} ${req.url}`);
            next();
        });

        this.app.post('/calls', async (req, res) => {
            const caller = callerOf(req);
            if (caller === undefined) {
                res.status(400).json({ error: 'Missing caller', code: 'INVALID_CALL' });
                return;
            }
            const body: unknown = req.body;
            const envelope = typeof body === 'object' && body !== null ? { ...body, caller } : { caller };
            try {
                const receipt = await this.platform.submit(envelope);
                res.status(statusFor(receipt)).json(receipt);
            } catch (e) {
                sendError(res, e);
            }
        });

        this.app.get('/properties/:id', async (req, res) => {
            const propertyId = Number(req.params.id);
            if (!Number.isSafeInteger(propertyId)) {
                res.status(400).json({ error: `Invalid property id ${req.params.id}`, code: 'INVALID_CALL' });
                return;
            }
            await this.read(res, 'getPropertyInfo', { propertyId }, callerOf(req));
        });

        this.app.get('/statistics', async (req, res) => {
            await this.read(res, 'getSystemStatistics', {}, callerOf(req));
        });

        this.app.get('/audit', async (_req, res) => {
            try {
                res.json(await this.platform.history());
            } catch (e) {
                sendError(res, e);
            }
        });

        this.app.get('/health', async (_req, res) => {
            try {
                const integrity = await this.platform.verifyIntegrity();
                res.json({ status: 'OK', height: this.platform.Clock.current(), integrity });
            } catch (e) {
                sendError(res, e);
            }
        });
    }
}
