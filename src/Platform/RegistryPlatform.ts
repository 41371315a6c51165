import { randomUUID } from 'crypto';
import { z } from 'zod';
import { DeedRegistry } from '../registry-core/Registry.js';
import type { Receipt, RegistryPolicy } from '../registry-core/Registry.js';
import type { Rejection } from '../registry-core/L0/Guards.js';
import type { AccountID, Height } from '../registry-core/L0/Ontology.js';
import { decodeArgs, isMutating, isOperation } from '../registry-core/L4/Calls.js';
import type { ArgMap, OperationName } from '../registry-core/L4/Calls.js';
import { dispatch } from '../registry-core/L4/Dispatch.js';
import { AuditLog } from '../registry-core/L5/Audit.js';
import type { Evidence, RecordedCall } from '../registry-core/L5/Audit.js';
import { ReplayEngine } from '../registry-core/L0/Replay.js';
import type { ReplayReport } from '../registry-core/L0/Replay.js';
import { HeightClock } from './HeightClock.js';
import type { IEventStore, IHeightSource } from './Ports.js';
import { InfrastructureError, InvalidCallError, translateFault } from './Errors.js';

/**
 * The call envelope: (operation name, arguments, caller identity).
 */
export interface CallEnvelope {
    callId?: string;
    operation: string;
    args?: unknown;
    caller: AccountID;
}

export type CallReceipt =
    | { ok: true; callId: string; operation: OperationName; value: unknown; height: Height }
    | { ok: false; callId: string; operation: OperationName; error: Rejection; height: Height };

const EnvelopeSchema = z.object({
    callId: z.string().min(1).optional(),
    operation: z.string().min(1),
    args: z.unknown().optional(),
    caller: z.string()
});

export interface PlatformOptions {
    store?: IEventStore;
    policy?: Partial<RegistryPolicy>;
    clock?: IHeightSource;
}

/**
 * RegistryPlatform: the call-based interface to the registry.
 * Calls are decided one at a time; each mutating call runs at a fresh height
 * and leaves one evidence entry, committed or rejected.
 */
export class RegistryPlatform {
    private queue: Promise<unknown> = Promise.resolve();
    private seenCalls: Set<string> = new Set();

    constructor(
        private readonly registry: DeedRegistry,
        private readonly audit: AuditLog,
        private readonly clock: IHeightSource
    ) { }

    public static create(options: PlatformOptions = {}): RegistryPlatform {
        return new RegistryPlatform(
            new DeedRegistry(options.policy),
            new AuditLog(options.store),
            options.clock ?? new HeightClock()
        );
    }

    public get Registry(): DeedRegistry { return this.registry; }
    public get Audit(): AuditLog { return this.audit; }
    public get Clock(): IHeightSource { return this.clock; }

    /**
     * Queues a call behind every earlier one. A failure is reported to this
     * submitter only; later calls still run.
     */
    public submit(envelope: unknown): Promise<CallReceipt> {
        const run = this.queue.then(() => this.execute(envelope));
        this.queue = run.then(() => undefined, () => undefined);
        return run;
    }

    private async execute(raw: unknown): Promise<CallReceipt> {
        const envelope = EnvelopeSchema.safeParse(raw);
        if (!envelope.success) {
            throw new InvalidCallError('Malformed call envelope', envelope.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
        }

        const { caller } = envelope.data;
        if (!isOperation(envelope.data.operation)) throw new InvalidCallError(`Unknown operation ${envelope.data.operation}`);
        const operation: OperationName = envelope.data.operation;

        const decoded = decodeArgs(operation, envelope.data.args);
        if (!decoded.ok) throw new InvalidCallError(`Invalid arguments for ${operation}`, decoded.issues);

        const callId = envelope.data.callId ?? randomUUID();

        if (!isMutating(envelope.data.operation)) {
            const height = this.clock.current();
            return this.toCallReceipt(callId, operation, height, this.run(operation, decoded.args, caller, height));
        }

        if (this.seenCalls.has(callId)) throw new InvalidCallError(`Call ${callId} already processed`);

        const height = this.clock.advance();
        const { result: receipt, prepared } = this.registry.State.stage(
            () => this.run(operation, decoded.args, caller, height)
        );

        // Evidence is written before the prepared state is swapped in
        const recorded: RecordedCall = { callId, operation, args: decoded.args, caller, height };
        try {
            if (receipt.ok) {
                await this.audit.append(recorded, 'SUCCESS');
            } else {
                const { code, numericCode, boundary, message } = receipt.error;
                console.warn(`[Platform] ${operation} by ${caller} rejected: ${code} (${message})`);
                await this.audit.append(recorded, 'REJECT', message, { code, numericCode, boundary });
            }
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            console.error(`[Platform] Evidence for ${callId} not recorded; ${operation} discarded`);
            throw new InfrastructureError(`Evidence for ${callId} could not be recorded`, message);
        }

        if (prepared) {
            try {
                this.registry.State.apply(prepared);
            } catch (e) {
                throw translateFault(e);
            }
        }
        this.seenCalls.add(callId);

        return this.toCallReceipt(callId, operation, height, receipt);
    }

    private run<O extends OperationName>(operation: O, args: ArgMap[O], caller: AccountID, height: Height): Receipt<unknown> {
        try {
            return dispatch(this.registry, operation, args, { caller, height });
        } catch (e) {
            throw translateFault(e);
        }
    }

    private toCallReceipt(callId: string, operation: OperationName, height: Height, receipt: Receipt<unknown>): CallReceipt {
        return receipt.ok
            ? { ok: true, callId, operation, value: receipt.value, height }
            : { ok: false, callId, operation, error: receipt.error, height };
    }

    /**
     * Rebuilds registry state from the audit log. Must run before the first call.
     */
    public async restore(): Promise<ReplayReport> {
        if (this.registry.State.current.version !== 0) {
            throw new InvalidCallError('Restore requires a fresh registry');
        }
        let report: ReplayReport;
        try {
            report = await new ReplayEngine().replay(this.audit, this.registry);
        } catch (e) {
            throw translateFault(e);
        }
        for (const entry of await this.audit.getHistory()) {
            this.seenCalls.add(entry.call.callId);
        }
        this.clock.resumeFrom(report.lastHeight);
        return report;
    }

    public async history(): Promise<Evidence[]> {
        return this.audit.getHistory();
    }

    public async verifyIntegrity(): Promise<boolean> {
        return this.registry.State.verifyIntegrity() && (await this.audit.verifyChain());
    }
}
