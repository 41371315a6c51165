import type { DeedRegistry } from '../Registry.js';
import type { AuditLog } from '../L5/Audit.js';
import { decodeArgs, isMutating, isOperation } from '../L4/Calls.js';
import { dispatch } from '../L4/Dispatch.js';
import type { Height } from './Ontology.js';
import { FaultCode, RegistryError } from '../Errors.js';

export interface ReplayReport {
    applied: number;
    skipped: number;
    lastHeight: Height;
}

export class ReplayEngine {
    /**
     * Re-executes every committed call of the log against `registry`, at the
     * height and caller it was recorded with. Rejected calls are skipped.
     * WARNING: This should be used on a fresh registry instance.
     */
    public async replay(log: AuditLog, registry: DeedRegistry): Promise<ReplayReport> {
        const history = await log.getHistory();

        console.log(`[ReplayEngine] Starting replay of ${history.length} events...`);

        if (!(await log.verifyChain())) {
            throw new RegistryError(FaultCode.INTEGRITY_BREACH, 'Audit chain failed verification; refusing to replay');
        }

        const report: ReplayReport = { applied: 0, skipped: 0, lastHeight: 0 };

        for (const entry of history) {
            const { call } = entry;
            report.lastHeight = Math.max(report.lastHeight, call.height);

            if (entry.status !== 'SUCCESS') {
                report.skipped++;
                continue;
            }

            if (!isOperation(call.operation) || !isMutating(call.operation)) {
                throw new RegistryError(FaultCode.REPLAY_FAILURE, `Unknown mutating operation ${call.operation} in ${call.callId}`);
            }

            const decoded = decodeArgs(call.operation, call.args);
            if (!decoded.ok) {
                throw new RegistryError(FaultCode.REPLAY_FAILURE, `Undecodable arguments in ${call.callId}: ${decoded.issues.join('; ')}`);
            }

            const receipt = dispatch(registry, call.operation, decoded.args, { caller: call.caller, height: call.height });
            if (!receipt.ok) {
                throw new RegistryError(
                    FaultCode.REPLAY_FAILURE,
                    `Replay diverged at ${call.callId}: ${receipt.error.code}`,
                    { callId: call.callId, rejection: receipt.error }
                );
            }
            report.applied++;
        }

        console.log(`[ReplayEngine] Replay complete. Applied ${report.applied}, skipped ${report.skipped}.`);
        return report;
    }
}
