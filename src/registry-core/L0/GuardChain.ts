import type { Guard, GuardPhase, GuardResult, Rejection } from './Guards.js';
import { toRejection } from './Guards.js';

const PHASE_ORDER: Record<GuardPhase, number> = {
    EXISTENCE: 0,
    AUTHORIZATION: 1,
    INPUT: 2,
    RULE: 3
};

interface RegisteredCheck {
    phase: GuardPhase;
    run: () => GuardResult;
}

/**
 * Ordered list of guards for a single operation.
 * Inputs are supplied lazily so that a later guard may rely on an earlier one
 * having passed (e.g. the owner lookup after the existence check).
 */
export class GuardChain {
    private checks: RegisteredCheck[] = [];

    public require<T>(phase: GuardPhase, guard: Guard<T>, input: () => T): this {
        const last = this.checks[this.checks.length - 1];
        if (last && PHASE_ORDER[phase] < PHASE_ORDER[last.phase]) {
            throw new Error(`GuardChain: ${phase} check registered after ${last.phase}`);
        }
        this.checks.push({ phase, run: () => guard(input()) });
        return this;
    }

    /**
     * Returns the first violation, or null when every check passes.
     */
    public evaluate(): Rejection | null {
        for (const check of this.checks) {
            const result = check.run();
            if (!result.ok) return toRejection(check.phase, result);
        }
        return null;
    }
}
