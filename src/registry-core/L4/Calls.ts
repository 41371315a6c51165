import { z } from 'zod';

/**
 * Registry call arguments, one schema per operation.
 * Textual bounds are enforced by the registry guards, not here, so that an
 * over-long field is rejected with a registry code instead of a decode error.
 */
const propertyId = z.number().int();
const account = z.string();

const details = {
    title: z.string(),
    description: z.string(),
    location: z.string(),
    category: z.string(),
    area: z.number(),
    unit: z.string()
};

const RAW_SCHEMAS = {
    // Mutating
    register: z.object({ ...details, initialOwner: account }),
    updateMetadata: z.object({ propertyId, ...details }),
    transfer: z.object({
        propertyId,
        newOwner: account,
        reason: z.string().default(''),
        amount: z.number().optional()
    }),
    verify: z.object({ propertyId, notes: z.string().default('') }),
    addDocument: z.object({
        propertyId,
        title: z.string(),
        documentType: z.string(),
        hash: z.string(),
        description: z.string().default('')
    }),
    changeStatus: z.object({
        propertyId,
        newStatus: z.union([z.string(), z.number()]),
        reason: z.string().default('')
    }),
    grant: z.object({
        propertyId,
        accessor: account,
        level: z.number(),
        expiresAt: z.number().optional()
    }),
    revoke: z.object({ propertyId, accessor: account }),

    // Read-only
    getPropertyInfo: z.object({ propertyId }),
    getOwner: z.object({ propertyId }),
    ownsProperty: z.object({ propertyId, account }),
    getOwnerMembership: z.object({ owner: account, propertyId }),
    getVerification: z.object({ propertyId }),
    getDocument: z.object({ propertyId, documentId: z.number().int() }),
    getDocumentCount: z.object({ propertyId }),
    getTransfer: z.object({ propertyId, transferId: z.number().int() }),
    getTransferCount: z.object({ propertyId }),
    getStatusHistory: z.object({ propertyId }),
    getAccessGrant: z.object({ propertyId, accessor: account }),
    checkAccess: z.object({ propertyId, accessor: account, requiredLevel: z.number() }),
    getPropertyCount: z.object({}),
    getSystemStatistics: z.object({})
};

export type OperationName = keyof typeof RAW_SCHEMAS;

export type ArgMap = { [O in OperationName]: z.output<(typeof RAW_SCHEMAS)[O]> };

export type CallArgs<O extends OperationName> = ArgMap[O];

const SCHEMAS: { [O in OperationName]: z.ZodType<ArgMap[O], z.ZodTypeDef, unknown> } = RAW_SCHEMAS;

export const MUTATING_OPERATIONS = [
    'register',
    'transfer',
    'updateMetadata',
    'verify',
    'addDocument',
    'changeStatus',
    'grant',
    'revoke'
] as const satisfies readonly OperationName[];

export type MutatingOperation = (typeof MUTATING_OPERATIONS)[number];

export function isOperation(name: string): name is OperationName {
    return Object.prototype.hasOwnProperty.call(RAW_SCHEMAS, name);
}

export function isMutating(operation: OperationName): operation is MutatingOperation {
    const mutating: readonly OperationName[] = MUTATING_OPERATIONS;
    return mutating.includes(operation);
}

export type DecodeResult<O extends OperationName> =
    | { ok: true; args: ArgMap[O] }
    | { ok: false; issues: string[] };

export function decodeArgs<O extends OperationName>(operation: O, raw: unknown): DecodeResult<O> {
    const parsed = SCHEMAS[operation].safeParse(raw ?? {});
    if (!parsed.success) {
        return {
            ok: false,
            issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '(args)'}: ${issue.message}`)
        };
    }
    return { ok: true, args: parsed.data };
}
