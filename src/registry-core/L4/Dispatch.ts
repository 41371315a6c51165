import type { DeedRegistry, Receipt } from '../Registry.js';
import type { CallContext } from '../L0/Ontology.js';
import type { ArgMap, OperationName } from './Calls.js';

type Handler<O extends OperationName> = (registry: DeedRegistry, ctx: CallContext, args: ArgMap[O]) => Receipt<unknown>;

const answer = <T>(value: T): Receipt<T> => ({ ok: true, value });

const HANDLERS: { [O in OperationName]: Handler<O> } = {
    register: (r, ctx, a) => r.register(ctx, a),
    updateMetadata: (r, ctx, { propertyId, ...details }) => r.updateMetadata(ctx, propertyId, details),
    transfer: (r, ctx, a) => r.transfer(ctx, a.propertyId, a.newOwner, a.reason, a.amount),
    verify: (r, ctx, a) => r.verify(ctx, a.propertyId, a.notes),
    addDocument: (r, ctx, { propertyId, ...doc }) => r.addDocument(ctx, propertyId, doc),
    changeStatus: (r, ctx, a) => r.changeStatus(ctx, a.propertyId, a.newStatus, a.reason),
    grant: (r, ctx, a) => r.grant(ctx, a.propertyId, a.accessor, a.level, a.expiresAt),
    revoke: (r, ctx, a) => r.revoke(ctx, a.propertyId, a.accessor),

    getPropertyInfo: (r, _ctx, a) => r.getPropertyInfo(a.propertyId),
    getOwner: (r, _ctx, a) => r.getOwner(a.propertyId),
    ownsProperty: (r, _ctx, a) => answer(r.ownsProperty(a.propertyId, a.account)),
    getOwnerMembership: (r, _ctx, a) => answer(r.getOwnerMembership(a.owner, a.propertyId)),
    getVerification: (r, _ctx, a) => r.getVerification(a.propertyId),
    getDocument: (r, _ctx, a) => r.getDocument(a.propertyId, a.documentId),
    getDocumentCount: (r, _ctx, a) => r.getDocumentCount(a.propertyId),
    getTransfer: (r, _ctx, a) => r.getTransfer(a.propertyId, a.transferId),
    getTransferCount: (r, _ctx, a) => r.getTransferCount(a.propertyId),
    getStatusHistory: (r, _ctx, a) => r.getStatusHistory(a.propertyId),
    getAccessGrant: (r, _ctx, a) => r.getAccessGrant(a.propertyId, a.accessor),
    checkAccess: (r, ctx, a) => answer(r.checkAccess(a.propertyId, a.accessor, a.requiredLevel, ctx.height)),
    getPropertyCount: (r) => answer(r.getPropertyCount()),
    getSystemStatistics: (r) => answer(r.getSystemStatistics())
};

/**
 * Routes a decoded call to the registry. Mutating handlers commit at
 * `ctx.height`; read handlers ignore the caller.
 */
export function dispatch<O extends OperationName>(registry: DeedRegistry, operation: O, args: ArgMap[O], ctx: CallContext): Receipt<unknown> {
    const handler: Handler<O> = HANDLERS[operation];
    return handler(registry, ctx, args);
}
