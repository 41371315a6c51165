import Database from 'better-sqlite3';
import type { IEventStore, Evidence, EvidenceStatus } from '../../registry-core/L5/Audit.js';

interface AuditRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    callId: string;
    caller: string;
    operation: string;
    height: number;
    status: EvidenceStatus;
    args: string;
    reason: string | null;
    metadata: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'deeds.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                callId TEXT NOT NULL,
                caller TEXT NOT NULL,
                operation TEXT NOT NULL,
                height INTEGER NOT NULL,
                status TEXT NOT NULL,
                args TEXT NOT NULL,
                reason TEXT,
                metadata TEXT
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, callId, caller, operation, height, status, args, reason, metadata
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.call.callId,
            evidence.call.caller,
            evidence.call.operation,
            evidence.call.height,
            evidence.status,
            JSON.stringify(evidence.call.args ?? {}),
            evidence.reason ?? null,
            evidence.metadata ? JSON.stringify(evidence.metadata) : null
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const stmt = this.db.prepare<[], AuditRow>('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    async count(): Promise<number> {
        const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM audit_log').get();
        return row?.total ?? 0;
    }

    private mapRowToEvidence(row: AuditRow): Evidence {
        const args: unknown = JSON.parse(row.args);
        const metadata: unknown = row.metadata ? JSON.parse(row.metadata) : undefined;
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            call: {
                callId: row.callId,
                operation: row.operation,
                args,
                caller: row.caller,
                height: row.height
            },
            status: row.status,
            ...(row.reason ? { reason: row.reason } : {}),
            ...(isRecord(metadata) ? { metadata } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
