/**
 * SQLite audit store
 *
 * Appends one row per classification request to the `prompt_logs` table.
 * Rows are never updated or deleted by the detector.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import {
    createConsoleLogger,
    type AuditStore,
    type AuditWriteOptions,
    type ClassificationRecord,
    type DetectorLogger,
    type VerdictClassification,
} from "@injection-detector/core";

const IN_MEMORY = ":memory:";

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS prompt_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        request_id TEXT NOT NULL,
        input_text TEXT NOT NULL,
        classification TEXT NOT NULL,
        confidence REAL NOT NULL,
        model_version TEXT NOT NULL,
        prompt_version TEXT NOT NULL,
        raw_response TEXT,
        created_at TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_prompt_logs_request_id ON prompt_logs (request_id);
`;

const SELECT_COLUMNS = `
    SELECT
        id,
        request_id,
        input_text,
        classification,
        confidence,
        model_version,
        prompt_version,
        raw_response,
        created_at
    FROM prompt_logs
`;

/**
 * Raw row from prompt_logs
 */
export interface AuditRow {
    id: number;
    request_id: string;
    input_text: string;
    classification: string;
    confidence: number;
    model_version: string;
    prompt_version: string;
    raw_response: string | null;
    created_at: string;
}

interface InsertParams {
    requestId: string;
    inputText: string;
    classification: string;
    confidence: number;
    modelVersion: string;
    promptVersion: string;
    rawResponse: string;
    createdAt: string;
}

export interface SqliteAuditStoreConfig {
    /** Database file, or ":memory:" */
    path: string;
    logger?: DetectorLogger;
}

function isVerdictClassification(value: string): value is VerdictClassification {
    return value === "benign" || value === "malicious" || value === "error";
}

/**
 * better-sqlite3 backed AuditStore
 *
 * The connection opens lazily on first use. better-sqlite3 is synchronous, so
 * a write cannot be interrupted once started; the signal is checked before it.
 */
export class SqliteAuditStore implements AuditStore {
    private db: Database.Database | null = null;
    private readonly dbPath: string;
    private readonly logger: DetectorLogger;

    constructor(config: SqliteAuditStoreConfig) {
        this.dbPath = config.path;
        this.logger = config.logger ?? createConsoleLogger("SqliteAuditStore");
    }

    /**
     * Open the database and create the schema if needed
     */
    open(): Database.Database {
        if (this.db) {
            return this.db;
        }

        if (this.dbPath !== IN_MEMORY) {
            mkdirSync(dirname(this.dbPath), { recursive: true });
        }

        const db = new Database(this.dbPath);
        if (this.dbPath !== IN_MEMORY) {
            db.pragma("journal_mode = WAL");
        }
        db.exec(SCHEMA);

        this.logger.debug("Audit database opened", { path: this.dbPath });
        this.db = db;
        return db;
    }

    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    async append(record: ClassificationRecord, options: AuditWriteOptions = {}): Promise<void> {
        options.signal?.throwIfAborted();

        const db = this.open();
        const stmt = db.prepare<InsertParams>(`
            INSERT INTO prompt_logs (
                request_id, input_text, classification, confidence,
                model_version, prompt_version, raw_response, created_at
            ) VALUES (
                @requestId, @inputText, @classification, @confidence,
                @modelVersion, @promptVersion, @rawResponse, @createdAt
            )
        `);

        stmt.run({
            requestId     : record.requestId,
            inputText     : record.inputText,
            classification: record.classification,
            confidence    : record.confidence,
            modelVersion  : record.modelVersion,
            promptVersion : record.promptVersion,
            rawResponse   : record.rawResponse,
            createdAt     : record.createdAt,
        });
    }

    async findByRequestId(requestId: string): Promise<ClassificationRecord[]> {
        const db = this.open();
        const stmt = db.prepare<[string], AuditRow>(`${SELECT_COLUMNS} WHERE request_id = ? ORDER BY id ASC`);

        return stmt.all(requestId).map(row => this.rowToRecord(row));
    }

    /**
     * Most recent records, newest first
     */
    async recent(limit: number = 20): Promise<ClassificationRecord[]> {
        const db = this.open();
        const stmt = db.prepare<[number], AuditRow>(`${SELECT_COLUMNS} ORDER BY id DESC LIMIT ?`);

        return stmt.all(limit).map(row => this.rowToRecord(row));
    }

    private rowToRecord(row: AuditRow): ClassificationRecord {
        if (!isVerdictClassification(row.classification)) {
            throw new Error(`Unexpected classification '${row.classification}' in prompt_logs row ${row.id}`);
        }

        return {
            requestId     : row.request_id,
            inputText     : row.input_text,
            classification: row.classification,
            confidence    : row.confidence,
            modelVersion  : row.model_version,
            promptVersion : row.prompt_version,
            rawResponse   : row.raw_response ?? "",
            createdAt     : row.created_at,
        };
    }
}
