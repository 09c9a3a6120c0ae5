/**
 * TranscriptStore: SQLite archive of finished task runs.
 *
 * Uses better-sqlite3 for zero-config, embedded, synchronous SQLite.
 * A run is written once, after it ends; the store is an audit sink, not a
 * way to resume a task.
 *
 * @see docs/architecture.md §5: Transcript output
 */
import Database from "better-sqlite3";
import { z } from "zod/v4";
import { AbortReason, TranscriptRecord } from "../schemas/transcript.js";
import type { TaskResult } from "../schemas/transcript.js";

/** Schema migration definition. */
export interface Migration {
    version: number;
    description: string;
    up: string;
}

const INITIAL_SCHEMA = `
-- Tasks table: one row per finished run
CREATE TABLE IF NOT EXISTS Tasks (
  id TEXT PRIMARY KEY,
  task TEXT NOT NULL,
  status TEXT NOT NULL,
  reason TEXT,
  detail TEXT,
  final_answer TEXT,
  partial_answer TEXT,
  iterations INTEGER NOT NULL,
  selection TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Turns table: the full transcript of each run
CREATE TABLE IF NOT EXISTS Turns (
  task_id TEXT NOT NULL,
  turn_index INTEGER NOT NULL,
  role TEXT NOT NULL,
  content TEXT NOT NULL,
  PRIMARY KEY (task_id, turn_index),
  FOREIGN KEY (task_id) REFERENCES Tasks(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_tasks_status_created ON Tasks(status, created_at);
`;

/** Forward-only migrations. */
const MIGRATIONS: Migration[] = [
    { version: 1, description: "Initial schema", up: INITIAL_SCHEMA },
];

interface TaskRow {
    id: string;
    task: string;
    status: string;
    reason: string | null;
    detail: string | null;
    final_answer: string | null;
    partial_answer: string | null;
    iterations: number;
    selection: string;
}

interface TurnRow {
    turn_index: number;
    role: string;
    content: string;
}

/** One line of `list()` output. */
export const TaskSummary = z
    .object({
        id: z.string(),
        task: z.string(),
        status: z.enum(["done", "aborted"]),
        reason: AbortReason.nullable(),
        iterations: z.number().int(),
        created_at: z.string(),
    })
    .transform((row) => ({
        id: row.id,
        task: row.task,
        status: row.status,
        reason: row.reason,
        iterations: row.iterations,
        createdAt: row.created_at,
    }));
export type TaskSummary = z.output<typeof TaskSummary>;

export interface ListOptions {
    status?: TaskResult["status"];
    /** Default: 20 */
    limit?: number;
}

export class TranscriptStore {
    private db: Database.Database;

    constructor(dbPath: string = ":memory:") {
        this.db = new Database(dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.pragma("foreign_keys = ON");
        this.runMigrations();
    }

    /**
     * Run pending migrations.
     * Forward-only, with version tracking.
     */
    private runMigrations(): void {
        // Ensure SchemaVersions table exists first
        this.db.exec(`
      CREATE TABLE IF NOT EXISTS SchemaVersions (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now')),
        description TEXT NOT NULL
      );
    `);

        const current = this.db
            .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM SchemaVersions")
            .get();
        const version = current?.v ?? 0;

        for (const migration of MIGRATIONS) {
            if (migration.version > version) {
                this.db.exec(migration.up);
                this.db
                    .prepare("INSERT INTO SchemaVersions (version, description) VALUES (?, ?)")
                    .run(migration.version, migration.description);
            }
        }
    }

    /** Archive a finished run. Saving the same task id again replaces it. */
    save(result: TaskResult, task: string): void {
        const insertTask = this.db.prepare(
            `INSERT INTO Tasks (id, task, status, reason, detail, final_answer, partial_answer, iterations, selection)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        );
        const insertTurn = this.db.prepare(
            "INSERT INTO Turns (task_id, turn_index, role, content) VALUES (?, ?, ?, ?)",
        );

        const write = this.db.transaction(() => {
            this.db.prepare("DELETE FROM Tasks WHERE id = ?").run(result.taskId);
            insertTask.run(
                result.taskId,
                task,
                result.status,
                result.status === "aborted" ? result.reason : null,
                result.status === "aborted" ? result.detail : null,
                result.status === "done" ? result.finalAnswer : null,
                result.status === "aborted" ? result.partialAnswer ?? null : null,
                result.iterations,
                JSON.stringify(result.selection),
            );
            for (const turn of result.transcript) {
                insertTurn.run(result.taskId, turn.index, turn.role, turn.content);
            }
        });
        write();
    }

    /** Rebuild and validate an archived run. */
    get(taskId: string): TaskResult | undefined {
        const row = this.db
            .prepare<[string], TaskRow>("SELECT * FROM Tasks WHERE id = ?")
            .get(taskId);
        if (!row) return undefined;

        const turns = this.db
            .prepare<[string], TurnRow>(
                "SELECT turn_index, role, content FROM Turns WHERE task_id = ? ORDER BY turn_index ASC",
            )
            .all(taskId);

        const base = {
            taskId: row.id,
            transcript: turns.map((turn) => ({ index: turn.turn_index, role: turn.role, content: turn.content })),
            iterations: row.iterations,
            selection: JSON.parse(row.selection),
        };

        return TranscriptRecord.parse(
            row.status === "done"
                ? { status: "done", finalAnswer: row.final_answer, ...base }
                : {
                    status: row.status,
                    reason: row.reason,
                    detail: row.detail,
                    partialAnswer: row.partial_answer ?? undefined,
                    incomplete: true,
                    ...base,
                },
        );
    }

    /** Archived runs, newest first. */
    list(options: ListOptions = {}): TaskSummary[] {
        const limit = options.limit ?? 20;
        const columns = "id, task, status, reason, iterations, created_at";
        const rows = options.status
            ? this.db
                .prepare<[string, number], unknown>(
                    `SELECT ${columns} FROM Tasks WHERE status = ? ORDER BY created_at DESC, rowid DESC LIMIT ?`,
                )
                .all(options.status, limit)
            : this.db
                .prepare<[number], unknown>(`SELECT ${columns} FROM Tasks ORDER BY created_at DESC, rowid DESC LIMIT ?`)
                .all(limit);

        return rows.map((row) => TaskSummary.parse(row));
    }

    /** Close the database connection. */
    close(): void {
        this.db.close();
    }

    /** Expose raw db for advanced queries in tests. */
    get raw(): Database.Database {
        return this.db;
    }
}
