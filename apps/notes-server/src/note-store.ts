import initSqlJs, { type Database } from "sql.js";
import { randomUUID } from "node:crypto";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { deserializeBlocks, serializeBlocks, type BlockRecord } from "@stanza/core-model";

export type NoteRecord = {
  id: string;
  title: string;
  records: BlockRecord[];
  createdAt: number;
  updatedAt: number;
};

const MEMORY_PATH = ":memory:";

const toNoteRecord = (row: Record<string, unknown>): NoteRecord => {
  const { id, title, records, created_at: createdAt, updated_at: updatedAt } = row;
  if (
    typeof id !== "string" ||
    typeof title !== "string" ||
    typeof records !== "string" ||
    typeof createdAt !== "number" ||
    typeof updatedAt !== "number"
  ) {
    throw new Error("invalid-note-row");
  }
  return {
    id,
    title,
    records: serializeBlocks(deserializeBlocks(JSON.parse(records))),
    createdAt,
    updatedAt
  };
};

/**
 * Notes table over an in-process SQLite database. A store opened with a
 * file path writes the whole database back to that file after each change.
 */
export class NoteStore {
  private db: Database;
  private readonly filePath: string | null;

  constructor(db: Database, filePath: string | null = null) {
    this.db = db;
    this.filePath = filePath;
    this.init();
  }

  private init() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS notes (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        records TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS notes_updated_at ON notes(updated_at);
    `);
  }

  private persist() {
    if (this.filePath === null) return;
    writeFileSync(this.filePath, this.db.export());
  }

  createNote(title: string, records: BlockRecord[], noteId?: string): NoteRecord {
    const id = noteId ?? randomUUID();
    const now = Date.now();
    this.db.run(
      "INSERT OR IGNORE INTO notes (id, title, records, created_at, updated_at) VALUES (?, ?, ?, ?, ?)",
      [id, title, JSON.stringify(records), now, now]
    );
    if (this.db.getRowsModified() === 0) {
      throw new Error("note-exists");
    }
    this.persist();
    const note = this.getNote(id);
    if (!note) {
      throw new Error("note-create-failed");
    }
    return note;
  }

  getNote(noteId: string): NoteRecord | null {
    const statement = this.db.prepare(
      "SELECT id, title, records, created_at, updated_at FROM notes WHERE id = ?"
    );
    try {
      statement.bind([noteId]);
      return statement.step() ? toNoteRecord(statement.getAsObject()) : null;
    } finally {
      statement.free();
    }
  }

  saveRecords(noteId: string, records: BlockRecord[]): NoteRecord {
    this.db.run("UPDATE notes SET records = ?, updated_at = ? WHERE id = ?", [
      JSON.stringify(records),
      Date.now(),
      noteId
    ]);
    if (this.db.getRowsModified() === 0) {
      throw new Error("note-not-found");
    }
    this.persist();
    const note = this.getNote(noteId);
    if (!note) {
      throw new Error("note-not-found");
    }
    return note;
  }

  close() {
    this.db.close();
  }
}

/** Opens `path`, or a throwaway database for ":memory:". */
export const openNoteStore = async (path: string) => {
  const SQL = await initSqlJs();
  if (path === MEMORY_PATH) {
    return new NoteStore(new SQL.Database());
  }
  const data = existsSync(path) ? readFileSync(path) : null;
  return new NoteStore(new SQL.Database(data), path);
};
