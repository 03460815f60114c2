import { Hono } from "hono";
import { BlockRecordError, type BlockRecord } from "@stanza/core-model";
import {
  createEditorSession,
  type EditResult,
  type EditorConfig,
  type EditorIntent
} from "@stanza/editor-core";
import { parseIntent } from "./intent-parser";
import type { NoteStore } from "./note-store";

export type NotesServerConfig = {
  maxIntentsPerRequest?: number;
  editor?: EditorConfig;
};

const DEFAULT_TITLE = "Untitled";

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.trim().length > 0;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

type RecordsCheck =
  | { ok: true; records: BlockRecord[] }
  | { ok: false; error: { error: string; reason: string; index: number } };

export const createApp = (store: NoteStore, config: NotesServerConfig = {}) => {
  const app = new Hono();
  const maxIntents = config.maxIntentsPerRequest ?? 200;

  // Loading through a session validates the records and repairs numbering.
  const normalizeRecords = (raw: unknown): RecordsCheck => {
    try {
      return { ok: true, records: createEditorSession(raw, config.editor).toRecords() };
    } catch (error) {
      if (error instanceof BlockRecordError) {
        return {
          ok: false,
          error: { error: "invalid-records", reason: error.code, index: error.index }
        };
      }
      throw error;
    }
  };

  app.get("/health", (c) => c.json({ ok: true }));

  app.post("/v1/notes", async (c) => {
    const body = await c.req.json().catch(() => null);
    if (!isRecord(body)) {
      return c.json({ error: "invalid-note" }, 400);
    }
    if (body.title !== undefined && !isNonEmptyString(body.title)) {
      return c.json({ error: "invalid-title" }, 400);
    }

    const checked = normalizeRecords(body.records);
    if (!checked.ok) {
      return c.json(checked.error, 400);
    }

    const title = isNonEmptyString(body.title) ? body.title : DEFAULT_TITLE;
    const note = store.createNote(title, checked.records);
    return c.json({ noteId: note.id });
  });

  app.get("/v1/notes/:noteId", (c) => {
    const note = store.getNote(c.req.param("noteId"));
    if (!note) {
      return c.json({ error: "note-not-found" }, 404);
    }
    return c.json({
      noteId: note.id,
      title: note.title,
      records: note.records,
      updatedAt: note.updatedAt
    });
  });

  app.put("/v1/notes/:noteId", async (c) => {
    const noteId = c.req.param("noteId");
    const body = await c.req.json().catch(() => null);
    if (!isRecord(body) || body.records === undefined) {
      return c.json({ error: "invalid-records" }, 400);
    }
    if (!store.getNote(noteId)) {
      return c.json({ error: "note-not-found" }, 404);
    }

    const checked = normalizeRecords(body.records);
    if (!checked.ok) {
      return c.json(checked.error, 400);
    }

    const note = store.saveRecords(noteId, checked.records);
    return c.json({ noteId: note.id, updatedAt: note.updatedAt });
  });

  app.post("/v1/notes/:noteId/intents", async (c) => {
    const noteId = c.req.param("noteId");
    const body = await c.req.json().catch(() => null);
    if (!isRecord(body) || !Array.isArray(body.intents)) {
      return c.json({ error: "invalid-intents" }, 400);
    }
    if (body.intents.length > maxIntents) {
      return c.json({ error: "too-many-intents" }, 400);
    }

    const intents: EditorIntent[] = [];
    for (const [index, raw] of body.intents.entries()) {
      const intent = parseIntent(raw);
      if (!intent) {
        return c.json({ error: "invalid-intent", index }, 400);
      }
      intents.push(intent);
    }

    const note = store.getNote(noteId);
    if (!note) {
      return c.json({ error: "note-not-found" }, 404);
    }

    const session = createEditorSession(note.records, config.editor);
    if (isNonEmptyString(body.focusedBlockId)) {
      session.focus(body.focusedBlockId);
    }
    const results: EditResult[] = intents.map((intent) => session.dispatch(intent));
    store.saveRecords(noteId, session.toRecords());

    return c.json({ snapshot: session.snapshot(), results });
  });

  app.get("/v1/notes/:noteId/markdown", (c) => {
    const note = store.getNote(c.req.param("noteId"));
    if (!note) {
      return c.json({ error: "note-not-found" }, 404);
    }
    const markdown = createEditorSession(note.records, config.editor).toMarkdown();
    return c.body(markdown, 200, { "Content-Type": "text/markdown; charset=utf-8" });
  });

  return app;
};
