import { serve } from "@hono/node-server";
import { createApp } from "./notes-server";
import { openNoteStore } from "./note-store";

const port = Number(process.env.PORT ?? 8787);
const dbPath = process.env.STANZA_NOTES_DB ?? "./notes-server.db";

const store = await openNoteStore(dbPath);
const app = createApp(store);

serve({
  fetch: app.fetch,
  port
});

console.log(`Stanza notes server listening on http://localhost:${port}`);
