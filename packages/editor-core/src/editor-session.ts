import {
  deserializeBlocks,
  getMetadata,
  parseMarkdownBlocks,
  serializeBlocks,
  serializeBlocksToMarkdown,
  serializeBlocksToPlainText,
  type Block,
  type BlockMetadata,
  type BlockRecord,
  type BlockType
} from "@stanza/core-model";
import { createAutosave, type Autosave, type AutosaveOptions } from "./autosave";
import { BlockStore } from "./block-store";
import { createEditEngine, type EditEngine } from "./edit-engine";
import { resolveEditorConfig, type EditorConfig, type ResolvedEditorConfig } from "./editor-config";
import type { EditResult } from "./editor-errors";
import { createFocusRouter } from "./focus-router";
import { checkInvariants, repairDocument } from "./invariants";

export type EditorIntent =
  | { type: "contentChanged"; blockId: string; text: string }
  | { type: "returnPressed"; blockId: string; cursor?: number }
  | { type: "backspacePressedOnEmpty"; blockId: string }
  | { type: "tabPressed"; blockId: string }
  | { type: "shiftTabPressed"; blockId: string }
  | { type: "setBlockType"; blockId: string; blockType: BlockType }
  | { type: "createBlock"; blockType: BlockType; afterId: string | null }
  | { type: "toggleCheckbox"; blockId: string }
  | { type: "moveBlock"; blockId: string; toIndex: number }
  | { type: "mergeWithPrevious"; blockId: string };

export type BlockViewModel = {
  id: string;
  type: BlockType;
  content: string;
  indentLevel: number;
  metadata: BlockMetadata;
  placeholder: string;
};

export type EditorSnapshot = {
  blocks: BlockViewModel[];
  focusedBlockId: string | null;
};

export type EditorSessionConfig = EditorConfig & {
  /** Saves the document after edits that change its blocks. */
  autosave?: AutosaveOptions;
};

export type EditorSession = {
  dispatch: (intent: EditorIntent) => EditResult;
  focus: (blockId: string) => boolean;
  snapshot: () => EditorSnapshot;
  subscribe: (listener: (snapshot: EditorSnapshot) => void) => () => void;
  blocks: () => readonly Block[];
  toRecords: () => BlockRecord[];
  toMarkdown: () => string;
  toPlainText: () => string;
  /** Writes pending autosave changes now. Resolves at once without autosave. */
  flush: () => Promise<void>;
  dispose: () => void;
};

const runIntent = (engine: EditEngine, intent: EditorIntent): EditResult => {
  switch (intent.type) {
    case "contentChanged":
      return engine.updateContent(intent.blockId, intent.text);
    case "returnPressed":
      return engine.onReturn(intent.blockId, intent.cursor);
    case "backspacePressedOnEmpty":
      return engine.onBackspace(intent.blockId);
    case "tabPressed":
      return engine.onTab(intent.blockId);
    case "shiftTabPressed":
      return engine.onShiftTab(intent.blockId);
    case "setBlockType":
      return engine.updateBlockType(intent.blockId, intent.blockType);
    case "createBlock":
      return engine.createBlock(intent.blockType, intent.afterId);
    case "toggleCheckbox":
      return engine.toggleCheckbox(intent.blockId);
    case "moveBlock":
      return engine.moveBlock(intent.blockId, intent.toIndex);
    case "mergeWithPrevious":
      return engine.mergeWithPreviousBlock(intent.blockId);
  }
};

const loadBlocks = (blocks: readonly Block[], config: ResolvedEditorConfig): Block[] => {
  if (blocks.length === 0) {
    return [config.registry.defaultBlock("text", config.makeId())];
  }
  const structural = checkInvariants(blocks).filter((violation) => violation.kind !== "wrong-number");
  if (structural.length > 0) {
    config.logger.warn("Repairing document on load", structural);
  }
  return repairDocument(blocks);
};

const openSession = (
  blocks: readonly Block[],
  resolved: ResolvedEditorConfig,
  autosave: Autosave | null
): EditorSession => {
  const store = new BlockStore(loadBlocks(blocks, resolved));
  const focus = createFocusRouter({
    canFocus: (id) => {
      const block = store.get(id);
      return block !== null && resolved.registry.isFocusable(block.type);
    }
  });
  const engine = createEditEngine({ store, focus, config: resolved });
  const listeners = new Set<(snapshot: EditorSnapshot) => void>();

  let cached: { blocks: readonly Block[]; focusedBlockId: string | null; value: EditorSnapshot } | null =
    null;

  const snapshot = (): EditorSnapshot => {
    const blocks = store.all();
    const focusedBlockId = focus.current();
    if (cached && cached.blocks === blocks && cached.focusedBlockId === focusedBlockId) {
      return cached.value;
    }
    const value: EditorSnapshot = {
      blocks: blocks.map((block) => ({
        id: block.id,
        type: block.type,
        content: block.content,
        indentLevel: block.indentLevel,
        metadata: getMetadata(block),
        placeholder: resolved.registry.placeholder(block.type)
      })),
      focusedBlockId
    };
    cached = { blocks, focusedBlockId, value };
    return value;
  };

  const notifyIfChanged = (before: EditorSnapshot) => {
    const after = snapshot();
    if (after === before) return;
    listeners.forEach((listener) => listener(after));
  };

  return {
    dispatch: (intent) => {
      const before = snapshot();
      const blocksBefore = store.all();
      const result = runIntent(engine, intent);
      if (autosave && store.all() !== blocksBefore) {
        autosave.schedule(serializeBlocks(store.all()));
      }
      notifyIfChanged(before);
      return result;
    },
    focus: (blockId) => {
      const before = snapshot();
      const focused = focus.focus(blockId);
      notifyIfChanged(before);
      return focused;
    },
    snapshot,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    blocks: () => store.all(),
    toRecords: () => serializeBlocks(store.all()),
    toMarkdown: () => serializeBlocksToMarkdown(store.all()),
    toPlainText: () => serializeBlocksToPlainText(store.all()),
    flush: () => (autosave ? autosave.flush() : Promise.resolve()),
    dispose: () => {
      listeners.clear();
      autosave?.dispose();
    }
  };
};

/**
 * Opens a document from persisted records. Throws `BlockRecordError` when
 * the records are malformed; structural problems in otherwise valid records
 * are repaired and logged.
 */
export const createEditorSession = (
  records?: unknown,
  config?: EditorSessionConfig
): EditorSession => {
  const resolved = resolveEditorConfig(config);
  const blocks = records === undefined ? [] : deserializeBlocks(records);
  return openSession(blocks, resolved, config?.autosave ? createAutosave(config.autosave) : null);
};

export const createEditorSessionFromMarkdown = (
  markdown: string,
  config?: EditorSessionConfig
): { session: EditorSession; warnings: string[] } => {
  const resolved = resolveEditorConfig(config);
  const { blocks, warnings } = parseMarkdownBlocks(markdown, resolved.makeId);
  const autosave = config?.autosave ? createAutosave(config.autosave) : null;
  return { session: openSession(blocks, resolved, autosave), warnings };
};
