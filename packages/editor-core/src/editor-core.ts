export type { Autosave, AutosaveOptions, AutosaveStatus } from "./autosave";
export { DEFAULT_AUTOSAVE_DEBOUNCE_MS, createAutosave } from "./autosave";
export type { StoreFailure, StoreResult, TouchedRange } from "./block-store";
export { BlockStore } from "./block-store";
export type { EditEngine } from "./edit-engine";
export { createEditEngine } from "./edit-engine";
export type { EditorConfig, EditorLogger, ResolvedEditorConfig } from "./editor-config";
export { DEFAULT_MAX_INDENT_LEVEL, resolveEditorConfig } from "./editor-config";
export type { EditResult, IgnoredReason } from "./editor-errors";
export { InvariantViolationError } from "./editor-errors";
export type {
  BlockViewModel,
  EditorIntent,
  EditorSession,
  EditorSessionConfig,
  EditorSnapshot
} from "./editor-session";
export { createEditorSession, createEditorSessionFromMarkdown } from "./editor-session";
export type { FocusListener, FocusRouter, FocusRouterOptions } from "./focus-router";
export { createFocusRouter } from "./focus-router";
export type { InvariantViolation } from "./invariants";
export { checkInvariants, checkInvariantsNear, repairDocument } from "./invariants";
export type { BlockSequence, NumberedSequence, RenumberStats, RunMember } from "./renumbering";
export {
  arraySequence,
  expectedNumbers,
  findRunStart,
  renumberAll,
  renumberAround,
  renumberRunContaining,
  runNumbering
} from "./renumbering";
