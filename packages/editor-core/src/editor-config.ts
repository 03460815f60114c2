import {
  createBlockTypeRegistry,
  makeRandomId,
  type BlockTypeRegistry,
  type CarryForwardTable
} from "@stanza/core-model";

export type EditorLogger = {
  warn: (message: string, ...details: unknown[]) => void;
};

export type EditorConfig = {
  maxIndentLevel?: number;
  carryForward?: Partial<CarryForwardTable>;
  markdownShortcuts?: boolean;
  /** Throw on invariant violations instead of repairing them. */
  debug?: boolean;
  makeId?: () => string;
  logger?: EditorLogger;
};

export type ResolvedEditorConfig = {
  maxIndentLevel: number;
  markdownShortcuts: boolean;
  debug: boolean;
  makeId: () => string;
  logger: EditorLogger;
  registry: BlockTypeRegistry;
};

export const DEFAULT_MAX_INDENT_LEVEL = 5;

export const resolveEditorConfig = (config: EditorConfig = {}): ResolvedEditorConfig => {
  const maxIndentLevel = config.maxIndentLevel ?? DEFAULT_MAX_INDENT_LEVEL;
  if (!Number.isInteger(maxIndentLevel) || maxIndentLevel < 0) {
    throw new Error("invalid-max-indent-level");
  }
  return {
    maxIndentLevel,
    markdownShortcuts: config.markdownShortcuts ?? true,
    debug: config.debug ?? false,
    makeId: config.makeId ?? makeRandomId,
    logger: config.logger ?? console,
    registry: createBlockTypeRegistry(config.carryForward)
  };
};
