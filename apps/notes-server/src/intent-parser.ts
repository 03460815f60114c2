import { isBlockType } from "@stanza/core-model";
import type { EditorIntent } from "@stanza/editor-core";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.trim().length > 0;

const isIndex = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

/** Validates one intent from a request body; anything malformed yields null. */
export const parseIntent = (raw: unknown): EditorIntent | null => {
  if (!isRecord(raw)) return null;
  const { type, blockId } = raw;

  if (type === "createBlock") {
    const { blockType } = raw;
    const afterId =
      raw.afterId === null ? null : isNonEmptyString(raw.afterId) ? raw.afterId : undefined;
    if (!isBlockType(blockType) || afterId === undefined) return null;
    return { type, blockType, afterId };
  }

  if (!isNonEmptyString(blockId)) return null;

  switch (type) {
    case "contentChanged":
      return typeof raw.text === "string" ? { type, blockId, text: raw.text } : null;
    case "returnPressed": {
      const { cursor } = raw;
      if (cursor === undefined) return { type, blockId };
      return isIndex(cursor) ? { type, blockId, cursor } : null;
    }
    case "setBlockType":
      return isBlockType(raw.blockType) ? { type, blockId, blockType: raw.blockType } : null;
    case "moveBlock":
      return isIndex(raw.toIndex) ? { type, blockId, toIndex: raw.toIndex } : null;
    case "backspacePressedOnEmpty":
    case "tabPressed":
    case "shiftTabPressed":
    case "toggleCheckbox":
    case "mergeWithPrevious":
      return { type, blockId };
    default:
      return null;
  }
};
