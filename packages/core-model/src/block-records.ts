import {
  getMetadata,
  headingLevelOf,
  isBlockType,
  isHeadingType,
  type Block,
  type BlockMetadata,
  type BlockType
} from "./block-model";
import { makeBlockOfType } from "./block-type-registry";

export type BlockRecord = {
  id: string;
  type: BlockType;
  content: string;
  indentLevel: number;
  metadata: BlockMetadata;
};

export type BlockRecordErrorCode =
  | "record-not-object"
  | "invalid-id"
  | "duplicate-id"
  | "unknown-type"
  | "invalid-content"
  | "invalid-indent"
  | "invalid-metadata";

export class BlockRecordError extends Error {
  readonly code: BlockRecordErrorCode;
  readonly index: number;

  constructor(code: BlockRecordErrorCode, index: number) {
    super(`${code} at record ${index}`);
    this.name = "BlockRecordError";
    this.code = code;
    this.index = index;
  }
}

export const serializeBlock = (block: Block): BlockRecord => ({
  id: block.id,
  type: block.type,
  content: block.content,
  indentLevel: block.indentLevel,
  metadata: getMetadata(block)
});

export const serializeBlocks = (blocks: readonly Block[]): BlockRecord[] =>
  blocks.map(serializeBlock);

const isRecordObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readMetadata = (raw: unknown, index: number): Record<string, unknown> => {
  if (raw === undefined || raw === null) return {};
  if (!isRecordObject(raw)) {
    throw new BlockRecordError("invalid-metadata", index);
  }
  return raw;
};

const readNumber = (value: unknown, index: number): number => {
  if (value === undefined) return 1;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new BlockRecordError("invalid-metadata", index);
  }
  return value;
};

const readChecked = (value: unknown, index: number): boolean => {
  if (value === undefined) return false;
  if (typeof value !== "boolean") {
    throw new BlockRecordError("invalid-metadata", index);
  }
  return value;
};

const readLanguage = (value: unknown, index: number): string | null => {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new BlockRecordError("invalid-metadata", index);
  }
  return value;
};

export const deserializeBlock = (raw: unknown, index = 0): Block => {
  if (!isRecordObject(raw)) {
    throw new BlockRecordError("record-not-object", index);
  }
  const { id, type, content, indentLevel } = raw;
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new BlockRecordError("invalid-id", index);
  }
  if (!isBlockType(type)) {
    throw new BlockRecordError("unknown-type", index);
  }
  if (typeof content !== "string") {
    throw new BlockRecordError("invalid-content", index);
  }
  if (typeof indentLevel !== "number" || !Number.isInteger(indentLevel) || indentLevel < 0) {
    throw new BlockRecordError("invalid-indent", index);
  }
  const metadata = readMetadata(raw.metadata, index);
  const block = makeBlockOfType(type, id, content, indentLevel);

  switch (block.type) {
    case "numberedList":
      return { ...block, number: readNumber(metadata.number, index) };
    case "checkbox":
      return { ...block, isChecked: readChecked(metadata.isChecked, index) };
    case "code":
      return { ...block, language: readLanguage(metadata.language, index) };
    default:
      if (isHeadingType(block.type) && metadata.level !== undefined) {
        if (metadata.level !== headingLevelOf(block.type)) {
          throw new BlockRecordError("invalid-metadata", index);
        }
      }
      return block;
  }
};

/**
 * Restores blocks from persisted records. Records must come in display
 * order; ids must be unique across the list. Structural invariants such as
 * indentation and numbering are not repaired here.
 */
export const deserializeBlocks = (records: unknown): Block[] => {
  if (!Array.isArray(records)) {
    throw new BlockRecordError("record-not-object", -1);
  }
  const seen = new Set<string>();
  return records.map((raw: unknown, index) => {
    const block = deserializeBlock(raw, index);
    if (seen.has(block.id)) {
      throw new BlockRecordError("duplicate-id", index);
    }
    seen.add(block.id);
    return block;
  });
};
