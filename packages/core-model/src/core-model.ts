export type {
  Block,
  BlockMetadata,
  BlockType,
  BulletListBlock,
  CheckboxBlock,
  CodeBlock,
  DividerBlock,
  HeadingBlock,
  HeadingLevel,
  NumberedListBlock,
  QuoteBlock,
  TextBlock
} from "./block-model";
export {
  BLOCK_TYPES,
  getMetadata,
  headingLevelOf,
  headingTypeOf,
  isBlockType,
  isHeadingType,
  withContent,
  withIndent
} from "./block-model";
export type { BlockTypeRegistry, CarryForwardTable } from "./block-type-registry";
export {
  DEFAULT_CARRY_FORWARD,
  createBlockTypeRegistry,
  defaultBlockTypeRegistry,
  makeBlockOfType
} from "./block-type-registry";
export type { BlockRecord, BlockRecordErrorCode } from "./block-records";
export {
  BlockRecordError,
  deserializeBlock,
  deserializeBlocks,
  serializeBlock,
  serializeBlocks
} from "./block-records";
export type { MarkdownParseResult } from "./markdown-parser";
export { parseMarkdownBlocks } from "./markdown-parser";
export { serializeBlocksToMarkdown, serializeBlocksToPlainText } from "./markdown-serializer";
export type { MarkdownShortcut } from "./markdown-shortcuts";
export { detectMarkdownShortcut, justTypedSpace } from "./markdown-shortcuts";
export { createSequentialIdFactory, makeRandomId } from "./id-factory";
