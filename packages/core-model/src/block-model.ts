export type BlockType =
  | "text"
  | "heading1"
  | "heading2"
  | "heading3"
  | "bulletList"
  | "numberedList"
  | "checkbox"
  | "quote"
  | "code"
  | "divider";

export const BLOCK_TYPES: readonly BlockType[] = [
  "text",
  "heading1",
  "heading2",
  "heading3",
  "bulletList",
  "numberedList",
  "checkbox",
  "quote",
  "code",
  "divider"
];

export type HeadingLevel = 1 | 2 | 3;

type BlockBase = {
  id: string;
  content: string;
  indentLevel: number;
};

export type TextBlock = BlockBase & { type: "text" };

export type HeadingBlock = BlockBase & {
  type: "heading1" | "heading2" | "heading3";
  level: HeadingLevel;
};

export type BulletListBlock = BlockBase & { type: "bulletList" };

export type NumberedListBlock = BlockBase & {
  type: "numberedList";
  number: number;
};

export type CheckboxBlock = BlockBase & {
  type: "checkbox";
  isChecked: boolean;
};

export type QuoteBlock = BlockBase & { type: "quote" };

export type CodeBlock = BlockBase & {
  type: "code";
  language: string | null;
};

export type DividerBlock = BlockBase & {
  type: "divider";
  content: "";
};

export type Block =
  | TextBlock
  | HeadingBlock
  | BulletListBlock
  | NumberedListBlock
  | CheckboxBlock
  | QuoteBlock
  | CodeBlock
  | DividerBlock;

export type BlockMetadata = {
  isChecked?: boolean;
  number?: number;
  level?: HeadingLevel;
  language?: string | null;
};

export const isBlockType = (value: unknown): value is BlockType =>
  typeof value === "string" && BLOCK_TYPES.some((type) => type === value);

export const isHeadingType = (
  type: BlockType
): type is "heading1" | "heading2" | "heading3" =>
  type === "heading1" || type === "heading2" || type === "heading3";

export const headingLevelOf = (type: "heading1" | "heading2" | "heading3"): HeadingLevel => {
  switch (type) {
    case "heading1":
      return 1;
    case "heading2":
      return 2;
    default:
      return 3;
  }
};

export const headingTypeOf = (
  level: HeadingLevel
): "heading1" | "heading2" | "heading3" =>
  level === 1 ? "heading1" : level === 2 ? "heading2" : "heading3";

export const withContent = (block: Block, content: string): Block => {
  if (block.type === "divider") return block;
  return { ...block, content };
};

export const withIndent = (block: Block, indentLevel: number): Block => {
  if (block.indentLevel === indentLevel) return block;
  return { ...block, indentLevel };
};

export const getMetadata = (block: Block): BlockMetadata => {
  switch (block.type) {
    case "heading1":
    case "heading2":
    case "heading3":
      return { level: block.level };
    case "numberedList":
      return { number: block.number };
    case "checkbox":
      return { isChecked: block.isChecked };
    case "code":
      return { language: block.language };
    default:
      return {};
  }
};
