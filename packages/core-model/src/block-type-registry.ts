import {
  BLOCK_TYPES,
  headingLevelOf,
  isHeadingType,
  type Block,
  type BlockType
} from "./block-model";

export type CarryForwardTable = Record<BlockType, BlockType>;

type BlockTypeRule = {
  carriesNumber: boolean;
  exitsOnEmptyReturn: boolean;
  focusable: boolean;
  holdsContent: boolean;
  placeholder: string;
};

export type BlockTypeRegistry = {
  carryForward: (type: BlockType) => BlockType;
  carriesNumber: (type: BlockType) => boolean;
  exitsOnEmptyReturn: (type: BlockType) => boolean;
  isFocusable: (type: BlockType) => boolean;
  holdsContent: (type: BlockType) => boolean;
  placeholder: (type: BlockType) => string;
  defaultBlock: (type: BlockType, id: string, content?: string, indentLevel?: number) => Block;
};

export const DEFAULT_CARRY_FORWARD: CarryForwardTable = {
  text: "text",
  heading1: "text",
  heading2: "text",
  heading3: "text",
  bulletList: "bulletList",
  numberedList: "numberedList",
  checkbox: "checkbox",
  quote: "quote",
  code: "code",
  divider: "text"
};

const PLACEHOLDERS: Record<BlockType, string> = {
  text: "Type something...",
  heading1: "Heading 1",
  heading2: "Heading 2",
  heading3: "Heading 3",
  bulletList: "List item",
  numberedList: "List item",
  checkbox: "To-do",
  quote: "Quote",
  code: "Code",
  divider: ""
};

const buildRule = (type: BlockType): BlockTypeRule => ({
  carriesNumber: type === "numberedList",
  exitsOnEmptyReturn: type !== "text" && type !== "code",
  focusable: type !== "divider",
  holdsContent: type !== "divider",
  placeholder: PLACEHOLDERS[type]
});

export const makeBlockOfType = (
  type: BlockType,
  id: string,
  content = "",
  indentLevel = 0
): Block => {
  if (isHeadingType(type)) {
    return { id, type, content, indentLevel, level: headingLevelOf(type) };
  }
  switch (type) {
    case "numberedList":
      return { id, type, content, indentLevel, number: 1 };
    case "checkbox":
      return { id, type, content, indentLevel, isChecked: false };
    case "code":
      return { id, type, content, indentLevel, language: null };
    case "divider":
      return { id, type, content: "", indentLevel };
    case "text":
    case "bulletList":
    case "quote":
      return { id, type, content, indentLevel };
    default:
      return { id, type: "text", content, indentLevel };
  }
};

export const createBlockTypeRegistry = (
  carryForwardOverrides: Partial<CarryForwardTable> = {}
): BlockTypeRegistry => {
  const carry: CarryForwardTable = { ...DEFAULT_CARRY_FORWARD, ...carryForwardOverrides };
  const rules = new Map<BlockType, BlockTypeRule>(
    BLOCK_TYPES.map((type) => [type, buildRule(type)])
  );
  const rule = (type: BlockType) => rules.get(type) ?? buildRule(type);

  return {
    carryForward: (type) => carry[type],
    carriesNumber: (type) => rule(type).carriesNumber,
    exitsOnEmptyReturn: (type) => rule(type).exitsOnEmptyReturn,
    isFocusable: (type) => rule(type).focusable,
    holdsContent: (type) => rule(type).holdsContent,
    placeholder: (type) => rule(type).placeholder,
    defaultBlock: makeBlockOfType
  };
};

export const defaultBlockTypeRegistry = createBlockTypeRegistry();
