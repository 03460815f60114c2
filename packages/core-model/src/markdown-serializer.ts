import type { Block } from "./block-model";

const INDENT_UNIT = "  ";

const prefixFor = (block: Block): string => {
  switch (block.type) {
    case "heading1":
    case "heading2":
    case "heading3":
      return `${"#".repeat(block.level)} `;
    case "bulletList":
      return "- ";
    case "numberedList":
      return `${block.number}. `;
    case "checkbox":
      return block.isChecked ? "- [x] " : "- [ ] ";
    case "quote":
      return "> ";
    default:
      return "";
  }
};

const formatMultilineText = (value: string, continuationIndent: string) => {
  const lines = value.split("\n");
  if (lines.length <= 1) return value;
  return lines
    .map((line, index) => (index === 0 ? line : `${continuationIndent}${line}`))
    .join("\n");
};

const formatCodeBlock = (content: string, language: string | null, indent: string) => {
  const fence = `${indent}\`\`\`${language ?? ""}`;
  const body = content.length > 0 ? content.split("\n").map((line) => `${indent}${line}`) : [];
  return [fence, ...body, `${indent}\`\`\``].join("\n");
};

const formatBlockLine = (block: Block) => {
  const indent = INDENT_UNIT.repeat(Math.max(0, block.indentLevel));
  if (block.type === "code") {
    return formatCodeBlock(block.content, block.language, indent);
  }
  if (block.type === "divider") {
    return `${indent}---`;
  }
  const prefix = prefixFor(block);
  const text = formatMultilineText(block.content, `${indent}${INDENT_UNIT}`);
  return `${indent}${prefix}${text}`.trimEnd();
};

export const serializeBlocksToMarkdown = (blocks: readonly Block[]) => {
  if (blocks.length === 0) return "";
  return `${blocks.map(formatBlockLine).join("\n")}\n`;
};

export const serializeBlocksToPlainText = (blocks: readonly Block[]) =>
  blocks.map((block) => block.content).join("\n");
