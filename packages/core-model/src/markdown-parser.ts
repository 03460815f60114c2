import type { Block, HeadingLevel } from "./block-model";
import { headingTypeOf } from "./block-model";
import { makeBlockOfType } from "./block-type-registry";

export type MarkdownParseResult = {
  blocks: Block[];
  warnings: string[];
};

const INDENT_UNIT = 2;

const FENCE_PATTERN = /^```(.*)$/u;
const DIVIDER_PATTERN = /^(?:---|\*\*\*)$/u;
const HEADING_PATTERN = /^(#{1,3})(?:\s+(.*))?$/u;
const CHECKBOX_PATTERN = /^(?:[-*]\s+)?\[( |x|X)?\](?:\s+(.*))?$/u;
const BULLET_PATTERN = /^[-*](?:\s+(.*))?$/u;
const NUMBERED_PATTERN = /^(\d+)\.(?:\s+(.*))?$/u;
const QUOTE_PATTERN = /^>(?:\s?(.*))?$/u;

const normalizeIndent = (value: string) => value.replace(/\t/g, "  ");

const measureIndent = (line: string) => {
  const leading = normalizeIndent(line.match(/^\s*/u)?.[0] ?? "");
  return Math.floor(leading.length / INDENT_UNIT);
};

const stripIndentPrefix = (line: string, width: number) => {
  const normalized = normalizeIndent(line);
  let cut = 0;
  while (cut < width && normalized[cut] === " ") {
    cut += 1;
  }
  return normalized.slice(cut);
};

const parseLine = (trimmed: string, id: string, indentLevel: number): Block => {
  if (DIVIDER_PATTERN.test(trimmed)) {
    return makeBlockOfType("divider", id, "", indentLevel);
  }
  const heading = trimmed.match(HEADING_PATTERN);
  if (heading) {
    const hashes = heading[1]?.length ?? 1;
    const level: HeadingLevel = hashes >= 3 ? 3 : hashes === 2 ? 2 : 1;
    return makeBlockOfType(headingTypeOf(level), id, heading[2] ?? "", indentLevel);
  }
  const checkbox = trimmed.match(CHECKBOX_PATTERN);
  if (checkbox) {
    const isChecked = checkbox[1] === "x" || checkbox[1] === "X";
    return {
      id,
      type: "checkbox",
      content: checkbox[2] ?? "",
      indentLevel,
      isChecked
    };
  }
  const bullet = trimmed.match(BULLET_PATTERN);
  if (bullet) {
    return makeBlockOfType("bulletList", id, bullet[1] ?? "", indentLevel);
  }
  const numbered = trimmed.match(NUMBERED_PATTERN);
  if (numbered) {
    return {
      id,
      type: "numberedList",
      content: numbered[2] ?? "",
      indentLevel,
      number: Math.max(1, Number.parseInt(numbered[1] ?? "1", 10))
    };
  }
  const quote = trimmed.match(QUOTE_PATTERN);
  if (quote) {
    return makeBlockOfType("quote", id, quote[1] ?? "", indentLevel);
  }
  return makeBlockOfType("text", id, trimmed, indentLevel);
};

const clampIndentation = (blocks: Block[], warnings: string[]) => {
  let previous = -1;
  return blocks.map((block, index) => {
    const allowed = previous + 1;
    const indentLevel = Math.min(block.indentLevel, allowed);
    if (indentLevel !== block.indentLevel) {
      warnings.push(
        `Block ${index + 1}: indentation ${block.indentLevel} exceeds ${allowed}, clamped.`
      );
    }
    previous = indentLevel;
    return indentLevel === block.indentLevel ? block : { ...block, indentLevel };
  });
};

/**
 * Parses the Markdown subset written by `serializeBlocksToMarkdown`. Blank
 * lines are dropped, so an empty text block does not survive a round trip;
 * the record codec is the lossless format. Numbered items keep the number
 * they were written with until an editor session renumbers them.
 */
export const parseMarkdownBlocks = (
  markdown: string,
  makeId: () => string
): MarkdownParseResult => {
  const warnings: string[] = [];
  const lines = markdown.replace(/\r\n?/g, "\n").split("\n");
  const blocks: Block[] = [];

  for (let cursor = 0; cursor < lines.length; cursor += 1) {
    const rawLine = lines[cursor] ?? "";
    const trimmed = rawLine.trim();
    if (!trimmed) continue;

    const indentLevel = measureIndent(rawLine);
    const fence = trimmed.match(FENCE_PATTERN);
    if (fence) {
      const language = (fence[1] ?? "").trim();
      const body: string[] = [];
      let closed = false;
      cursor += 1;
      for (; cursor < lines.length; cursor += 1) {
        const line = lines[cursor] ?? "";
        if (line.trim() === "```") {
          closed = true;
          break;
        }
        body.push(stripIndentPrefix(line, indentLevel * INDENT_UNIT));
      }
      if (!closed) {
        warnings.push("Unterminated code fence, read to end of input.");
      }
      blocks.push({
        id: makeId(),
        type: "code",
        content: body.join("\n"),
        indentLevel,
        language: language || null
      });
      continue;
    }

    blocks.push(parseLine(trimmed, makeId(), indentLevel));
  }

  if (blocks.length === 0) {
    return { blocks: [makeBlockOfType("text", makeId())], warnings };
  }

  return { blocks: clampIndentation(blocks, warnings), warnings };
};
