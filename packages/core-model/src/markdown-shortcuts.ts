import type { BlockType } from "./block-model";

export type MarkdownShortcut = {
  type: BlockType;
  content: string;
  language?: string | null;
};

const HEADING_1_PATTERN = /^#\s+/u;
const HEADING_2_PATTERN = /^##\s+/u;
const HEADING_3_PATTERN = /^###\s+/u;
const BULLET_PATTERN = /^[-*]\s+/u;
const NUMBERED_PATTERN = /^\d+\.\s+/u;
const CHECKBOX_PATTERN = /^\[ ?\]\s+/u;
const QUOTE_PATTERN = /^>\s+/u;
const CODE_PATTERN = /^```/u;
const DIVIDER_PATTERN = /^(?:---|\*\*\*)$/u;

const stripPattern = (value: string, pattern: RegExp) => value.replace(pattern, "").trim();

/**
 * Shortcuts fire only at the moment a space is typed at the end of the
 * content, so a marker pasted in the middle of typing is left alone.
 */
export const justTypedSpace = (previous: string, next: string) =>
  next.endsWith(" ") && !previous.endsWith(" ");

export const detectMarkdownShortcut = (value: string): MarkdownShortcut | null => {
  const content = value.trimStart();
  if (!content.trim()) return null;

  if (DIVIDER_PATTERN.test(content.trim())) {
    return { type: "divider", content: "" };
  }
  if (HEADING_3_PATTERN.test(content)) {
    return { type: "heading3", content: stripPattern(content, HEADING_3_PATTERN) };
  }
  if (HEADING_2_PATTERN.test(content)) {
    return { type: "heading2", content: stripPattern(content, HEADING_2_PATTERN) };
  }
  if (HEADING_1_PATTERN.test(content)) {
    return { type: "heading1", content: stripPattern(content, HEADING_1_PATTERN) };
  }
  if (BULLET_PATTERN.test(content)) {
    return { type: "bulletList", content: stripPattern(content, BULLET_PATTERN) };
  }
  if (NUMBERED_PATTERN.test(content)) {
    return { type: "numberedList", content: stripPattern(content, NUMBERED_PATTERN) };
  }
  if (CHECKBOX_PATTERN.test(content)) {
    return { type: "checkbox", content: stripPattern(content, CHECKBOX_PATTERN) };
  }
  if (QUOTE_PATTERN.test(content)) {
    return { type: "quote", content: stripPattern(content, QUOTE_PATTERN) };
  }
  if (CODE_PATTERN.test(content)) {
    const language = stripPattern(content, CODE_PATTERN);
    return { type: "code", content: "", language: language || null };
  }
  return null;
};
