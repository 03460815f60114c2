import { withIndent, type Block } from "@stanza/core-model";

export const clamp = (value: number, min: number, max: number) =>
  Math.min(max, Math.max(min, value));

/** Half-open range covering the block at `index` and every deeper block after it. */
export const getSubtreeRange = (blocks: readonly Block[], index: number) => {
  const baseIndent = blocks[index]?.indentLevel ?? 0;
  let end = index + 1;
  while (end < blocks.length && (blocks[end]?.indentLevel ?? 0) > baseIndent) {
    end += 1;
  }
  return { start: index, end };
};

export const shiftIndent = (
  blocks: readonly Block[],
  start: number,
  end: number,
  delta: number,
  maxIndent: number
): Block[] =>
  blocks.map((block, idx) => {
    if (idx < start || idx >= end) return block;
    return withIndent(block, clamp(block.indentLevel + delta, 0, maxIndent));
  });

export const splitContent = (content: string, cursor: number | undefined) => {
  const safeCursor = clamp(cursor ?? content.length, 0, content.length);
  return {
    before: content.slice(0, safeCursor),
    after: content.slice(safeCursor)
  };
};

export const moveBlockRange = (
  blocks: readonly Block[],
  fromIndex: number,
  toIndex: number
): { blocks: Block[]; insertIndex: number; length: number } => {
  const range = getSubtreeRange(blocks, fromIndex);
  const slice = blocks.slice(range.start, range.end);
  const remaining = blocks.slice(0, range.start).concat(blocks.slice(range.end));

  let insertIndex = toIndex;
  if (toIndex > range.start) {
    insertIndex = toIndex - (range.end - range.start);
  }
  insertIndex = clamp(insertIndex, 0, remaining.length);

  return {
    blocks: remaining.slice(0, insertIndex).concat(slice, remaining.slice(insertIndex)),
    insertIndex,
    length: slice.length
  };
};

/**
 * Pulls indentation back wherever a block sits more than one level below its
 * predecessor, starting at `from`. Stops at the first block that already fits.
 */
export const clampIndentFrom = (blocks: readonly Block[], from: number): Block[] => {
  const next = blocks.slice();
  for (let index = Math.max(0, from); index < next.length; index += 1) {
    const block = next[index];
    if (!block) break;
    const allowed = index === 0 ? 0 : (next[index - 1]?.indentLevel ?? 0) + 1;
    if (block.indentLevel <= allowed) break;
    next[index] = withIndent(block, allowed);
  }
  return next;
};
