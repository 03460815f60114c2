import { withIndent, type Block } from "@stanza/core-model";
import {
  arraySequence,
  boundaryIndices,
  expectedNumbers,
  renumberAll,
  runNumbering,
  type BlockSequence
} from "./renumbering";

export type InvariantViolation =
  | { kind: "empty-document" }
  | { kind: "duplicate-id"; blockId: string; index: number }
  | { kind: "invalid-indent"; blockId: string; index: number; indentLevel: number; allowed: number }
  | { kind: "wrong-number"; blockId: string; index: number; number: number; expected: number }
  | { kind: "divider-content"; blockId: string; index: number }
  | { kind: "focus-on-divider"; blockId: string }
  | { kind: "focus-missing"; blockId: string };

const checkBlockAt = (
  blocks: readonly Block[],
  index: number,
  violations: InvariantViolation[]
) => {
  const block = blocks[index];
  if (!block) return;
  const allowed = index === 0 ? 0 : (blocks[index - 1]?.indentLevel ?? 0) + 1;
  if (!Number.isInteger(block.indentLevel) || block.indentLevel < 0 || block.indentLevel > allowed) {
    violations.push({
      kind: "invalid-indent",
      blockId: block.id,
      index,
      indentLevel: block.indentLevel,
      allowed
    });
  }
  if (block.type === "divider" && block.content !== "") {
    violations.push({ kind: "divider-content", blockId: block.id, index });
  }
};

const checkNumber = (
  blocks: readonly Block[],
  index: number,
  expected: number,
  violations: InvariantViolation[]
) => {
  const block = blocks[index];
  if (block?.type === "numberedList" && block.number !== expected) {
    violations.push({
      kind: "wrong-number",
      blockId: block.id,
      index,
      number: block.number,
      expected
    });
  }
};

const checkFocus = (
  blocks: readonly Block[],
  focusedId: string | null,
  violations: InvariantViolation[]
) => {
  if (focusedId === null) return;
  const focused = blocks.find((block) => block.id === focusedId);
  if (!focused) {
    violations.push({ kind: "focus-missing", blockId: focusedId });
  } else if (focused.type === "divider") {
    violations.push({ kind: "focus-on-divider", blockId: focusedId });
  }
};

export const checkInvariants = (
  blocks: readonly Block[],
  focusedId: string | null = null
): InvariantViolation[] => {
  const violations: InvariantViolation[] = [];
  if (blocks.length === 0) {
    violations.push({ kind: "empty-document" });
  }

  const seen = new Set<string>();
  blocks.forEach((block, index) => {
    if (seen.has(block.id)) {
      violations.push({ kind: "duplicate-id", blockId: block.id, index });
    }
    seen.add(block.id);
    checkBlockAt(blocks, index, violations);
  });

  expectedNumbers(blocks).forEach((expected, index) => {
    checkNumber(blocks, index, expected, violations);
  });

  checkFocus(blocks, focusedId, violations);
  return violations;
};

/**
 * Checks the blocks in [start, end), one block on either side, every
 * numbered run passing through them, and focus. Id uniqueness is left to
 * the store, which refuses duplicates.
 */
export const checkInvariantsNear = (
  blocks: readonly Block[],
  start: number,
  end: number,
  focusedId: string | null = null
): InvariantViolation[] => {
  const violations: InvariantViolation[] = [];
  if (blocks.length === 0) {
    violations.push({ kind: "empty-document" });
    return violations;
  }

  const from = Math.max(0, start - 1);
  const to = Math.min(blocks.length, Math.max(start, end) + 1);
  for (let index = from; index < to; index += 1) {
    checkBlockAt(blocks, index, violations);
  }

  const sequence: BlockSequence = {
    size: () => blocks.length,
    at: (index) => blocks[index] ?? null
  };
  const candidates = [
    ...boundaryIndices(sequence, from - 1, -1),
    ...Array.from({ length: to - from }, (_, offset) => from + offset),
    ...boundaryIndices(sequence, to, 1)
  ];
  const covered = new Set<number>();
  for (const candidate of candidates) {
    if (covered.has(candidate)) continue;
    runNumbering(sequence, candidate).forEach(({ index, expected }) => {
      covered.add(index);
      checkNumber(blocks, index, expected, violations);
    });
  }

  checkFocus(blocks, focusedId, violations);
  return violations;
};

/**
 * Clamps indentation, empties dividers and renumbers every run. Ids and
 * focus are left to the caller.
 */
export const repairDocument = (blocks: readonly Block[]): Block[] => {
  const repaired: Block[] = [];
  blocks.forEach((block, index) => {
    const previous = repaired[index - 1];
    const allowed = previous ? previous.indentLevel + 1 : 0;
    const level = Number.isInteger(block.indentLevel) ? block.indentLevel : 0;
    let next = withIndent(block, Math.min(allowed, Math.max(0, level)));
    if (next.type === "divider" && next.content !== "") {
      next = { ...next, content: "" };
    }
    repaired.push(next);
  });
  renumberAll(arraySequence(repaired));
  return repaired;
};
