import type { Block } from "@stanza/core-model";

/**
 * Minimal view of an ordered block list the pass needs. Both the live
 * BlockStore and plain arrays are adapted to it.
 */
export type BlockSequence = {
  size: () => number;
  at: (index: number) => Block | null;
};

export type NumberedSequence = BlockSequence & {
  setNumber: (index: number, value: number) => void;
};

export type RenumberStats = {
  runs: number;
  writes: number;
};

export const arraySequence = (blocks: Block[]): NumberedSequence => ({
  size: () => blocks.length,
  at: (index) => blocks[index] ?? null,
  setNumber: (index, value) => {
    const block = blocks[index];
    if (block?.type === "numberedList") {
      blocks[index] = { ...block, number: value };
    }
  }
});

const isNumberedAt = (block: Block, level: number) =>
  block.type === "numberedList" && block.indentLevel === level;

/** Index of the first member of the run containing the numbered block at `index`. */
export const findRunStart = (sequence: BlockSequence, index: number) => {
  const block = sequence.at(index);
  if (!block || block.type !== "numberedList") return null;
  const level = block.indentLevel;
  let start = index;
  for (let cursor = index - 1; cursor >= 0; cursor -= 1) {
    const candidate = sequence.at(cursor);
    if (!candidate) break;
    if (candidate.indentLevel > level) continue;
    if (!isNumberedAt(candidate, level)) break;
    start = cursor;
  }
  return start;
};

export type RunMember = {
  index: number;
  expected: number;
};

const walkRun = (sequence: BlockSequence, start: number): RunMember[] => {
  const first = sequence.at(start);
  const members: RunMember[] = [];
  if (!first || first.type !== "numberedList") return members;
  const level = first.indentLevel;
  for (let cursor = start; cursor < sequence.size(); cursor += 1) {
    const block = sequence.at(cursor);
    if (!block) break;
    if (block.indentLevel > level) continue;
    if (block.type !== "numberedList" || block.indentLevel !== level) break;
    members.push({ index: cursor, expected: members.length + 1 });
  }
  return members;
};

/** Members of the run containing `index`, each with the number it should carry. */
export const runNumbering = (sequence: BlockSequence, index: number): RunMember[] => {
  const start = findRunStart(sequence, index);
  return start === null ? [] : walkRun(sequence, start);
};

/**
 * Assigns 1..N to the run starting at `start`, writing only numbers that
 * differ. Returns the indices of the run's members.
 */
const numberRunFrom = (sequence: NumberedSequence, start: number) => {
  const members = walkRun(sequence, start);
  let writes = 0;
  members.forEach(({ index, expected }) => {
    const block = sequence.at(index);
    if (block?.type === "numberedList" && block.number !== expected) {
      sequence.setNumber(index, expected);
      writes += 1;
    }
  });
  return { members: members.map(({ index }) => index), writes };
};

export const renumberRunContaining = (sequence: NumberedSequence, index: number) => {
  const start = findRunStart(sequence, index);
  if (start === null) return 0;
  return numberRunFrom(sequence, start).writes;
};

/**
 * Nearest blocks on one side of a position whose indentation is lower than
 * everything between them and the position. For each level these are the
 * blocks that decide whether a run continues across the position.
 */
export const boundaryIndices = (sequence: BlockSequence, from: number, step: 1 | -1) => {
  const indices: number[] = [];
  let floor = Number.POSITIVE_INFINITY;
  for (let cursor = from; cursor >= 0 && cursor < sequence.size(); cursor += step) {
    const block = sequence.at(cursor);
    if (!block) break;
    if (block.indentLevel < floor) {
      floor = block.indentLevel;
      indices.push(cursor);
      if (floor === 0) break;
    }
  }
  return indices;
};

/**
 * Renumbers every run touched by a change to the half-open index range
 * [start, end). For a removal pass start === end === the index the removed
 * block occupied. Work is bounded by the runs around the change, never by
 * the whole document.
 */
export const renumberAround = (
  sequence: NumberedSequence,
  start: number,
  end = start + 1
): RenumberStats => {
  const candidates = [
    ...boundaryIndices(sequence, start - 1, -1),
    ...Array.from({ length: Math.max(0, end - start) }, (_, offset) => start + offset),
    ...boundaryIndices(sequence, end, 1)
  ];
  const covered = new Set<number>();
  const stats: RenumberStats = { runs: 0, writes: 0 };

  for (const candidate of candidates) {
    if (covered.has(candidate)) continue;
    const runStart = findRunStart(sequence, candidate);
    if (runStart === null) continue;
    const { members, writes } = numberRunFrom(sequence, runStart);
    members.forEach((member) => covered.add(member));
    stats.runs += 1;
    stats.writes += writes;
  }

  return stats;
};

/** Expected number for every numbered block, in one pass over the document. */
export const expectedNumbers = (blocks: readonly Block[]) => {
  const counters = new Map<number, number>();
  const expected = new Map<number, number>();
  blocks.forEach((block, index) => {
    for (const level of Array.from(counters.keys())) {
      if (level > block.indentLevel) counters.delete(level);
    }
    if (block.type === "numberedList") {
      const value = counters.get(block.indentLevel) ?? 1;
      expected.set(index, value);
      counters.set(block.indentLevel, value + 1);
    } else {
      counters.delete(block.indentLevel);
    }
  });
  return expected;
};

/** Whole-document pass, for loading and repair only. */
export const renumberAll = (sequence: NumberedSequence): RenumberStats => {
  const blocks: Block[] = [];
  for (let index = 0; index < sequence.size(); index += 1) {
    const block = sequence.at(index);
    if (block) blocks.push(block);
  }
  const stats: RenumberStats = { runs: 0, writes: 0 };
  expectedNumbers(blocks).forEach((value, index) => {
    if (value === 1) stats.runs += 1;
    const block = blocks[index];
    if (block?.type === "numberedList" && block.number !== value) {
      sequence.setNumber(index, value);
      stats.writes += 1;
    }
  });
  return stats;
};
