import type { Block } from "@stanza/core-model";
import { moveBlockRange } from "./outline";
import type { NumberedSequence } from "./renumbering";

export type StoreFailure = "not-found" | "last-block" | "duplicate-id" | "id-mismatch";

export type TouchedRange = { start: number; end: number };

export type StoreResult<T> = { ok: true; value: T } | { ok: false; reason: StoreFailure };

const ok = <T>(value: T): StoreResult<T> => ({ ok: true, value });
const fail = <T>(reason: StoreFailure): StoreResult<T> => ({ ok: false, reason });

/**
 * Ordered, identity-stable block collection. Blocks are treated as immutable
 * values: every change swaps in a new object, so a snapshot handed out by
 * `all()` never changes under its reader.
 */
export class BlockStore {
  private blocks: Block[];
  private snapshot: readonly Block[] | null = null;
  private readonly knownIds = new Set<string>();
  private touched: TouchedRange | null = null;

  constructor(blocks: readonly Block[]) {
    this.blocks = [];
    const result = this.replaceAll(blocks);
    if (!result.ok) {
      throw new Error(`invalid-document: ${result.reason}`);
    }
    this.touched = null;
  }

  /**
   * Widens the touched range to cover [start, end). `shift` moves the part
   * of an earlier range that sits at or after `start`, for insertions.
   */
  private touch(start: number, end: number, shift = 0) {
    this.snapshot = null;
    const previous = this.touched;
    if (!previous) {
      this.touched = { start, end };
      return;
    }
    const previousEnd = previous.end > start ? previous.end + shift : previous.end;
    this.touched = {
      start: Math.min(previous.start, start),
      end: Math.max(previousEnd, end)
    };
  }

  /** Index range changed since the last call, or null when nothing changed. */
  takeTouchedRange(): TouchedRange | null {
    const range = this.touched;
    this.touched = null;
    return range;
  }

  /** Swaps the whole sequence, e.g. when a document is loaded. */
  replaceAll(blocks: readonly Block[]): StoreResult<number> {
    const ids = new Set<string>();
    for (const block of blocks) {
      if (ids.has(block.id)) return fail("duplicate-id");
      ids.add(block.id);
    }
    if (blocks.length === 0) return fail("last-block");
    this.blocks = blocks.slice();
    ids.forEach((id) => this.knownIds.add(id));
    this.touch(0, this.blocks.length);
    return ok(this.blocks.length);
  }

  all(): readonly Block[] {
    if (!this.snapshot) {
      this.snapshot = Object.freeze(this.blocks.slice());
    }
    return this.snapshot;
  }

  size() {
    return this.blocks.length;
  }

  at(index: number): Block | null {
    return this.blocks[index] ?? null;
  }

  get(id: string): Block | null {
    return this.blocks.find((block) => block.id === id) ?? null;
  }

  indexOf(id: string): number | null {
    const index = this.blocks.findIndex((block) => block.id === id);
    return index === -1 ? null : index;
  }

  /** True for every id this store has ever held, removed ones included. */
  hasSeen(id: string) {
    return this.knownIds.has(id);
  }

  insert(block: Block, afterId: string | null): StoreResult<number> {
    if (this.knownIds.has(block.id)) return fail("duplicate-id");
    let index = 0;
    if (afterId !== null) {
      const afterIndex = this.indexOf(afterId);
      if (afterIndex === null) return fail("not-found");
      index = afterIndex + 1;
    }
    this.blocks.splice(index, 0, block);
    this.knownIds.add(block.id);
    this.touch(index, index + 1, 1);
    return ok(index);
  }

  remove(id: string): StoreResult<{ block: Block; index: number }> {
    const index = this.indexOf(id);
    if (index === null) return fail("not-found");
    if (this.blocks.length <= 1) return fail("last-block");
    const [block] = this.blocks.splice(index, 1);
    this.touch(index, index);
    if (!block) return fail("not-found");
    return ok({ block, index });
  }

  update(id: string, mutator: (block: Block) => Block): StoreResult<Block> {
    const index = this.indexOf(id);
    if (index === null) return fail("not-found");
    const current = this.blocks[index];
    if (!current) return fail("not-found");
    const next = mutator(current);
    if (next.id !== id) return fail("id-mismatch");
    if (next !== current) {
      this.blocks[index] = next;
      this.touch(index, index + 1);
    }
    return ok(next);
  }

  /**
   * Replaces [start, end) with a rearrangement of the same blocks, as used
   * by indentation shifts. Any id outside the range is refused.
   */
  replaceRange(start: number, end: number, replacement: readonly Block[]): StoreResult<number> {
    const current = this.blocks.slice(start, end);
    if (current.length !== replacement.length) return fail("id-mismatch");
    const ids = new Set(current.map((block) => block.id));
    if (!replacement.every((block) => ids.has(block.id))) return fail("id-mismatch");
    this.blocks.splice(start, end - start, ...replacement);
    this.touch(start, end);
    return ok(start);
  }

  /** Moves a block together with its subtree; the value is the new index of the block. */
  move(id: string, toIndex: number): StoreResult<{ index: number; length: number }> {
    const fromIndex = this.indexOf(id);
    if (fromIndex === null) return fail("not-found");
    const moved = moveBlockRange(this.blocks, fromIndex, toIndex);
    this.blocks = moved.blocks;
    this.touch(
      Math.min(fromIndex, moved.insertIndex),
      Math.max(fromIndex, moved.insertIndex) + moved.length
    );
    return ok({ index: moved.insertIndex, length: moved.length });
  }

  asSequence(): NumberedSequence {
    return {
      size: () => this.size(),
      at: (index) => this.at(index),
      setNumber: (index, value) => {
        const block = this.at(index);
        if (!block) return;
        this.update(block.id, (current) =>
          current.type === "numberedList" ? { ...current, number: value } : current
        );
      }
    };
  }
}
