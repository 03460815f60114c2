import {
  detectMarkdownShortcut,
  justTypedSpace,
  withContent,
  type Block,
  type BlockType
} from "@stanza/core-model";
import type { BlockStore } from "./block-store";
import type { ResolvedEditorConfig } from "./editor-config";
import {
  InvariantViolationError,
  applied,
  clamped,
  ignored,
  notFound,
  type EditResult
} from "./editor-errors";
import type { FocusRouter } from "./focus-router";
import { checkInvariants, checkInvariantsNear, repairDocument } from "./invariants";
import { clampIndentFrom, getSubtreeRange, shiftIndent, splitContent } from "./outline";
import { renumberAround } from "./renumbering";

export type EditEngine = {
  onReturn: (blockId: string, cursor?: number) => EditResult;
  onBackspace: (blockId: string) => EditResult;
  onTab: (blockId: string) => EditResult;
  onShiftTab: (blockId: string) => EditResult;
  updateBlockType: (blockId: string, type: BlockType) => EditResult;
  createBlock: (type: BlockType, afterId: string | null) => EditResult;
  mergeWithPreviousBlock: (blockId: string) => EditResult;
  updateContent: (blockId: string, text: string) => EditResult;
  toggleCheckbox: (blockId: string) => EditResult;
  moveBlock: (blockId: string, toIndex: number) => EditResult;
};

type EditEngineOptions = {
  store: BlockStore;
  focus: FocusRouter;
  config: ResolvedEditorConfig;
};

type Direction = "backward" | "forward";

export const createEditEngine = ({ store, focus, config }: EditEngineOptions): EditEngine => {
  const { registry, maxIndentLevel } = config;

  const nextId = () => {
    const candidate = config.makeId();
    if (!store.hasSeen(candidate)) return candidate;
    let suffix = 2;
    while (store.hasSeen(`${candidate}-${suffix}`)) suffix += 1;
    return `${candidate}-${suffix}`;
  };

  const renumber = (start: number, end?: number) => {
    renumberAround(store.asSequence(), start, end);
  };

  const isFocusableAt = (index: number) => {
    const block = store.at(index);
    return block !== null && registry.isFocusable(block.type);
  };

  const findFocusable = (from: number, direction: Direction) => {
    const step = direction === "forward" ? 1 : -1;
    for (let index = from; index >= 0 && index < store.size(); index += step) {
      if (isFocusableAt(index)) return store.at(index);
    }
    return null;
  };

  const focusNearest = (candidates: Array<[number, Direction]>) => {
    for (const [from, direction] of candidates) {
      const target = findFocusable(from, direction);
      if (target) {
        focus.focus(target.id);
        return;
      }
    }
    focus.clear();
  };

  /** Moves focus off a block that just became a divider. */
  const refocusIfDivider = (blockId: string) => {
    if (focus.current() !== blockId) return;
    const index = store.indexOf(blockId);
    if (index === null) return;
    if (isFocusableAt(index)) return;
    focusNearest([
      [index + 1, "forward"],
      [index - 1, "backward"]
    ]);
  };

  /**
   * Checks what the operation touched; debug mode checks the whole
   * document.
   */
  const verify = () => {
    const touched = store.takeTouchedRange();
    const violations = config.debug
      ? checkInvariants(store.all(), focus.current())
      : checkInvariantsNear(
          store.all(),
          touched?.start ?? 0,
          touched?.end ?? 0,
          focus.current()
        );
    if (violations.length === 0) return;
    if (config.debug) {
      throw new InvariantViolationError(violations);
    }
    config.logger.warn("Repairing document after invariant violation", violations);
    store.replaceRange(0, store.size(), repairDocument(store.all()));
    store.takeTouchedRange();
    const focusedId = focus.current();
    if (focusedId === null) return;
    const index = store.indexOf(focusedId);
    if (index === null) {
      focus.clear();
      return;
    }
    refocusIfDivider(focusedId);
  };

  const finish = (result: EditResult) => {
    verify();
    return result;
  };

  const convertInPlace = (block: Block, index: number, type: BlockType, content: string) => {
    const next = registry.defaultBlock(
      type,
      block.id,
      registry.holdsContent(type) ? content : "",
      block.indentLevel
    );
    store.update(block.id, () => next);
    if (registry.carriesNumber(block.type) || registry.carriesNumber(next.type)) {
      renumber(index);
    }
    refocusIfDivider(block.id);
    return next;
  };

  /**
   * Removes the block at `index`. Its children are adopted by the new
   * predecessor, moving up a level only when they would otherwise sit two
   * levels below it.
   */
  const removeAt = (index: number): EditResult | null => {
    const { end } = getSubtreeRange(store.all(), index);
    const block = store.at(index);
    if (!block) return ignored("no-change");
    const removed = store.remove(block.id);
    if (!removed.ok) return ignored("last-block");
    const childrenEnd = end - 1;
    const firstChild = store.at(index);
    if (childrenEnd > index && firstChild) {
      const ceiling = index === 0 ? 0 : (store.at(index - 1)?.indentLevel ?? 0) + 1;
      const delta = Math.min(0, ceiling - firstChild.indentLevel);
      if (delta < 0) {
        const shifted = shiftIndent(store.all(), index, childrenEnd, delta, maxIndentLevel);
        store.replaceRange(index, childrenEnd, shifted.slice(index, childrenEnd));
      }
    }
    renumber(index, childrenEnd);
    if (focus.current() === block.id) {
      focus.clear();
    }
    return null;
  };

  const mergeIntoPredecessor = (block: Block, index: number): EditResult => {
    const previous = store.at(index - 1);
    if (!previous) return ignored("first-block");
    const cursor = previous.content.length;
    if (block.content !== "" && registry.holdsContent(previous.type)) {
      store.update(previous.id, (current) => withContent(current, current.content + block.content));
    }
    const failure = removeAt(index);
    if (failure) return finish(failure);
    focusNearest([
      [index - 1, "backward"],
      [index, "forward"]
    ]);
    return finish(applied({ removedBlockId: block.id, cursor }));
  };

  const shiftSubtree = (blockId: string, delta: 1 | -1): EditResult => {
    const index = store.indexOf(blockId);
    const block = index === null ? null : store.at(index);
    if (index === null || !block) return notFound(blockId);

    const requested = block.indentLevel + delta;
    const ceiling = index === 0 ? 0 : (store.at(index - 1)?.indentLevel ?? 0) + 1;
    const allowed =
      delta > 0
        ? Math.max(block.indentLevel, Math.min(requested, ceiling, maxIndentLevel))
        : Math.max(0, requested);

    if (allowed === block.indentLevel) {
      return finish(clamped(requested, allowed));
    }

    const { start, end } = getSubtreeRange(store.all(), index);
    const shifted = shiftIndent(store.all(), start, end, allowed - block.indentLevel, maxIndentLevel);
    store.replaceRange(start, end, shifted.slice(start, end));
    renumber(start, end);

    return finish(requested === allowed ? applied() : clamped(requested, allowed));
  };

  const onReturn = (blockId: string, cursor?: number): EditResult => {
    const index = store.indexOf(blockId);
    const block = index === null ? null : store.at(index);
    if (index === null || !block) return notFound(blockId);

    if (block.content === "" && registry.exitsOnEmptyReturn(block.type)) {
      convertInPlace(block, index, "text", "");
      return finish(applied({ cursor: 0 }));
    }

    const type = registry.carryForward(block.type);
    // The tail only moves when the new block can hold it.
    const { before, after } = registry.holdsContent(type)
      ? splitContent(block.content, cursor)
      : { before: block.content, after: "" };
    if (before !== block.content) {
      store.update(block.id, (current) => withContent(current, before));
    }

    const created = registry.defaultBlock(type, nextId(), after, block.indentLevel);
    const inserted = store.insert(created, block.id);
    if (!inserted.ok) return finish(ignored("no-change"));
    renumber(index, inserted.value + 1);

    if (registry.isFocusable(created.type)) {
      focus.focus(created.id);
    } else {
      focusNearest([
        [inserted.value + 1, "forward"],
        [index, "backward"]
      ]);
    }
    return finish(applied({ createdBlockId: created.id, cursor: 0 }));
  };

  const onBackspace = (blockId: string): EditResult => {
    const index = store.indexOf(blockId);
    const block = index === null ? null : store.at(index);
    if (index === null || !block) return notFound(blockId);
    if (block.content !== "") return ignored("not-empty");

    if (index > 0) return mergeIntoPredecessor(block, index);
    if (block.type === "text") return ignored("first-block");

    convertInPlace(block, index, "text", "");
    return finish(applied({ cursor: 0 }));
  };

  const updateBlockType = (blockId: string, type: BlockType): EditResult => {
    const index = store.indexOf(blockId);
    const block = index === null ? null : store.at(index);
    if (index === null || !block) return notFound(blockId);
    if (block.type === type) return ignored("no-change");

    convertInPlace(block, index, type, block.content);
    return finish(applied());
  };

  const createBlock = (type: BlockType, afterId: string | null): EditResult => {
    let indentLevel = 0;
    if (afterId !== null) {
      const reference = store.get(afterId);
      if (!reference) return notFound(afterId);
      indentLevel = reference.indentLevel;
    }

    const created = registry.defaultBlock(type, nextId(), "", indentLevel);
    const inserted = store.insert(created, afterId);
    if (!inserted.ok) return finish(ignored("no-change"));
    renumber(inserted.value);

    if (registry.isFocusable(type)) {
      focus.focus(created.id);
    } else {
      focusNearest([
        [inserted.value + 1, "forward"],
        [inserted.value - 1, "backward"]
      ]);
    }
    return finish(applied({ createdBlockId: created.id }));
  };

  const mergeWithPreviousBlock = (blockId: string): EditResult => {
    const index = store.indexOf(blockId);
    const block = index === null ? null : store.at(index);
    if (index === null || !block) return notFound(blockId);
    if (index === 0) return ignored("first-block");

    const previous = store.at(index - 1);
    if (previous?.type !== "divider") return mergeIntoPredecessor(block, index);

    const failure = removeAt(index - 1);
    if (failure) return finish(failure);
    if (registry.isFocusable(block.type)) {
      focus.focus(block.id);
    }
    return finish(applied({ removedBlockId: previous.id, cursor: 0 }));
  };

  const updateContent = (blockId: string, text: string): EditResult => {
    const index = store.indexOf(blockId);
    const block = index === null ? null : store.at(index);
    if (index === null || !block) return notFound(blockId);
    if (!registry.holdsContent(block.type)) return ignored("divider");
    if (block.content === text) return ignored("no-change");

    const shortcut =
      config.markdownShortcuts && block.type === "text" && justTypedSpace(block.content, text)
        ? detectMarkdownShortcut(text)
        : null;
    if (!shortcut) {
      store.update(block.id, (current) => withContent(current, text));
      return finish(applied({ cursor: text.length }));
    }

    const converted = convertInPlace(block, index, shortcut.type, shortcut.content);
    if (converted.type === "code" && shortcut.language) {
      const language = shortcut.language;
      store.update(block.id, (current) =>
        current.type === "code" ? { ...current, language } : current
      );
    }
    return finish(applied({ cursor: converted.content.length }));
  };

  const toggleCheckbox = (blockId: string): EditResult => {
    const block = store.get(blockId);
    if (!block) return notFound(blockId);
    if (block.type !== "checkbox") return ignored("not-checkbox");
    store.update(blockId, (current) =>
      current.type === "checkbox" ? { ...current, isChecked: !current.isChecked } : current
    );
    return finish(applied());
  };

  const moveBlock = (blockId: string, toIndex: number): EditResult => {
    const fromIndex = store.indexOf(blockId);
    if (fromIndex === null) return notFound(blockId);

    const target = Math.min(Math.max(0, Math.trunc(toIndex)), store.size());
    const { start, end } = getSubtreeRange(store.all(), fromIndex);
    if (target > start && target < end) return ignored("inside-subtree");
    if (target === start || target === end) return ignored("no-change");

    const moved = store.move(blockId, target);
    if (!moved.ok) return notFound(blockId);
    const { index, length } = moved.value;
    const rangeEnd = index + length;

    const root = store.at(index);
    if (root) {
      const ceiling = index === 0 ? 0 : (store.at(index - 1)?.indentLevel ?? 0) + 1;
      if (root.indentLevel > ceiling) {
        const shifted = shiftIndent(
          store.all(),
          index,
          rangeEnd,
          ceiling - root.indentLevel,
          maxIndentLevel
        );
        store.replaceRange(index, rangeEnd, shifted.slice(index, rangeEnd));
      }
    }

    const clampedTail = clampIndentFrom(store.all(), rangeEnd);
    let tailEnd = rangeEnd;
    while (tailEnd < clampedTail.length && clampedTail[tailEnd] !== store.at(tailEnd)) {
      tailEnd += 1;
    }
    if (tailEnd > rangeEnd) {
      store.replaceRange(rangeEnd, tailEnd, clampedTail.slice(rangeEnd, tailEnd));
    }

    const gap = index < fromIndex ? fromIndex + length : fromIndex;
    renumber(gap, gap);
    renumber(index, tailEnd);
    return finish(applied());
  };

  return {
    onReturn,
    onBackspace,
    onTab: (blockId) => shiftSubtree(blockId, 1),
    onShiftTab: (blockId) => shiftSubtree(blockId, -1),
    updateBlockType,
    createBlock,
    mergeWithPreviousBlock,
    updateContent,
    toggleCheckbox,
    moveBlock
  };
};
