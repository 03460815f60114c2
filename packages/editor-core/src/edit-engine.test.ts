import {
  createSequentialIdFactory,
  makeBlockOfType,
  type Block,
  type BlockType
} from "@stanza/core-model";
import { describe, expect, it, vi } from "vitest";
import { BlockStore } from "./block-store";
import { createEditEngine } from "./edit-engine";
import { resolveEditorConfig, type EditorConfig } from "./editor-config";
import { InvariantViolationError } from "./editor-errors";
import { createFocusRouter } from "./focus-router";

const block = (type: BlockType, id: string, content = "", indentLevel = 0): Block =>
  makeBlockOfType(type, id, content, indentLevel);

const numbered = (id: string, number: number, content = id, indentLevel = 0): Block => ({
  id,
  type: "numberedList",
  content,
  indentLevel,
  number
});

const setup = (blocks: Block[], config: EditorConfig = {}) => {
  const store = new BlockStore(blocks);
  const focus = createFocusRouter({
    canFocus: (id) => {
      const found = store.get(id);
      return found !== null && found.type !== "divider";
    }
  });
  const engine = createEditEngine({
    store,
    focus,
    config: resolveEditorConfig({
      makeId: createSequentialIdFactory("new-"),
      debug: true,
      ...config
    })
  });
  const rows = () =>
    store.all().map((item) => [item.id, item.type, item.content, item.indentLevel]);
  const numbers = () =>
    store.all().map((item) => (item.type === "numberedList" ? item.number : null));
  const indents = () => store.all().map((item) => item.indentLevel);
  return { store, focus, engine, rows, numbers, indents };
};

describe("editing scenarios", () => {
  it("creates an empty text block after a title on Return", () => {
    const { engine, focus, rows } = setup([block("text", "t", "Title")]);

    const result = engine.onReturn("t");

    expect(result).toEqual({ status: "applied", createdBlockId: "new-1", cursor: 0 });
    expect(rows()).toEqual([
      ["t", "text", "Title", 0],
      ["new-1", "text", "", 0]
    ]);
    expect(focus.current()).toBe("new-1");
  });

  it("leaves a list when Return is pressed on an empty item", () => {
    const { engine, rows } = setup([block("bulletList", "a", "a"), block("bulletList", "b")]);

    engine.onReturn("b");

    expect(rows()).toEqual([
      ["a", "bulletList", "a", 0],
      ["b", "text", "", 0]
    ]);
  });

  it("removes an empty block on Backspace and focuses its predecessor", () => {
    const { engine, focus, rows } = setup([block("text", "a", "a"), block("text", "b")]);
    focus.focus("b");

    const result = engine.onBackspace("b");

    expect(result).toEqual({ status: "applied", removedBlockId: "b", cursor: 1 });
    expect(rows()).toEqual([["a", "text", "a", 0]]);
    expect(focus.current()).toBe("a");
  });

  it("renumbers a list after a middle item is removed", () => {
    const { engine, store, numbers } = setup([numbered("a", 1), numbered("b", 2), numbered("c", 3)]);

    engine.updateContent("b", "");
    engine.onBackspace("b");

    expect(store.all().map((item) => item.id)).toEqual(["a", "c"]);
    expect(numbers()).toEqual([1, 2]);
  });

  it("does nothing on Backspace in a sole empty text block", () => {
    const { engine, rows } = setup([block("text", "only")]);

    expect(engine.onBackspace("only")).toEqual({ status: "ignored", reason: "first-block" });
    expect(rows()).toEqual([["only", "text", "", 0]]);
  });

  it("converts a heading to a quote keeping content and indentation", () => {
    const { engine, store } = setup([block("heading2", "h", "Notes")]);

    engine.updateBlockType("h", "quote");

    expect(store.all()).toEqual([{ id: "h", type: "quote", content: "Notes", indentLevel: 0 }]);
  });
});

describe("onReturn", () => {
  it("splits content at the cursor", () => {
    const { engine, rows } = setup([block("bulletList", "a", "hello world")]);

    engine.onReturn("a", 5);

    expect(rows()).toEqual([
      ["a", "bulletList", "hello", 0],
      ["new-1", "bulletList", " world", 0]
    ]);
  });

  it("numbers a new list item inside its run", () => {
    const { engine, numbers, store } = setup([numbered("a", 1), numbered("b", 2)]);

    engine.onReturn("a");

    expect(store.all().map((item) => item.id)).toEqual(["a", "new-1", "b"]);
    expect(numbers()).toEqual([1, 2, 3]);
  });

  it("restarts numbering after an item leaves the list", () => {
    const { engine, numbers } = setup([numbered("a", 1), numbered("b", 2, ""), numbered("c", 3)]);

    engine.onReturn("b");

    expect(numbers()).toEqual([1, null, 1]);
  });

  it("keeps the indentation of the split block", () => {
    const { engine, indents } = setup([
      block("bulletList", "p", "p"),
      block("checkbox", "c", "c", 1),
      block("text", "q", "q", 2)
    ]);

    engine.onReturn("c");

    expect(indents()).toEqual([0, 1, 1, 2]);
  });

  it("keeps the text when the carried-forward type holds no content", () => {
    const { engine, focus, rows } = setup([block("text", "a", "abc")], {
      carryForward: { text: "divider" }
    });
    focus.focus("a");

    const result = engine.onReturn("a", 1);

    expect(result).toEqual({ status: "applied", createdBlockId: "new-1", cursor: 0 });
    expect(rows()).toEqual([
      ["a", "text", "abc", 0],
      ["new-1", "divider", "", 0]
    ]);
    expect(focus.current()).toBe("a");
  });

  it("never reuses an id the document has held", () => {
    const { engine, store } = setup([block("text", "a", "a")], { makeId: () => "a" });

    const result = engine.onReturn("a");

    expect(result).toEqual({ status: "applied", createdBlockId: "a-2", cursor: 0 });
    expect(store.size()).toBe(2);
  });
});

describe("onBackspace", () => {
  it("ignores blocks with content", () => {
    const { engine } = setup([block("text", "a", "a"), block("text", "b", "b")]);

    expect(engine.onBackspace("b")).toEqual({ status: "ignored", reason: "not-empty" });
  });

  it("turns an empty first block into text", () => {
    const { engine, rows } = setup([block("checkbox", "a"), block("text", "b", "b")]);

    engine.onBackspace("a");

    expect(rows()[0]).toEqual(["a", "text", "", 0]);
  });

  it("pulls the removed block's children up one level", () => {
    const { engine, store, indents } = setup([
      block("text", "a", "a"),
      block("text", "b", "", 1),
      block("text", "c", "c", 2),
      block("text", "d", "d", 1)
    ]);

    engine.onBackspace("b");

    expect(store.all().map((item) => item.id)).toEqual(["a", "c", "d"]);
    expect(indents()).toEqual([0, 1, 1]);
  });

  it("skips a divider when choosing the block to focus", () => {
    const { engine, focus } = setup([
      block("text", "x", "x"),
      block("divider", "d"),
      block("text", "b")
    ]);
    focus.focus("b");

    engine.onBackspace("b");

    expect(focus.current()).toBe("x");
  });

  it("reports a stale id", () => {
    const { engine } = setup([block("text", "a")]);

    expect(engine.onBackspace("gone")).toEqual({ status: "not-found", blockId: "gone" });
  });
});

describe("onTab and onShiftTab", () => {
  it("indents a block together with its children", () => {
    const { engine, indents } = setup([
      block("text", "a", "a"),
      block("text", "b", "b"),
      block("text", "c", "c", 1),
      block("text", "e", "e")
    ]);

    expect(engine.onTab("b")).toEqual({ status: "applied" });
    expect(indents()).toEqual([0, 1, 2, 0]);
    expect(engine.onShiftTab("b")).toEqual({ status: "applied" });
    expect(indents()).toEqual([0, 0, 1, 0]);
  });

  it("clamps indentation to the predecessor and the configured maximum", () => {
    const { engine, indents } = setup(
      [block("text", "a", "a"), block("text", "b", "b", 1), block("text", "c", "c", 1)],
      { maxIndentLevel: 1 }
    );

    expect(engine.onTab("a")).toEqual({ status: "clamped", requested: 1, applied: 0 });
    expect(engine.onTab("c")).toEqual({ status: "clamped", requested: 2, applied: 1 });
    expect(engine.onShiftTab("a")).toEqual({ status: "clamped", requested: -1, applied: 0 });
    expect(indents()).toEqual([0, 1, 1]);
  });

  it("splits and rejoins a numbered run immediately", () => {
    const { engine, numbers } = setup([numbered("a", 1), numbered("b", 2), numbered("c", 3)]);

    engine.onTab("b");
    expect(numbers()).toEqual([1, 1, 2]);

    engine.onShiftTab("b");
    expect(numbers()).toEqual([1, 2, 3]);
  });
});

describe("updateBlockType", () => {
  it("renumbers when a block leaves a numbered run", () => {
    const { engine, numbers } = setup([numbered("a", 1), numbered("b", 2), numbered("c", 3)]);

    engine.updateBlockType("b", "text");

    expect(numbers()).toEqual([1, null, 1]);
  });

  it("resets type metadata", () => {
    const { engine, store } = setup([
      { id: "c", type: "checkbox", content: "done", indentLevel: 0, isChecked: true }
    ]);

    engine.updateBlockType("c", "numberedList");
    engine.updateBlockType("c", "checkbox");

    expect(store.get("c")).toEqual({
      id: "c",
      type: "checkbox",
      content: "done",
      indentLevel: 0,
      isChecked: false
    });
    expect(engine.updateBlockType("c", "checkbox")).toEqual({ status: "ignored", reason: "no-change" });
  });

  it("moves focus off a block that becomes a divider", () => {
    const { engine, focus, store } = setup([
      block("text", "a", "a"),
      block("text", "b", "b"),
      block("text", "c", "c")
    ]);
    focus.focus("b");

    engine.updateBlockType("b", "divider");

    expect(store.get("b")).toEqual({ id: "b", type: "divider", content: "", indentLevel: 0 });
    expect(focus.current()).toBe("c");
  });
});

describe("createBlock", () => {
  it("inserts after the reference with its indentation", () => {
    const { engine, focus, store } = setup([block("text", "p", "p"), block("text", "a", "a", 1)]);

    const result = engine.createBlock("checkbox", "a");

    expect(result).toEqual({ status: "applied", createdBlockId: "new-1" });
    expect(store.at(2)).toEqual({
      id: "new-1",
      type: "checkbox",
      content: "",
      indentLevel: 1,
      isChecked: false
    });
    expect(focus.current()).toBe("new-1");
  });

  it("prepends at the root", () => {
    const { engine, store } = setup([block("text", "a", "a")]);

    engine.createBlock("heading1", null);

    expect(store.at(0)).toEqual({
      id: "new-1",
      type: "heading1",
      content: "",
      indentLevel: 0,
      level: 1
    });
  });

  it("focuses past a new divider", () => {
    const forward = setup([block("text", "a", "a"), block("text", "b", "b")]);
    forward.engine.createBlock("divider", "a");
    expect(forward.focus.current()).toBe("b");

    const backward = setup([block("text", "a", "a")]);
    backward.engine.createBlock("divider", "a");
    expect(backward.focus.current()).toBe("a");
  });

  it("reports an unknown reference", () => {
    const { engine } = setup([block("text", "a")]);

    expect(engine.createBlock("text", "zzz")).toEqual({ status: "not-found", blockId: "zzz" });
  });
});

describe("mergeWithPreviousBlock", () => {
  it("appends content to the predecessor", () => {
    const { engine, focus, rows } = setup([block("text", "a", "foo"), block("quote", "b", "bar")]);

    const result = engine.mergeWithPreviousBlock("b");

    expect(result).toEqual({ status: "applied", removedBlockId: "b", cursor: 3 });
    expect(rows()).toEqual([["a", "text", "foobar", 0]]);
    expect(focus.current()).toBe("a");
  });

  it("removes a divider in front of the block instead", () => {
    const { engine, focus, store } = setup([
      block("text", "x", "x"),
      block("divider", "d"),
      block("text", "b", "bar")
    ]);

    const result = engine.mergeWithPreviousBlock("b");

    expect(result).toEqual({ status: "applied", removedBlockId: "d", cursor: 0 });
    expect(store.all().map((item) => item.id)).toEqual(["x", "b"]);
    expect(focus.current()).toBe("b");
  });

  it("ignores the first block", () => {
    const { engine } = setup([block("text", "a", "a")]);

    expect(engine.mergeWithPreviousBlock("a")).toEqual({ status: "ignored", reason: "first-block" });
  });
});

describe("updateContent", () => {
  it("stores plain edits", () => {
    const { engine, store } = setup([block("text", "a", "hi")]);

    expect(engine.updateContent("a", "hi there")).toEqual({ status: "applied", cursor: 8 });
    expect(store.get("a")?.content).toBe("hi there");
  });

  it("converts text blocks when a Markdown marker is typed", () => {
    const { engine, store } = setup([block("text", "a", "#"), block("text", "b", "```ts")]);

    engine.updateContent("a", "# ");
    engine.updateContent("b", "```ts ");

    expect(store.get("a")).toEqual({
      id: "a",
      type: "heading1",
      content: "",
      indentLevel: 0,
      level: 1
    });
    expect(store.get("b")).toEqual({
      id: "b",
      type: "code",
      content: "",
      indentLevel: 0,
      language: "ts"
    });
  });

  it("numbers a list item created from a marker", () => {
    const { engine, numbers } = setup([numbered("a", 1), block("text", "b", "1.")]);

    engine.updateContent("b", "1. ");

    expect(numbers()).toEqual([1, 2]);
  });

  it("leaves markers alone when shortcuts are off or the block is not text", () => {
    const { engine, store } = setup(
      [block("text", "a", "-"), block("bulletList", "b", "#")],
      { markdownShortcuts: false }
    );
    engine.updateContent("a", "- ");
    expect(store.get("a")?.type).toBe("text");

    const list = setup([block("bulletList", "b", "#")]);
    list.engine.updateContent("b", "# ");
    expect(list.store.get("b")).toEqual({ id: "b", type: "bulletList", content: "# ", indentLevel: 0 });
  });

  it("ignores dividers", () => {
    const { engine } = setup([block("text", "a"), block("divider", "d")]);

    expect(engine.updateContent("d", "x")).toEqual({ status: "ignored", reason: "divider" });
  });
});

describe("toggleCheckbox", () => {
  it("flips checkboxes only", () => {
    const { engine, store } = setup([block("checkbox", "c", "milk"), block("text", "t")]);

    engine.toggleCheckbox("c");

    expect(store.get("c")).toMatchObject({ isChecked: true });
    expect(engine.toggleCheckbox("t")).toEqual({ status: "ignored", reason: "not-checkbox" });
  });
});

describe("moveBlock", () => {
  it("moves a block with its subtree", () => {
    const { engine, store } = setup([
      block("text", "a", "a"),
      block("text", "a1", "a1", 1),
      block("text", "b", "b"),
      block("text", "c", "c")
    ]);

    expect(engine.moveBlock("a", 4)).toEqual({ status: "applied" });
    expect(store.all().map((item) => item.id)).toEqual(["b", "c", "a", "a1"]);
  });

  it("clamps the moved block and the blocks after it", () => {
    const first = setup([block("text", "p", "p"), block("text", "q", "q", 1), block("text", "r", "r")]);
    first.engine.moveBlock("q", 0);
    expect(first.store.all().map((item) => item.id)).toEqual(["q", "p", "r"]);
    expect(first.indents()).toEqual([0, 0, 0]);

    const second = setup([
      block("text", "x", "x"),
      block("text", "y", "y", 1),
      block("text", "w", "w", 2),
      block("text", "z", "z")
    ]);
    second.engine.moveBlock("z", 2);
    expect(second.store.all().map((item) => item.id)).toEqual(["x", "y", "z", "w"]);
    expect(second.indents()).toEqual([0, 1, 0, 1]);
  });

  it("renumbers both ends of the move", () => {
    const { engine, numbers } = setup([
      numbered("a", 1),
      numbered("b", 2),
      block("text", "t", "t"),
      numbered("c", 1)
    ]);

    engine.moveBlock("c", 0);

    expect(numbers()).toEqual([1, 2, 3, null]);
  });

  it("refuses to move a block into its own subtree", () => {
    const { engine } = setup([block("text", "a", "a"), block("text", "b", "b", 1), block("text", "c")]);

    expect(engine.moveBlock("a", 1)).toEqual({ status: "ignored", reason: "inside-subtree" });
    expect(engine.moveBlock("a", 2)).toEqual({ status: "ignored", reason: "no-change" });
  });
});

describe("invariant enforcement", () => {
  const broken = () => [block("text", "a", "a"), block("text", "b", "b", 3)];

  it("throws in debug mode", () => {
    const { engine } = setup(broken());

    expect(() => engine.updateContent("a", "x")).toThrow(InvariantViolationError);
  });

  it("repairs and logs otherwise", () => {
    const warn = vi.fn();
    const { engine, indents } = setup(broken(), { debug: false, logger: { warn } });

    expect(engine.updateContent("a", "x")).toEqual({ status: "applied", cursor: 1 });
    expect(indents()).toEqual([0, 1]);
    expect(warn).toHaveBeenCalledWith("Repairing document after invariant violation", [
      { kind: "invalid-indent", blockId: "b", index: 1, indentLevel: 3, allowed: 1 }
    ]);
  });

  it("checks only the blocks an edit touched outside debug mode", () => {
    const warn = vi.fn();
    const { engine, indents } = setup(
      [
        block("text", "a", "a"),
        block("text", "b", "b"),
        block("text", "c", "c"),
        block("text", "d", "d", 3)
      ],
      { debug: false, logger: { warn } }
    );

    expect(engine.updateContent("a", "x")).toEqual({ status: "applied", cursor: 1 });
    expect(warn).not.toHaveBeenCalled();
    expect(indents()).toEqual([0, 0, 0, 3]);

    engine.updateContent("c", "y");
    expect(warn).toHaveBeenCalledTimes(1);
    expect(indents()).toEqual([0, 0, 0, 1]);
  });
});
