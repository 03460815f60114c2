import { describe, expect, it } from "vitest";
import { detectMarkdownShortcut, justTypedSpace } from "./markdown-shortcuts";

describe("detectMarkdownShortcut", () => {
  it("recognises block markers typed at the start of a line", () => {
    expect(detectMarkdownShortcut("# ")).toEqual({ type: "heading1", content: "" });
    expect(detectMarkdownShortcut("## Plan ")).toEqual({ type: "heading2", content: "Plan" });
    expect(detectMarkdownShortcut("### ")).toEqual({ type: "heading3", content: "" });
    expect(detectMarkdownShortcut("- ")).toEqual({ type: "bulletList", content: "" });
    expect(detectMarkdownShortcut("* ")).toEqual({ type: "bulletList", content: "" });
    expect(detectMarkdownShortcut("12. ")).toEqual({ type: "numberedList", content: "" });
    expect(detectMarkdownShortcut("[] ")).toEqual({ type: "checkbox", content: "" });
    expect(detectMarkdownShortcut("[ ] ")).toEqual({ type: "checkbox", content: "" });
    expect(detectMarkdownShortcut("> ")).toEqual({ type: "quote", content: "" });
    expect(detectMarkdownShortcut("--- ")).toEqual({ type: "divider", content: "" });
    expect(detectMarkdownShortcut("*** ")).toEqual({ type: "divider", content: "" });
  });

  it("turns a fence into a code block with its language", () => {
    expect(detectMarkdownShortcut("```ts ")).toEqual({
      type: "code",
      content: "",
      language: "ts"
    });
    expect(detectMarkdownShortcut("``` ")).toEqual({ type: "code", content: "", language: null });
  });

  it("ignores plain text", () => {
    expect(detectMarkdownShortcut("hello ")).toBeNull();
    expect(detectMarkdownShortcut("#tag ")).toBeNull();
    expect(detectMarkdownShortcut("1.5 kg ")).toBeNull();
    expect(detectMarkdownShortcut("   ")).toBeNull();
  });
});

describe("justTypedSpace", () => {
  it("is true only when the edit added a trailing space", () => {
    expect(justTypedSpace("-", "- ")).toBe(true);
    expect(justTypedSpace("- ", "- ")).toBe(false);
    expect(justTypedSpace("- a", "- ab")).toBe(false);
  });
});
