import { describe, it, expect } from "vitest";
import { resolveShortcut } from "@/hooks/useKeyboardShortcuts";

describe("resolveShortcut", () => {
  it("should run on Ctrl+Enter, even while editing", () => {
    expect(resolveShortcut({ key: "Enter", ctrlKey: true, editing: false })).toBe("run");
    expect(resolveShortcut({ key: "Enter", ctrlKey: true, editing: true })).toBe("run");
  });

  it("should reset on Ctrl+Backspace outside form fields", () => {
    expect(resolveShortcut({ key: "Backspace", ctrlKey: true, editing: false })).toBe("reset");
  });

  it("should leave Ctrl+Backspace to a focused field", () => {
    expect(resolveShortcut({ key: "Backspace", ctrlKey: true, editing: true })).toBeNull();
  });

  it("should ignore keys without Ctrl", () => {
    expect(resolveShortcut({ key: "Enter", ctrlKey: false, editing: false })).toBeNull();
    expect(resolveShortcut({ key: "Backspace", ctrlKey: false, editing: false })).toBeNull();
    expect(resolveShortcut({ key: "a", ctrlKey: true, editing: false })).toBeNull();
  });
});
