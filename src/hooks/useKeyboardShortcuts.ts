import { useEffect } from "react";

interface Shortcuts {
  onRunReaction: () => void;
  onReset: () => void;
}

export type ShortcutAction = "run" | "reset";

interface KeyPress {
  key: string;
  ctrlKey: boolean;
  /** Focus is in a text field, select or contentEditable element. */
  editing: boolean;
}

/**
 * Map a key press to a shortcut. Ctrl+Backspace deletes a word while
 * editing, so it only resets when focus is outside form fields.
 */
export function resolveShortcut({ key, ctrlKey, editing }: KeyPress): ShortcutAction | null {
  if (!ctrlKey) return null;
  if (key === "Enter") return "run";
  if (key === "Backspace" && !editing) return "reset";
  return null;
}

function isEditableTarget(target: EventTarget | null): boolean {
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement ||
    (target instanceof HTMLElement && target.isContentEditable)
  );
}

/**
 * Global keyboard shortcuts.
 *
 * - Ctrl+Enter: run the reaction.
 * - Ctrl+Backspace: reset inputs and outputs (outside form fields).
 */
export function useKeyboardShortcuts({ onRunReaction, onReset }: Shortcuts) {
  useEffect(() => {
    function handler(e: KeyboardEvent) {
      const action = resolveShortcut({
        key: e.key,
        ctrlKey: e.ctrlKey,
        editing: isEditableTarget(e.target),
      });
      if (!action) return;
      e.preventDefault();
      if (action === "run") onRunReaction();
      else onReset();
    }
    document.addEventListener("keydown", handler);
    return () => document.removeEventListener("keydown", handler);
  }, [onRunReaction, onReset]);
}
