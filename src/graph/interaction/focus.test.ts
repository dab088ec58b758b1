import { describe, expect, it } from "vitest";
import { Cell } from "../store/cell";
import { clearFocusIf, isFocused, toggleFocus, type FocusState } from "./focus";

const a = { index: 0, generation: 0 };
const b = { index: 1, generation: 0 };

describe("toggleFocus", () => {
  it("returns to the prior focus after two clicks on the same node", () => {
    for (const initial of [null, a]) {
      const focus = new Cell<FocusState>(initial);
      toggleFocus(focus, a);
      toggleFocus(focus, a);
      expect(focus.read()).toEqual(initial);
    }
  });

  it("moves focus to a different node", () => {
    const focus = new Cell<FocusState>(a);
    toggleFocus(focus, b);
    expect(focus.read()).toEqual(b);
  });

  it("treats a reused slot as a different node", () => {
    const focus = new Cell<FocusState>(a);
    toggleFocus(focus, { index: 0, generation: 1 });
    expect(isFocused(focus.read(), a)).toBe(false);
  });
});

describe("clearFocusIf", () => {
  it("only clears focus on the given node", () => {
    const focus = new Cell<FocusState>(a);
    clearFocusIf(focus, b);
    expect(focus.read()).toEqual(a);
    clearFocusIf(focus, a);
    expect(focus.read()).toBeNull();
  });
});
