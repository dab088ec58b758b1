import type { EditorHandle } from "../editor";
import { describeDragState } from "./dragState";

type LogFn = (message: string) => void;

/** Logs every change of drag kind or target; cursor-only updates are skipped. */
export function attachDragLogger(editor: EditorHandle, log: LogFn = console.debug): () => void {
  let last = describeDragState(editor.drag.read());
  return editor.drag.subscribe(() => {
    const next = describeDragState(editor.drag.read());
    if (next === last) return;
    log(`[drag] ${last} -> ${next}`);
    last = next;
  });
}
