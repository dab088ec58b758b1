import { useCallback, useSyncExternalStore } from "react";
import type { Cell } from "./store/cell";

/**
 * Re-renders the caller whenever `cell` releases a write view. Returns the
 * current value; mutable values keep their identity across writes, so read
 * derived data during render rather than memoizing on the value.
 */
export function useCell<T>(cell: Cell<T>): T {
  const subscribe = useCallback((onChange: () => void) => cell.subscribe(onChange), [cell]);
  const getVersion = useCallback(() => cell.version, [cell]);
  useSyncExternalStore(subscribe, getVersion);
  return cell.read();
}
