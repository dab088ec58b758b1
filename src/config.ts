export interface EditorConfig {
  /** Trace drag transitions to the console. */
  debugDrag: boolean;
  /** Seed the canvas with sample nodes. */
  demoGraph: boolean;
}

type EnvLike = Record<string, string | boolean | undefined>;

function flag(value: string | boolean | undefined, fallback: boolean): boolean {
  if (typeof value === "boolean") return value;
  if (value === undefined || value === "") return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return fallback;
}

export function readEditorConfig(env: EnvLike): EditorConfig {
  return {
    debugDrag: flag(env.VITE_GRAPH_DEBUG_DRAG, false),
    demoGraph: flag(env.VITE_GRAPH_DEMO, true),
  };
}

export const editorConfig: EditorConfig = readEditorConfig(import.meta.env);
