/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_GRAPH_DEBUG_DRAG?: string;
  readonly VITE_GRAPH_DEMO?: string;
}
