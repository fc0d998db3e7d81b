/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_STORAGE_PREFIX?: string
  readonly VITE_OUTPUT_EXTENSION?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
