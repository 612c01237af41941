/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_NHTSA_API_URL?: string;
  readonly VITE_REQUEST_TIMEOUT_MS?: string;
  readonly VITE_PDF_VIEWER_HEIGHT?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
