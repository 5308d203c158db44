/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_KEYSCOUT_API_KEY?: string;
}
