/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_TICKER_URL?: string
  readonly VITE_FEED_PAGE_SIZE?: string
  readonly VITE_SEARCH_DEBOUNCE_MS?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
