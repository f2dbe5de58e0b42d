/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_FLOOD_API_BASE_URL?: string
  readonly VITE_REQUEST_TIMEOUT_MS?: string
  readonly VITE_MAX_PAGES?: string
  readonly VITE_PAGE_SIZE?: string
  readonly VITE_REQUEST_RETRIES?: string
  readonly VITE_STATION_CACHE_TTL_MS?: string
  readonly VITE_READINGS_CACHE_TTL_MS?: string
  readonly VITE_LOG_LEVEL?: string
}
