import { config as loadDotEnv } from "dotenv"

import { parsePageSizeEnv } from "./schema/page-size.js"

loadDotEnv()

export const DEFAULT_BULK_PAGE_SIZE = 5000

export interface StreamConfig {
  /** Items requested per loader call. */
  bulkPageSize: number
}

export const readStreamConfig = (env: NodeJS.ProcessEnv = process.env): StreamConfig => {
  const raw = env.BULK_PAGE_SIZE
  if (raw === undefined || !raw.trim()) {
    return { bulkPageSize: DEFAULT_BULK_PAGE_SIZE }
  }
  return { bulkPageSize: parsePageSizeEnv(raw, "BULK_PAGE_SIZE") }
}
