import { config as loadDotEnv } from "dotenv"

loadDotEnv({ quiet: true })

export interface EnvConfig {
  pageSize: string | null
  maxPage: string | null
  defaultPage: string | null
  latencyMs: string | null
}

export const readEnvConfig = (): EnvConfig => ({
  pageSize: process.env.PAGEWISE_PAGE_SIZE ?? null,
  maxPage: process.env.PAGEWISE_MAX_PAGE ?? null,
  defaultPage: process.env.PAGEWISE_DEFAULT_PAGE ?? null,
  latencyMs: process.env.PAGEWISE_LATENCY_MS ?? null,
})
