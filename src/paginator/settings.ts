import { z } from "zod"

export const DEFAULT_PAGE_NUMBER = 0
export const DEFAULT_PAGE_SIZE = 20
// MAX_PAGE <= page means maximumReached
export const MAX_PAGE = 10

const paginatorSettingsSchema = z.object({
  defaultPage: z.number().int().min(0).default(DEFAULT_PAGE_NUMBER),
  pageSize: z.number().int().min(1).default(DEFAULT_PAGE_SIZE),
  maxPage: z.number().int().min(0).default(MAX_PAGE),
})

export type PaginatorSettings = z.infer<typeof paginatorSettingsSchema>

export const resolvePaginatorSettings = (
  options: Partial<PaginatorSettings> = {},
): PaginatorSettings => {
  const parsed = paginatorSettingsSchema.safeParse({
    defaultPage: options.defaultPage,
    pageSize: options.pageSize,
    maxPage: options.maxPage,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.join(".")
    throw new Error(`Invalid paginator option${path ? ` (${path})` : ""}: ${issue.message}`)
  }
  return parsed.data
}
