export * from "./types.js"
export { ActivityToggle } from "./activity.js"
export { Paginator } from "./paginator.js"
export {
  DEFAULT_PAGE_NUMBER,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE,
  resolvePaginatorSettings,
  type PaginatorSettings,
} from "./settings.js"
export { createInitialState, type PaginatorState } from "./state.js"
export { SupervisorScope, type JobBody, type SupervisorScopeConfig } from "./supervisor.js"
