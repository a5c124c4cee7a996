export * from "./paginator/index.js"
export { SingleEvent, type SingleEventOptions } from "./events/single-event.js"
export { StateStore, type StateStoreOptions } from "./events/state-store.js"
export type { Listener, ListenerErrorHandler, Unsubscribe } from "./events/types.js"
export {
  InMemoryDataSource,
  type FetchOutcome,
  type FetchRecord,
  type InMemoryDataSourceConfig,
} from "./sources/in-memory-source.js"
export { createDemoItems, type DemoItem } from "./sources/demo-items.js"
export { CancellationError, isCancellationError } from "./utils/cancel.js"
