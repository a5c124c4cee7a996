/**
 * Snapshot of a paginator. Every transition produces a new frozen snapshot;
 * none is ever mutated in place.
 *
 * @property isLoading True while a fetch is in flight.
 * @property items Every item loaded so far, in page order. Only ever grows.
 * @property error Message of the last failed load, cleared by the next successful one.
 * @property maximumReached True once the cursor hit the maximum page. Terminal.
 * @property currentPage Last page whose load settled, successfully or not.
 */
export interface PaginatorState<T> {
  readonly isLoading: boolean
  readonly items: readonly T[]
  readonly error: string | null
  readonly maximumReached: boolean
  readonly currentPage: number
}

export const createInitialState = <T>(currentPage: number): PaginatorState<T> =>
  Object.freeze({
    isLoading: false,
    items: Object.freeze<T[]>([]),
    error: null,
    maximumReached: false,
    currentPage,
  })

export const loadingStarted = <T>(state: PaginatorState<T>): PaginatorState<T> =>
  Object.freeze({ ...state, isLoading: true })

export const pageLoaded = <T>(
  state: PaginatorState<T>,
  page: number,
  newItems: readonly T[],
): PaginatorState<T> =>
  Object.freeze({
    ...state,
    isLoading: false,
    items: newItems.length > 0 ? Object.freeze([...state.items, ...newItems]) : state.items,
    error: null,
    currentPage: page,
  })

// A failed page counts as an empty one.
export const pageFailed = <T>(
  state: PaginatorState<T>,
  page: number,
  message: string,
): PaginatorState<T> =>
  Object.freeze({
    ...state,
    isLoading: false,
    error: message,
    currentPage: page,
  })

export const maximumReached = <T>(state: PaginatorState<T>): PaginatorState<T> =>
  Object.freeze({ ...state, isLoading: false, maximumReached: true })
