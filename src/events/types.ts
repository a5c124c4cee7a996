export type Listener<T> = (value: T) => void

export type Unsubscribe = () => void

/** Receives errors thrown by listeners so one bad listener cannot break delivery. */
export type ListenerErrorHandler = (error: unknown) => void
