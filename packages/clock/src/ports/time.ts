/** A duration in milliseconds. */
export type Milliseconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number
