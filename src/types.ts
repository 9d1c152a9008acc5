export type PathStatus = 'noPath' | 'timeout' | 'success'

export interface SearchOptions {
  /** Total compute time in milliseconds. -1 disables the limit. */
  timeout: number
  /** Maximum total cost above the start's estimate. -1 disables pruning. */
  searchRadius: number
  debug: boolean
}

export const DEFAULT_SEARCH_OPTS: SearchOptions = {
  timeout: -1,
  searchRadius: -1,
  debug: false
}
