export class SearchOptionsError extends Error {
  constructor (public readonly option: string, value: unknown) {
    super(`Invalid search option ${option}: ${String(value)}`)
    this.name = 'SearchOptionsError'
  }
}
