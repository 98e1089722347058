/**
 * Process-wide key/value store for site options. Values live in memory for
 * the lifetime of the process and are shared by every request.
 */
export class OptionStore {
  private readonly options = new Map<string, unknown>()

  constructor(initial: Record<string, unknown> = {}) {
    for (const [name, value] of Object.entries(initial)) {
      this.options.set(name, value)
    }
  }

  get(name: string): unknown {
    return this.options.get(name)
  }

  set(name: string, value: unknown): void {
    this.options.set(name, value)
  }
}
