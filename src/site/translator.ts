/** Translated-string tables, one per text domain. */
export class Translator {
  private readonly domains = new Map<string, Map<string, string>>()

  load(domain: string, table: Record<string, string>): void {
    const entries = this.domains.get(domain) ?? new Map<string, string>()
    for (const [source, translation] of Object.entries(table)) {
      if (translation.length > 0) {
        entries.set(source, translation)
      }
    }
    this.domains.set(domain, entries)
  }

  isLoaded(domain: string): boolean {
    return this.domains.has(domain)
  }

  translate(text: string, domain: string): string {
    return this.domains.get(domain)?.get(text) ?? text
  }
}
