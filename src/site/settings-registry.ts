import type { OptionStore } from "./option-store.js"

export type Sanitizer = (input: unknown) => unknown

interface RegisteredSetting {
  group: string
  option: string
  sanitize: Sanitizer
}

interface SettingsSection {
  id: string
  title: string
  page: string
}

interface SettingsField {
  id: string
  title: string
  page: string
  section: string
  render: () => string
}

/**
 * Settings API of the host: options a plugin exposes on an admin page,
 * grouped into sections of fields, each saved through its sanitizer.
 */
export class SettingsRegistry {
  private readonly settings: RegisteredSetting[] = []
  private readonly sections: SettingsSection[] = []
  private readonly fields: SettingsField[] = []

  constructor(private readonly options: OptionStore) {}

  registerSetting(group: string, option: string, sanitize: Sanitizer): void {
    this.settings.push({ group, option, sanitize })
  }

  addSection(id: string, title: string, page: string): void {
    this.sections.push({ id, title, page })
  }

  addField(id: string, title: string, page: string, section: string, render: () => string): void {
    this.fields.push({ id, title, page, section, render })
  }

  getRegisteredOptions(group: string): string[] {
    return this.settings.filter((setting) => setting.group === group).map((setting) => setting.option)
  }

  /**
   * Sanitize and store every option of `group` present in `input`.
   * Sanitizers throw on invalid input, in which case nothing is stored.
   */
  save(group: string, input: Record<string, unknown>): string[] {
    const pending: Array<[string, unknown]> = []

    for (const setting of this.settings) {
      if (setting.group !== group || input[setting.option] === undefined) {
        continue
      }
      pending.push([setting.option, setting.sanitize(input[setting.option])])
    }

    for (const [option, value] of pending) {
      this.options.set(option, value)
    }

    return pending.map(([option]) => option)
  }

  renderSections(page: string): string {
    return this.sections
      .filter((section) => section.page === page)
      .map((section) => {
        const rows = this.fields
          .filter((field) => field.page === page && field.section === section.id)
          .map((field) => `<tr><th scope="row"><label for="${field.id}">${field.title}</label></th><td>${field.render()}</td></tr>`)
          .join("")
        return `<h2>${section.title}</h2><table class="form-table" role="presentation">${rows}</table>`
      })
      .join("")
  }
}
