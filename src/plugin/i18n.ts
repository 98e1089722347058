import fs from "node:fs/promises"
import path from "node:path"

import { z } from "zod"

import { createLogger } from "../logger.js"
import type { SiteContext } from "../site/context.js"

const log = createLogger("plugin.i18n")

const TranslationTableSchema = z.record(z.string(), z.string())

/**
 * Loads the plugin's translated strings for the site locale. Runs once per
 * request on `plugins_loaded`.
 */
export class WhatsAppSupportI18n {
  constructor(
    private readonly domain: string,
    private readonly site: SiteContext,
    private readonly languagesDir: string,
  ) {}

  async loadPluginTextdomain(): Promise<void> {
    if (this.site.translator.isLoaded(this.domain)) {
      return
    }

    const file = path.resolve(process.cwd(), this.languagesDir, `${this.domain}-${this.site.locale}.json`)

    let raw: string
    try {
      raw = await fs.readFile(file, "utf-8")
    } catch (error) {
      log.debug("no translations for locale", { domain: this.domain, locale: this.site.locale, error })
      return
    }

    const parsed = TranslationTableSchema.safeParse(JSON.parse(raw))
    if (!parsed.success) {
      log.warn("translation file is not a string table", { file })
      return
    }

    this.site.translator.load(this.domain, parsed.data)
    log.debug("translations loaded", { domain: this.domain, locale: this.site.locale })
  }
}
