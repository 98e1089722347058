import config, { resolvePluginVersion } from "../config.js"
import { HookRegistry } from "../hooks/registry.js"
import type { HookDispatcher } from "../hooks/types.js"
import type { SiteContext } from "../site/context.js"
import { WhatsAppSupportAdmin } from "./admin.js"
import { WhatsAppSupportI18n } from "./i18n.js"
import { WhatsAppSupportPublic } from "./public.js"
import { TEXT_DOMAIN } from "./settings.js"

export const PLUGIN_NAME = TEXT_DOMAIN

export interface WhatsAppSupportOptions {
  /** Whether the current request is for the admin area. Read once. */
  isAdmin: boolean
  /** Externally configured version; falls back to the default when unset. */
  version?: string
  site: SiteContext
  languagesDir?: string
}

/**
 * The core plugin class.
 *
 * Registers the locale loader and then either the admin-area hooks or the
 * public-facing hooks, never both, depending on the request type it was
 * constructed for. Nothing reaches the host until {@link run}.
 */
export class WhatsAppSupport {
  protected readonly loader: HookRegistry
  protected readonly pluginName: string
  protected readonly version: string

  private readonly site: SiteContext
  private readonly languagesDir: string

  constructor(options: WhatsAppSupportOptions) {
    this.version = resolvePluginVersion(options.version)
    this.pluginName = PLUGIN_NAME
    this.site = options.site
    this.languagesDir = options.languagesDir ?? config.LANGUAGES_DIR

    this.loader = new HookRegistry()
    this.setLocale()

    if (options.isAdmin) {
      this.defineAdminHooks()
    } else {
      this.definePublicHooks()
    }
  }

  /** Basename the host knows the plugin by, used in per-plugin hook names. */
  static pluginBasename(pluginName: string = PLUGIN_NAME): string {
    return `whatsapp-support/${pluginName}.php`
  }

  private setLocale(): void {
    const i18n = new WhatsAppSupportI18n(TEXT_DOMAIN, this.site, this.languagesDir)

    this.loader.addAction("plugins_loaded", i18n, "loadPluginTextdomain")
  }

  private defineAdminHooks(): void {
    const admin = new WhatsAppSupportAdmin(this.getPluginName(), this.getVersion(), this.site)

    this.loader.addAction("admin_init", admin, "settingsInit")
    this.loader.addAction("admin_enqueue_scripts", admin, "enqueueStyles")
    this.loader.addAction("admin_enqueue_scripts", admin, "enqueueScripts")
    this.loader.addAction("admin_menu", admin, "addMenu")
    this.loader.addAction("add_meta_boxes", admin, "addMetaBoxes")
    this.loader.addAction("save_post", admin, "savePost")

    this.loader.addFilter(`plugin_action_links_${WhatsAppSupport.pluginBasename(this.pluginName)}`, admin, "settingsLink")
  }

  private definePublicHooks(): void {
    const publicSide = new WhatsAppSupportPublic(this.getPluginName(), this.getVersion(), this.site)

    this.loader.addAction("wp", publicSide, "getSettings")
    this.loader.addAction("wp_enqueue_scripts", publicSide, "enqueueStyles")
    this.loader.addAction("wp_enqueue_scripts", publicSide, "enqueueScripts")
    this.loader.addAction("wp_footer", publicSide, "footerHtml")
  }

  /** Hand every registered hook to the host. */
  run(dispatcher: HookDispatcher): void {
    this.loader.run(dispatcher)
  }

  getPluginName(): string {
    return this.pluginName
  }

  getLoader(): HookRegistry {
    return this.loader
  }

  getVersion(): string {
    return this.version
  }
}
