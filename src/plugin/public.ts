import type { SiteContext } from "../site/context.js"
import type { SiteRequest } from "../site/types.js"
import { DEFAULT_SETTINGS, TEXT_DOMAIN, readPostMeta, readSettings, type WidgetSettings } from "./settings.js"
import { renderWidget } from "./widget.js"

/**
 * Public side of the plugin: decides once per request whether the chat
 * widget shows, then enqueues its assets and prints it in the footer.
 */
export class WhatsAppSupportPublic {
  private settings: WidgetSettings = DEFAULT_SETTINGS
  private hiddenForPost = false
  private onPage = false

  constructor(
    private readonly pluginName: string,
    private readonly version: string,
    private readonly site: SiteContext,
  ) {}

  getSettings(request: SiteRequest): void {
    const stored = readSettings(this.site.options)
    const post = request.postId === null ? undefined : this.site.posts.get(request.postId)

    if (!post) {
      this.settings = stored
      return
    }

    const meta = readPostMeta(this.site.posts, post.id)
    this.hiddenForPost = meta.hide
    this.onPage = post.type === "page"
    this.settings = meta.message.length > 0 ? { ...stored, message: meta.message } : stored
  }

  isActive(): boolean {
    const { enabled, phoneNumber, showOnPages } = this.settings
    if (!enabled || phoneNumber.length === 0 || this.hiddenForPost) {
      return false
    }
    return showOnPages || !this.onPage
  }

  getWidgetSettings(): WidgetSettings {
    return this.settings
  }

  enqueueStyles(): void {
    if (!this.isActive()) {
      return
    }
    this.site.enqueueStyle(`${this.pluginName}-public`, "/assets/public/css/whatsappsupport-public.css", this.version)
  }

  enqueueScripts(): void {
    if (!this.isActive()) {
      return
    }
    this.site.enqueueScript(`${this.pluginName}-public`, "/assets/public/js/whatsappsupport-public.js", this.version, true)
  }

  footerHtml(): void {
    if (!this.isActive()) {
      return
    }
    this.site.echo(
      renderWidget({
        settings: this.settings,
        ariaLabel: this.site.translate("Chat with us on WhatsApp", TEXT_DOMAIN),
      }),
    )
  }
}
