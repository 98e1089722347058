import { createLogger } from "../logger.js"
import type { SiteContext } from "../site/context.js"
import type { Post, PostType } from "../site/types.js"
import { escapeHtml } from "../utils/index.js"
import {
  META_BOX_MARKER,
  META_HIDE,
  META_MESSAGE,
  PostWidgetMetaSchema,
  SETTINGS_OPTION,
  SETTINGS_PAGE,
  TEXT_DOMAIN,
  readPostMeta,
  readSettings,
  sanitizeSettings,
} from "./settings.js"

const log = createLogger("plugin.admin")

const SUPPORTED_POST_TYPES: readonly PostType[] = ["post", "page"]
const SETTINGS_SECTION = "whatsappsupport_general"
const META_BOX_ID = "whatsappsupport_meta"
const POST_EDIT_SCREENS: readonly string[] = ["post.php", "post-new.php"]

export const SETTINGS_PAGE_URL = `/admin/settings/${SETTINGS_PAGE}`

function isSupportedPostType(type: string): type is PostType {
  return SUPPORTED_POST_TYPES.some((supported) => supported === type)
}

/**
 * Admin side of the plugin: the settings screen, its assets, the per-post
 * meta box and the link on the plugins list.
 */
export class WhatsAppSupportAdmin {
  private settingsHookSuffix = `settings_page_${SETTINGS_PAGE}`

  constructor(
    private readonly pluginName: string,
    private readonly version: string,
    private readonly site: SiteContext,
  ) {}

  settingsInit(): void {
    const { settings } = this.site
    const current = readSettings(this.site.options)
    const field = (name: string) => `${SETTINGS_OPTION}[${name}]`

    settings.registerSetting(SETTINGS_PAGE, SETTINGS_OPTION, sanitizeSettings)
    settings.addSection(SETTINGS_SECTION, this.t("Widget"), SETTINGS_PAGE)

    settings.addField("whatsappsupport_enabled", this.t("Enable widget"), SETTINGS_PAGE, SETTINGS_SECTION, () =>
      checkbox("whatsappsupport_enabled", field("enabled"), current.enabled),
    )
    settings.addField("whatsappsupport_phone", this.t("Phone number"), SETTINGS_PAGE, SETTINGS_SECTION, () =>
      `<input type="tel" id="whatsappsupport_phone" name="${field("phoneNumber")}" value="${escapeHtml(current.phoneNumber)}" class="regular-text" />`,
    )
    settings.addField("whatsappsupport_message", this.t("Default message"), SETTINGS_PAGE, SETTINGS_SECTION, () =>
      `<textarea id="whatsappsupport_message" name="${field("message")}" rows="3" class="large-text">${escapeHtml(current.message)}</textarea>`,
    )
    settings.addField("whatsappsupport_button", this.t("Button text"), SETTINGS_PAGE, SETTINGS_SECTION, () =>
      `<input type="text" id="whatsappsupport_button" name="${field("buttonText")}" value="${escapeHtml(current.buttonText)}" maxlength="60" />`,
    )
    settings.addField("whatsappsupport_position", this.t("Position"), SETTINGS_PAGE, SETTINGS_SECTION, () => {
      const option = (value: string, label: string) =>
        `<option value="${value}"${current.position === value ? " selected" : ""}>${this.t(label)}</option>`
      return `<select id="whatsappsupport_position" name="${field("position")}">${option("right", "Right")}${option("left", "Left")}</select>`
    })
    settings.addField("whatsappsupport_pages", this.t("Show on pages"), SETTINGS_PAGE, SETTINGS_SECTION, () =>
      checkbox("whatsappsupport_pages", field("showOnPages"), current.showOnPages),
    )
  }

  enqueueStyles(hookSuffix: string): void {
    if (hookSuffix !== this.settingsHookSuffix) {
      return
    }
    this.site.enqueueStyle(`${this.pluginName}-admin`, "/assets/admin/css/whatsappsupport-admin.css", this.version)
  }

  /** The script also submits the meta box, so it loads on post edit screens too. */
  enqueueScripts(hookSuffix: string): void {
    if (hookSuffix !== this.settingsHookSuffix && !POST_EDIT_SCREENS.includes(hookSuffix)) {
      return
    }
    this.site.enqueueScript(`${this.pluginName}-admin`, "/assets/admin/js/whatsappsupport-admin.js", this.version, true)
  }

  addMenu(): void {
    this.settingsHookSuffix = this.site.addOptionsPage({
      pageTitle: this.t("WhatsApp Support"),
      menuTitle: this.t("WhatsApp Support"),
      capability: "manage_options",
      slug: SETTINGS_PAGE,
      render: () => this.renderSettingsPage(),
    })
  }

  renderSettingsPage(): void {
    const updated = this.site.request.query.updated === "true"
    this.site.echo(
      `<div class="wrap whatsappsupport-settings">` +
      `<h1>${this.t("WhatsApp Support")}</h1>` +
      (updated ? `<div class="notice notice-success"><p>${this.t("Settings saved.")}</p></div>` : "") +
      `<form method="post" action="${SETTINGS_PAGE_URL}" data-option="${SETTINGS_OPTION}">` +
      this.site.settings.renderSections(SETTINGS_PAGE) +
      `<p class="submit"><button type="submit" class="button button-primary">${this.t("Save Changes")}</button></p>` +
      `</form>` +
      `</div>`,
    )
  }

  addMetaBoxes(postType: string): void {
    if (!isSupportedPostType(postType)) {
      return
    }
    this.site.addMetaBox({
      id: META_BOX_ID,
      title: this.t("WhatsApp Support"),
      screen: postType,
      render: (post) => this.renderMetaBox(post),
    })
  }

  renderMetaBox(post: Post): void {
    const meta = readPostMeta(this.site.posts, post.id)
    this.site.echo(
      `<input type="hidden" name="${META_BOX_MARKER}" value="1" />` +
      `<p><label>${checkbox("whatsappsupport_hide", "hide", meta.hide)} ${this.t("Hide the WhatsApp widget on this post")}</label></p>` +
      `<p><label for="whatsappsupport_post_message">${this.t("Custom message for this post")}</label>` +
      `<textarea id="whatsappsupport_post_message" name="message" rows="2" class="widefat">${escapeHtml(meta.message)}</textarea></p>`,
    )
  }

  savePost(postId: number): void {
    const post = this.site.posts.get(postId)
    if (!post || !isSupportedPostType(post.type)) {
      return
    }

    const form = this.site.request.form
    if (form[META_BOX_MARKER] === undefined) {
      return
    }

    const parsed = PostWidgetMetaSchema.safeParse({ hide: form.hide, message: form.message })
    if (!parsed.success) {
      log.warn("ignoring invalid meta box input", { postId, issues: parsed.error.issues.length })
      return
    }

    this.site.posts.setMeta(postId, META_HIDE, parsed.data.hide)
    this.site.posts.setMeta(postId, META_MESSAGE, parsed.data.message)
    log.debug("post widget meta saved", { postId, hide: parsed.data.hide })
  }

  settingsLink(links: string[]): string[] {
    return [`<a href="${SETTINGS_PAGE_URL}">${this.t("Settings")}</a>`, ...links]
  }

  private t(text: string): string {
    return escapeHtml(this.site.translate(text, TEXT_DOMAIN))
  }
}

function checkbox(id: string, name: string, checked: boolean): string {
  return `<input type="checkbox" id="${id}" name="${name}" value="1"${checked ? " checked" : ""} />`
}
