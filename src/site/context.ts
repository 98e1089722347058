import type { OptionStore } from "./option-store.js"
import type { PostStore } from "./post-store.js"
import { SettingsRegistry } from "./settings-registry.js"
import { Translator } from "./translator.js"
import type { EnqueuedAsset, MenuPage, MetaBox, Post, PostType, SiteRequest } from "./types.js"

export interface SiteContextOptions {
  isAdmin: boolean
  locale: string
  request: SiteRequest
  options: OptionStore
  posts: PostStore
}

/**
 * Everything a plugin handler may touch while one request is being served:
 * shared stores, the current request, and the per-request queues that the
 * gateway turns into a page.
 */
export class SiteContext {
  readonly isAdmin: boolean
  readonly locale: string
  readonly request: SiteRequest
  readonly options: OptionStore
  readonly posts: PostStore
  readonly settings: SettingsRegistry
  readonly translator = new Translator()

  private readonly styles = new Map<string, EnqueuedAsset>()
  private readonly scripts = new Map<string, EnqueuedAsset>()
  private readonly menuPages = new Map<string, MenuPage>()
  private readonly metaBoxes: MetaBox[] = []
  private readonly buffer: string[] = []

  constructor(opts: SiteContextOptions) {
    this.isAdmin = opts.isAdmin
    this.locale = opts.locale
    this.request = opts.request
    this.options = opts.options
    this.posts = opts.posts
    this.settings = new SettingsRegistry(opts.options)
  }

  get currentPost(): Post | undefined {
    return this.request.postId === null ? undefined : this.posts.get(this.request.postId)
  }

  translate(text: string, domain: string): string {
    return this.translator.translate(text, domain)
  }

  enqueueStyle(handle: string, src: string, version: string): void {
    if (!this.styles.has(handle)) {
      this.styles.set(handle, { handle, src, version, inFooter: false })
    }
  }

  enqueueScript(handle: string, src: string, version: string, inFooter = false): void {
    if (!this.scripts.has(handle)) {
      this.scripts.set(handle, { handle, src, version, inFooter })
    }
  }

  getStyles(): EnqueuedAsset[] {
    return Array.from(this.styles.values())
  }

  getScripts(): EnqueuedAsset[] {
    return Array.from(this.scripts.values())
  }

  addOptionsPage(page: Omit<MenuPage, "hookSuffix">): string {
    const hookSuffix = `settings_page_${page.slug}`
    this.menuPages.set(page.slug, { ...page, hookSuffix })
    return hookSuffix
  }

  getMenuPage(slug: string): MenuPage | undefined {
    return this.menuPages.get(slug)
  }

  addMetaBox(box: MetaBox): void {
    if (!this.metaBoxes.some((existing) => existing.id === box.id && existing.screen === box.screen)) {
      this.metaBoxes.push(box)
    }
  }

  getMetaBoxes(screen: PostType): MetaBox[] {
    return this.metaBoxes.filter((box) => box.screen === screen)
  }

  echo(html: string): void {
    this.buffer.push(html)
  }

  /** Run `render` and return whatever it echoed. */
  capture(render: () => void): string {
    const start = this.buffer.length
    render()
    return this.buffer.splice(start).join("")
  }

  flush(): string {
    return this.buffer.splice(0).join("")
  }
}
