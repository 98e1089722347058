/**
 * Gateway server: the HTTP host the plugin runs inside.
 *
 * Every request gets its own SiteContext and HookPipeline. The plugin
 * bootstrap is constructed for that request (admin or public), hands its
 * hooks to the pipeline, and the route then fires the lifecycle events in
 * the order a page needs them:
 *   - public: plugins_loaded, wp, wp_enqueue_scripts, wp_footer
 *   - admin:  plugins_loaded, admin_init, admin_menu, then whatever the
 *             screen needs (admin_enqueue_scripts, add_meta_boxes, save_post,
 *             the plugin action links filter)
 *
 * Options and posts are process-wide; everything else dies with the request.
 */

import path from "node:path"

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify"
import staticPlugin from "@fastify/static"
import { z, ZodError } from "zod"

import config from "../config.js"
import { createLogger } from "../logger.js"
import { HookPipeline } from "../hooks/pipeline.js"
import { WhatsAppSupport } from "../plugin/whatsapp-support.js"
import { SiteContext } from "../site/context.js"
import { OptionStore } from "../site/option-store.js"
import { PostStore } from "../site/post-store.js"
import type { Post } from "../site/types.js"
import { escapeHtml, parsePositiveInt } from "../utils/index.js"
import { renderDocument } from "./document.js"

const logger = createLogger("gateway")
const adminLog = logger.child("admin")

const FormBodySchema = z.record(z.string(), z.unknown())

export interface GatewayOptions {
  host?: string
  port?: number
  options?: OptionStore
  posts?: PostStore
  /** Externally configured plugin version, if any. */
  version?: string
  locale?: string
  adminToken?: string
  languagesDir?: string
  assetsDir?: string
}

interface BootedRequest {
  plugin: WhatsAppSupport
  pipeline: HookPipeline
}

function toQuery(raw: unknown): Record<string, string> {
  const query: Record<string, string> = {}
  if (typeof raw !== "object" || raw === null) {
    return query
  }
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      query[key] = value
    }
  }
  return query
}

function renderPost(post: Post): string {
  return (
    `<article id="post-${post.id}" class="${post.type}">` +
    `<h1>${escapeHtml(post.title)}</h1>` +
    `<div class="entry-content"><p>${escapeHtml(post.content)}</p></div>` +
    `</article>`
  )
}

function renderIndex(posts: Post[]): string {
  const items = posts
    .map((post) => `<li><a href="/posts/${post.id}">${escapeHtml(post.title)}</a></li>`)
    .join("")
  return `<main class="home"><ul class="posts">${items}</ul></main>`
}

export class GatewayServer {
  private readonly app: FastifyInstance = Fastify({ logger: false })
  private readonly host: string
  private readonly port: number
  private readonly options: OptionStore
  private readonly posts: PostStore
  private readonly version: string | undefined
  private readonly locale: string
  private readonly adminToken: string
  private readonly languagesDir: string
  private readonly assetsDir: string

  constructor(opts: GatewayOptions = {}) {
    this.host = opts.host ?? config.GATEWAY_HOST
    this.port = opts.port ?? config.GATEWAY_PORT
    this.options = opts.options ?? new OptionStore()
    this.posts = opts.posts ?? new PostStore()
    this.version = opts.version ?? config.WHATSAPPSUPPORT_VERSION
    this.locale = opts.locale ?? config.SITE_LOCALE
    this.adminToken = opts.adminToken ?? config.ADMIN_TOKEN
    this.languagesDir = opts.languagesDir ?? config.LANGUAGES_DIR
    this.assetsDir = path.resolve(process.cwd(), opts.assetsDir ?? "assets")

    this.registerRoutes()
  }

  get instance(): FastifyInstance {
    return this.app
  }

  async start(): Promise<void> {
    await this.app.listen({ host: this.host, port: this.port })
    logger.info(`gateway listening on http://${this.host}:${this.port}`)
  }

  async stop(): Promise<void> {
    await this.app.close()
    logger.info("gateway stopped")
  }

  private registerRoutes(): void {
    this.app.setErrorHandler((error, req, reply) => {
      // body parsing and routing errors arrive with their 4xx status already set
      if (error.statusCode !== undefined && error.statusCode < 500) {
        logger.warn("request rejected", { method: req.method, url: req.url, status: error.statusCode })
        reply.code(error.statusCode).send({ error: error.message })
        return
      }
      logger.error("request failed", { method: req.method, url: req.url, error })
      reply.code(500).send({ error: "Internal Server Error" })
    })

    this.app.register(staticPlugin, { root: this.assetsDir, prefix: "/assets/" })

    this.app.get("/health", async () => ({
      status: "ok",
      uptime: process.uptime(),
      posts: this.posts.list().length,
    }))

    this.app.get("/", async (req, reply) => this.renderPublic(req, reply, null))

    this.app.get<{ Params: { id: string } }>("/posts/:id", async (req, reply) => {
      const postId = parsePositiveInt(req.params.id)
      if (postId === null || !this.posts.get(postId)) {
        return reply.code(404).send({ error: "Post not found" })
      }
      return this.renderPublic(req, reply, postId)
    })

    this.app.register(
      async (admin) => {
        admin.addHook("onRequest", async (req, reply) => {
          if (this.adminToken.length === 0) {
            return
          }
          if (req.headers.authorization !== `Bearer ${this.adminToken}`) {
            adminLog.warn("admin request rejected", { url: req.url })
            return reply.code(401).send({ error: "Unauthorized" })
          }
        })

        admin.get<{ Params: { page: string } }>("/settings/:page", async (req, reply) => {
          const site = this.createSite(req, true, null)
          const { pipeline } = await this.bootAdmin(site)

          const page = site.getMenuPage(req.params.page)
          if (!page) {
            return reply.code(404).send({ error: "Settings page not found" })
          }

          await pipeline.doAction("admin_enqueue_scripts", page.hookSuffix)
          const content = site.capture(page.render)

          return this.sendDocument(reply, site, page.pageTitle, `wp-admin ${page.hookSuffix}`, content)
        })

        admin.post<{ Params: { page: string } }>("/settings/:page", async (req, reply) => {
          const body = FormBodySchema.safeParse(req.body ?? {})
          if (!body.success) {
            return reply.code(400).send({ error: "Expected a JSON object body" })
          }

          const site = this.createSite(req, true, null, body.data)
          await this.bootAdmin(site)

          const group = req.params.page
          if (site.settings.getRegisteredOptions(group).length === 0) {
            return reply.code(404).send({ error: "Settings page not found" })
          }

          let saved: string[]
          try {
            saved = site.settings.save(group, body.data)
          } catch (error) {
            if (error instanceof ZodError) {
              return reply.code(400).send({
                error: "Invalid settings",
                issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
              })
            }
            throw error
          }

          const pageUrl = `/admin/settings/${encodeURIComponent(group)}`
          if (saved.length === 0) {
            return reply.code(303).redirect(pageUrl)
          }
          adminLog.info("settings saved", { group, saved })
          return reply.code(303).redirect(`${pageUrl}?updated=true`)
        })

        admin.get("/plugins", async (req) => {
          const site = this.createSite(req, true, null)
          const { plugin, pipeline } = await this.bootAdmin(site)
          const basename = WhatsAppSupport.pluginBasename(plugin.getPluginName())

          const actionLinks = await pipeline.applyFilters(
            `plugin_action_links_${basename}`,
            [`<a href="/admin/plugins/deactivate?plugin=${encodeURIComponent(basename)}">Deactivate</a>`],
            basename,
          )

          return {
            plugins: [{ plugin: basename, name: plugin.getPluginName(), version: plugin.getVersion(), actionLinks }],
          }
        })

        admin.get<{ Params: { id: string } }>("/posts/:id/edit", async (req, reply) => {
          const post = this.findPost(req.params.id)
          if (!post) {
            return reply.code(404).send({ error: "Post not found" })
          }

          const site = this.createSite(req, true, post.id)
          const { pipeline } = await this.bootAdmin(site)
          await pipeline.doAction("admin_enqueue_scripts", "post.php")
          await pipeline.doAction("add_meta_boxes", post.type, post)

          const boxes = site
            .getMetaBoxes(post.type)
            .map((box) =>
              `<div id="${escapeHtml(box.id)}" class="postbox"><h2>${box.title}</h2>` +
              `<div class="inside">${site.capture(() => box.render(post))}</div></div>`,
            )
            .join("")
          const content =
            `<div class="wrap"><h1>${escapeHtml(post.title)}</h1>` +
            `<form method="post" action="/admin/posts/${post.id}">${boxes}` +
            `<p class="submit"><button type="submit" class="button button-primary">Update</button></p></form></div>`

          return this.sendDocument(reply, site, post.title, "wp-admin post-php", content)
        })

        admin.post<{ Params: { id: string } }>("/posts/:id", async (req, reply) => {
          const post = this.findPost(req.params.id)
          if (!post) {
            return reply.code(404).send({ error: "Post not found" })
          }

          const body = FormBodySchema.safeParse(req.body ?? {})
          if (!body.success) {
            return reply.code(400).send({ error: "Expected a JSON object body" })
          }

          const site = this.createSite(req, true, post.id, body.data)
          const { pipeline } = await this.bootAdmin(site)
          await pipeline.doAction("save_post", post.id, post, true)

          return reply.code(303).redirect(`/admin/posts/${post.id}/edit`)
        })
      },
      { prefix: "/admin" },
    )
  }

  private createSite(
    req: FastifyRequest,
    isAdmin: boolean,
    postId: number | null,
    form: Record<string, unknown> = {},
  ): SiteContext {
    const [urlPath = "/"] = req.url.split("?")
    return new SiteContext({
      isAdmin,
      locale: this.locale,
      options: this.options,
      posts: this.posts,
      request: { path: urlPath, query: toQuery(req.query), form, postId },
    })
  }

  private async boot(site: SiteContext): Promise<BootedRequest> {
    const pipeline = new HookPipeline()
    const plugin = new WhatsAppSupport({
      isAdmin: site.isAdmin,
      version: this.version,
      site,
      languagesDir: this.languagesDir,
    })

    plugin.run(pipeline)
    await pipeline.doAction("plugins_loaded")
    return { plugin, pipeline }
  }

  private async bootAdmin(site: SiteContext): Promise<BootedRequest> {
    const booted = await this.boot(site)
    await booted.pipeline.doAction("admin_init")
    await booted.pipeline.doAction("admin_menu")
    return booted
  }

  private async renderPublic(req: FastifyRequest, reply: FastifyReply, postId: number | null): Promise<FastifyReply> {
    const site = this.createSite(req, false, postId)
    const { pipeline } = await this.boot(site)

    await pipeline.doAction("wp", site.request)
    await pipeline.doAction("wp_enqueue_scripts")

    const post = site.currentPost
    const content = post ? renderPost(post) : renderIndex(this.posts.list())

    await pipeline.doAction("wp_footer")

    const title = post ? post.title : "Home"
    const bodyClass = post ? `single single-${post.type} postid-${post.id}` : "home"
    return this.sendDocument(reply, site, title, bodyClass, content)
  }

  private sendDocument(
    reply: FastifyReply,
    site: SiteContext,
    title: string,
    bodyClass: string,
    content: string,
  ): FastifyReply {
    const html = renderDocument({
      title,
      lang: site.locale,
      bodyClass,
      styles: site.getStyles(),
      scripts: site.getScripts(),
      content,
      footer: site.flush(),
    })
    return reply.type("text/html; charset=utf-8").send(html)
  }

  private findPost(rawId: string): Post | undefined {
    const postId = parsePositiveInt(rawId)
    return postId === null ? undefined : this.posts.get(postId)
  }
}
