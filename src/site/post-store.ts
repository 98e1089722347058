import fs from "node:fs/promises"
import path from "node:path"

import { z } from "zod"

import { createLogger } from "../logger.js"
import type { Post } from "./types.js"

const log = createLogger("site.posts")

const PostSchema = z.object({
  id: z.number().int().positive(),
  type: z.enum(["post", "page"]),
  title: z.string(),
  content: z.string().default(""),
})

const PostFileSchema = z.array(PostSchema)

export class PostStore {
  private readonly posts = new Map<number, Post>()
  private readonly meta = new Map<number, Map<string, unknown>>()

  constructor(posts: Post[] = []) {
    for (const post of posts) {
      this.posts.set(post.id, post)
    }
  }

  static async load(file: string): Promise<PostStore> {
    const resolved = path.resolve(process.cwd(), file)

    try {
      const raw = await fs.readFile(resolved, "utf-8")
      const posts = PostFileSchema.parse(JSON.parse(raw))
      log.info("posts loaded", { file: resolved, count: posts.length })
      return new PostStore(posts)
    } catch (error) {
      if (isMissingFile(error)) {
        log.warn("content file not found, starting with no posts", { file: resolved })
        return new PostStore()
      }
      throw error
    }
  }

  get(id: number): Post | undefined {
    return this.posts.get(id)
  }

  list(): Post[] {
    return Array.from(this.posts.values()).sort((a, b) => a.id - b.id)
  }

  getMeta(postId: number, key: string): unknown {
    return this.meta.get(postId)?.get(key)
  }

  setMeta(postId: number, key: string, value: unknown): void {
    const entries = this.meta.get(postId) ?? new Map<string, unknown>()
    entries.set(key, value)
    this.meta.set(postId, entries)
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}
