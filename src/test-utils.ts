/**
 * Shared test utilities for building request-scoped site contexts
 */
import { SiteContext } from "./site/context.js"
import { OptionStore } from "./site/option-store.js"
import { PostStore } from "./site/post-store.js"
import type { Post, SiteRequest } from "./site/types.js"

export const SAMPLE_POSTS: Post[] = [
  { id: 1, type: "post", title: "Welcome", content: "Hello there" },
  { id: 2, type: "page", title: "Contact", content: "Write to us" },
]

export interface TestSiteOptions {
  isAdmin?: boolean
  locale?: string
  request?: Partial<SiteRequest>
  options?: OptionStore
  posts?: PostStore
}

/**
 * Create a SiteContext with in-memory stores seeded with {@link SAMPLE_POSTS}
 */
export function createTestSite(overrides: TestSiteOptions = {}): SiteContext {
  return new SiteContext({
    isAdmin: overrides.isAdmin ?? false,
    locale: overrides.locale ?? "en_US",
    options: overrides.options ?? new OptionStore(),
    posts: overrides.posts ?? new PostStore(SAMPLE_POSTS),
    request: {
      path: "/",
      query: {},
      form: {},
      postId: null,
      ...overrides.request,
    },
  })
}
