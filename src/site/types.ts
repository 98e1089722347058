export type PostType = "post" | "page"

export interface Post {
  id: number
  type: PostType
  title: string
  content: string
}

export interface SiteRequest {
  path: string
  query: Record<string, string>
  /** Submitted form fields, already parsed from the request body. */
  form: Record<string, unknown>
  /** Post being viewed or edited, if any. */
  postId: number | null
}

export interface EnqueuedAsset {
  handle: string
  src: string
  version: string
  inFooter: boolean
}

export interface MenuPage {
  pageTitle: string
  menuTitle: string
  capability: string
  slug: string
  hookSuffix: string
  render: () => void
}

export interface MetaBox {
  id: string
  title: string
  screen: PostType
  render: (post: Post) => void
}
