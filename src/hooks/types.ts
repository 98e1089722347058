import type { Post, SiteRequest } from "../site/types.js"

/**
 * Argument lists of every action the host fires. The key is the event name
 * the host routes on, the tuple is what each callback may receive.
 */
export interface ActionHooks {
  plugins_loaded: []
  admin_init: []
  admin_enqueue_scripts: [hookSuffix: string]
  admin_menu: []
  add_meta_boxes: [postType: string, post: Post]
  save_post: [postId: number, post: Post, update: boolean]
  wp: [request: SiteRequest]
  wp_enqueue_scripts: []
  wp_footer: []
}

/**
 * Argument lists of filters. The first element is the value being filtered
 * and also the type every callback must return.
 */
export interface FilterHooks {
  [hook: `plugin_action_links_${string}`]: [links: string[], pluginFile: string]
}

export type ActionHook = keyof ActionHooks
export type FilterHook = keyof FilterHooks & string

export type ActionCallback<H extends ActionHook> = (...args: ActionHooks[H]) => void | Promise<void>

export type FilterValue<H extends FilterHook> = FilterHooks[H][0]

export type FilterCallback<H extends FilterHook> = (
  ...args: FilterHooks[H]
) => FilterValue<H> | Promise<FilterValue<H>>

export const DEFAULT_PRIORITY = 10
export const DEFAULT_ACCEPTED_ARGS = 1

/** The host-side half of hook registration: where callbacks end up. */
export interface HookDispatcher {
  addAction<H extends ActionHook>(
    hook: H,
    callback: ActionCallback<H>,
    priority: number,
    acceptedArgs: number,
  ): void
  addFilter<H extends FilterHook>(
    hook: H,
    callback: FilterCallback<H>,
    priority: number,
    acceptedArgs: number,
  ): void
}
