import { createLogger } from "../logger.js"
import type {
  ActionCallback,
  ActionHook,
  ActionHooks,
  FilterCallback,
  FilterHook,
  FilterHooks,
  FilterValue,
  HookDispatcher,
} from "./types.js"

const log = createLogger("hooks.pipeline")

interface Subscription {
  callback: (...args: never) => unknown
  priority: number
  acceptedArgs: number
}

function subscribe(table: Map<string, Subscription[]>, hook: string, subscription: Subscription): void {
  const existing = table.get(hook) ?? []
  existing.push(subscription)
  // Array#sort is stable, so equal priorities keep registration order
  existing.sort((a, b) => a.priority - b.priority)
  table.set(hook, existing)
}

/**
 * Host dispatch engine: holds every callback handed over by plugin hook
 * registries and fires them when the request lifecycle reaches the event.
 *
 * Callbacks run ascending by priority and receive at most `acceptedArgs`
 * arguments. A failing callback is logged and skipped.
 */
export class HookPipeline implements HookDispatcher {
  private readonly actions = new Map<string, Subscription[]>()
  private readonly filters = new Map<string, Subscription[]>()
  private readonly fired = new Map<string, number>()

  addAction<H extends ActionHook>(
    hook: H,
    callback: ActionCallback<H>,
    priority: number,
    acceptedArgs: number,
  ): void {
    subscribe(this.actions, hook, { callback, priority, acceptedArgs })
  }

  addFilter<H extends FilterHook>(
    hook: H,
    callback: FilterCallback<H>,
    priority: number,
    acceptedArgs: number,
  ): void {
    subscribe(this.filters, hook, { callback, priority, acceptedArgs })
  }

  async doAction<H extends ActionHook>(hook: H, ...args: ActionHooks[H]): Promise<void> {
    this.fired.set(hook, (this.fired.get(hook) ?? 0) + 1)

    const passed: readonly unknown[] = args

    for (const subscription of this.actions.get(hook) ?? []) {
      try {
        await Reflect.apply(subscription.callback, undefined, passed.slice(0, subscription.acceptedArgs))
      } catch (error) {
        log.warn("Action callback failed", { hook, priority: subscription.priority, error })
      }
    }
  }

  async applyFilters<H extends FilterHook>(hook: H, ...args: FilterHooks[H]): Promise<FilterValue<H>> {
    const passed: readonly unknown[] = args
    const rest = passed.slice(1)
    let value: unknown = passed[0]

    for (const subscription of this.filters.get(hook) ?? []) {
      try {
        value = await Reflect.apply(
          subscription.callback,
          undefined,
          [value, ...rest].slice(0, subscription.acceptedArgs),
        )
      } catch (error) {
        log.warn("Filter callback failed", { hook, priority: subscription.priority, error })
      }
    }

    // every subscription under this key was registered as a FilterCallback<H>
    return value as FilterValue<H>
  }

  hasAction(hook: ActionHook): boolean {
    return (this.actions.get(hook)?.length ?? 0) > 0
  }

  hasFilter(hook: FilterHook): boolean {
    return (this.filters.get(hook)?.length ?? 0) > 0
  }

  didAction(hook: ActionHook): number {
    return this.fired.get(hook) ?? 0
  }
}
