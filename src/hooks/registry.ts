import { createLogger } from "../logger.js"
import {
  DEFAULT_ACCEPTED_ARGS,
  DEFAULT_PRIORITY,
  type ActionCallback,
  type ActionHook,
  type FilterCallback,
  type FilterHook,
  type HookDispatcher,
} from "./types.js"

const log = createLogger("hooks.registry")

export type HookKind = "action" | "filter"

export interface HookRegistration {
  kind: HookKind
  hook: string
  component: object
  method: string
  priority: number
  acceptedArgs: number
}

interface StoredRegistration extends HookRegistration {
  handOff: (dispatcher: HookDispatcher) => void
}

/**
 * Collects the plugin's action and filter registrations and hands them to
 * the host in one go.
 *
 * Registration is two-phase: populate with {@link addAction} and
 * {@link addFilter}, then call {@link run} once. Adding after `run` or
 * running twice throws.
 */
export class HookRegistry {
  private readonly actions: StoredRegistration[] = []
  private readonly filters: StoredRegistration[] = []
  private dispatched = false

  addAction<H extends ActionHook, K extends string, T extends Record<K, ActionCallback<H>>>(
    hook: H,
    component: T,
    method: K,
    priority = DEFAULT_PRIORITY,
    acceptedArgs = DEFAULT_ACCEPTED_ARGS,
  ): void {
    this.assertCollecting(hook)

    const callback: ActionCallback<H> = (...args) => component[method](...args)
    this.actions.push({
      kind: "action",
      hook,
      component,
      method,
      priority,
      acceptedArgs,
      handOff: (dispatcher) => dispatcher.addAction(hook, callback, priority, acceptedArgs),
    })
  }

  addFilter<H extends FilterHook, K extends string, T extends Record<K, FilterCallback<H>>>(
    hook: H,
    component: T,
    method: K,
    priority = DEFAULT_PRIORITY,
    acceptedArgs = DEFAULT_ACCEPTED_ARGS,
  ): void {
    this.assertCollecting(hook)

    const callback: FilterCallback<H> = (...args) => component[method](...args)
    this.filters.push({
      kind: "filter",
      hook,
      component,
      method,
      priority,
      acceptedArgs,
      handOff: (dispatcher) => dispatcher.addFilter(hook, callback, priority, acceptedArgs),
    })
  }

  run(dispatcher: HookDispatcher): void {
    if (this.dispatched) {
      throw new Error("Hook registry has already been run; registrations are handed to the host only once")
    }
    this.dispatched = true

    for (const registration of this.filters) {
      registration.handOff(dispatcher)
    }

    for (const registration of this.actions) {
      registration.handOff(dispatcher)
    }

    log.debug("hooks handed to host", {
      actions: this.actions.length,
      filters: this.filters.length,
    })
  }

  getActions(): readonly HookRegistration[] {
    return this.actions.map(toRegistration)
  }

  getFilters(): readonly HookRegistration[] {
    return this.filters.map(toRegistration)
  }

  isDispatched(): boolean {
    return this.dispatched
  }

  private assertCollecting(hook: string): void {
    if (this.dispatched) {
      throw new Error(`Cannot register "${hook}": hook registry has already been run`)
    }
  }
}

function toRegistration({ kind, hook, component, method, priority, acceptedArgs }: StoredRegistration): HookRegistration {
  return { kind, hook, component, method, priority, acceptedArgs }
}
