import { describe, expect, it } from "vitest"

import { HookPipeline } from "./pipeline.js"
import { HookRegistry } from "./registry.js"
import type { HookDispatcher } from "./types.js"

interface HandOff {
  kind: "action" | "filter"
  hook: string
  priority: number
  acceptedArgs: number
}

function createRecordingDispatcher(): { dispatcher: HookDispatcher; handOffs: HandOff[] } {
  const handOffs: HandOff[] = []
  const dispatcher: HookDispatcher = {
    addAction: (hook, _callback, priority, acceptedArgs) => {
      handOffs.push({ kind: "action", hook, priority, acceptedArgs })
    },
    addFilter: (hook, _callback, priority, acceptedArgs) => {
      handOffs.push({ kind: "filter", hook, priority, acceptedArgs })
    },
  }
  return { dispatcher, handOffs }
}

class DemoHandler {
  readonly seen: string[] = []

  settingsInit(): void {
    this.seen.push("init")
  }

  enqueueStyles(hookSuffix: string): void {
    this.seen.push(`styles:${hookSuffix}`)
  }

  settingsLink(links: string[]): string[] {
    return ["<a>Settings</a>", ...links]
  }
}

const DEMO_LINKS_HOOK = "plugin_action_links_demo/demo.php"

describe("HookRegistry", () => {
  it("records actions with the default priority and argument count", () => {
    const registry = new HookRegistry()
    const handler = new DemoHandler()

    registry.addAction("admin_init", handler, "settingsInit")

    expect(registry.getActions()).toEqual([
      { kind: "action", hook: "admin_init", component: handler, method: "settingsInit", priority: 10, acceptedArgs: 1 },
    ])
    expect(registry.getFilters()).toEqual([])
  })

  it("records filters separately with explicit priority and argument count", () => {
    const registry = new HookRegistry()
    const handler = new DemoHandler()

    registry.addFilter(DEMO_LINKS_HOOK, handler, "settingsLink", 5, 2)

    expect(registry.getFilters()).toEqual([
      { kind: "filter", hook: DEMO_LINKS_HOOK, component: handler, method: "settingsLink", priority: 5, acceptedArgs: 2 },
    ])
    expect(registry.getActions()).toEqual([])
  })

  it("hands every registration to the dispatcher exactly once with its tuple unchanged", () => {
    const registry = new HookRegistry()
    const handler = new DemoHandler()
    const { dispatcher, handOffs } = createRecordingDispatcher()

    registry.addAction("admin_init", handler, "settingsInit")
    registry.addAction("admin_enqueue_scripts", handler, "enqueueStyles", 20, 1)
    registry.addFilter(DEMO_LINKS_HOOK, handler, "settingsLink", 10, 2)
    registry.run(dispatcher)

    expect(handOffs).toEqual([
      { kind: "filter", hook: DEMO_LINKS_HOOK, priority: 10, acceptedArgs: 2 },
      { kind: "action", hook: "admin_init", priority: 10, acceptedArgs: 1 },
      { kind: "action", hook: "admin_enqueue_scripts", priority: 20, acceptedArgs: 1 },
    ])
    expect(registry.isDispatched()).toBe(true)
  })

  it("invokes the registered method on its component when the host fires the hook", async () => {
    const registry = new HookRegistry()
    const handler = new DemoHandler()
    const pipeline = new HookPipeline()

    registry.addAction("admin_init", handler, "settingsInit")
    registry.addAction("admin_enqueue_scripts", handler, "enqueueStyles")
    registry.addFilter(DEMO_LINKS_HOOK, handler, "settingsLink")
    registry.run(pipeline)

    await pipeline.doAction("admin_init")
    await pipeline.doAction("admin_enqueue_scripts", "settings_page_demo")
    const links = await pipeline.applyFilters(DEMO_LINKS_HOOK, ["<a>Deactivate</a>"], "demo/demo.php")

    expect(handler.seen).toEqual(["init", "styles:settings_page_demo"])
    expect(links).toEqual(["<a>Settings</a>", "<a>Deactivate</a>"])
  })

  it("refuses to run twice", () => {
    const registry = new HookRegistry()
    const { dispatcher, handOffs } = createRecordingDispatcher()
    registry.addAction("admin_init", new DemoHandler(), "settingsInit")

    registry.run(dispatcher)

    expect(() => registry.run(dispatcher)).toThrow("Hook registry has already been run")
    expect(handOffs).toHaveLength(1)
  })

  it("refuses registrations after run", () => {
    const registry = new HookRegistry()
    const handler = new DemoHandler()
    registry.run(createRecordingDispatcher().dispatcher)

    expect(() => registry.addAction("admin_init", handler, "settingsInit")).toThrow(
      'Cannot register "admin_init": hook registry has already been run',
    )
    expect(() => registry.addFilter(DEMO_LINKS_HOOK, handler, "settingsLink")).toThrow(
      `Cannot register "${DEMO_LINKS_HOOK}": hook registry has already been run`,
    )
    expect(registry.getActions()).toEqual([])
  })
})
