import { describe, expect, it } from "vitest"

import type { HookRegistration } from "../hooks/registry.js"
import type { HookDispatcher } from "../hooks/types.js"
import { createTestSite } from "../test-utils.js"
import { WhatsAppSupportAdmin } from "./admin.js"
import { WhatsAppSupportI18n } from "./i18n.js"
import { WhatsAppSupportPublic } from "./public.js"
import { WhatsAppSupport } from "./whatsapp-support.js"

const SETTINGS_LINK_HOOK = "plugin_action_links_whatsapp-support/whatsappsupport.php"

function allRegistrations(plugin: WhatsAppSupport): HookRegistration[] {
  const loader = plugin.getLoader()
  return [...loader.getActions(), ...loader.getFilters()]
}

function summarize(registrations: HookRegistration[]): Array<[string, string, string]> {
  return registrations.map((registration): [string, string, string] => [registration.kind, registration.hook, registration.method])
}

describe("WhatsAppSupport", () => {
  describe("admin requests", () => {
    it("registers exactly the admin handler's six actions and one filter", () => {
      const plugin = new WhatsAppSupport({ isAdmin: true, site: createTestSite({ isAdmin: true }) })
      const registrations = allRegistrations(plugin)

      const adminHooks = registrations.filter((registration) => registration.component instanceof WhatsAppSupportAdmin)

      expect(summarize(adminHooks)).toEqual([
        ["action", "admin_init", "settingsInit"],
        ["action", "admin_enqueue_scripts", "enqueueStyles"],
        ["action", "admin_enqueue_scripts", "enqueueScripts"],
        ["action", "admin_menu", "addMenu"],
        ["action", "add_meta_boxes", "addMetaBoxes"],
        ["action", "save_post", "savePost"],
        ["filter", SETTINGS_LINK_HOOK, "settingsLink"],
      ])
      expect(registrations.some((registration) => registration.component instanceof WhatsAppSupportPublic)).toBe(false)
    })

    it("uses the default priority for admin_init and reports the default version", () => {
      const plugin = new WhatsAppSupport({ isAdmin: true, site: createTestSite({ isAdmin: true }) })
      const loader = plugin.getLoader()

      const adminInit = loader.getActions().find((registration) => registration.hook === "admin_init")
      const settingsLink = loader.getFilters().find((registration) => registration.hook === SETTINGS_LINK_HOOK)

      expect(adminInit).toMatchObject({ method: "settingsInit", priority: 10, acceptedArgs: 1 })
      expect(settingsLink).toMatchObject({ kind: "filter", method: "settingsLink" })
      expect(plugin.getVersion()).toBe("1.0.0")
    })
  })

  describe("public requests", () => {
    it("registers exactly the public handler's four actions", () => {
      const plugin = new WhatsAppSupport({ isAdmin: false, site: createTestSite() })
      const registrations = allRegistrations(plugin)

      const publicHooks = registrations.filter((registration) => registration.component instanceof WhatsAppSupportPublic)

      expect(summarize(publicHooks)).toEqual([
        ["action", "wp", "getSettings"],
        ["action", "wp_enqueue_scripts", "enqueueStyles"],
        ["action", "wp_enqueue_scripts", "enqueueScripts"],
        ["action", "wp_footer", "footerHtml"],
      ])
      expect(registrations.some((registration) => registration.component instanceof WhatsAppSupportAdmin)).toBe(false)
      expect(plugin.getLoader().getFilters()).toEqual([])
    })

    it("reports the configured version and registers no admin menu", () => {
      const plugin = new WhatsAppSupport({ isAdmin: false, version: "3.0.0", site: createTestSite() })
      const hooks = plugin.getLoader().getActions().map((registration) => registration.hook)

      expect(hooks).toContain("wp_footer")
      expect(hooks).not.toContain("admin_menu")
      expect(plugin.getVersion()).toBe("3.0.0")
    })
  })

  it("loads translations on plugins_loaded in both branches", () => {
    for (const isAdmin of [true, false]) {
      const plugin = new WhatsAppSupport({ isAdmin, site: createTestSite({ isAdmin }) })
      const localeHooks = plugin.getLoader().getActions().filter((registration) => registration.hook === "plugins_loaded")

      expect(localeHooks).toHaveLength(1)
      expect(localeHooks[0]?.component).toBeInstanceOf(WhatsAppSupportI18n)
      expect(localeHooks[0]?.method).toBe("loadPluginTextdomain")
    }
  })

  it("always reports the same plugin name", () => {
    const admin = new WhatsAppSupport({ isAdmin: true, version: "9.9.9", site: createTestSite({ isAdmin: true }) })
    const publicSide = new WhatsAppSupport({ isAdmin: false, site: createTestSite() })

    expect(admin.getPluginName()).toBe("whatsappsupport")
    expect(publicSide.getPluginName()).toBe("whatsappsupport")
  })

  it("falls back to the default version when the configured one is blank", () => {
    const configured = new WhatsAppSupport({ isAdmin: false, version: "2.3.1", site: createTestSite() })
    const blank = new WhatsAppSupport({ isAdmin: false, version: "  ", site: createTestSite() })

    expect(configured.getVersion()).toBe("2.3.1")
    expect(blank.getVersion()).toBe("1.0.0")
  })

  it("hands every registration to the host once through run", () => {
    const plugin = new WhatsAppSupport({ isAdmin: true, site: createTestSite({ isAdmin: true }) })
    const handOffs: Array<[string, number, number]> = []
    const dispatcher: HookDispatcher = {
      addAction: (hook, _callback, priority, acceptedArgs) => {
        handOffs.push([hook, priority, acceptedArgs])
      },
      addFilter: (hook, _callback, priority, acceptedArgs) => {
        handOffs.push([hook, priority, acceptedArgs])
      },
    }

    plugin.run(dispatcher)

    const expected = allRegistrations(plugin).map((registration): [string, number, number] => [
      registration.hook,
      registration.priority,
      registration.acceptedArgs,
    ])
    expect(handOffs).toHaveLength(8)
    expect([...handOffs].sort()).toEqual([...expected].sort())
    expect(() => plugin.run(dispatcher)).toThrow("already been run")
  })
})
