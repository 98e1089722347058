import { z } from "zod"

import { createLogger } from "../logger.js"
import type { OptionStore } from "../site/option-store.js"
import type { PostStore } from "../site/post-store.js"
import { normalizePhoneNumber } from "../utils/index.js"

const log = createLogger("plugin.settings")

export const TEXT_DOMAIN = "whatsappsupport"
export const SETTINGS_OPTION = "whatsappsupport_settings"
export const SETTINGS_PAGE = "whatsappsupport"

export const META_HIDE = "_whatsappsupport_hide"
export const META_MESSAGE = "_whatsappsupport_message"
export const META_BOX_MARKER = "whatsappsupport_meta_box"

const boolFromInput = z.preprocess((value) => {
  if (typeof value === "boolean") {
    return value
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase()
    return normalized === "true" || normalized === "1" || normalized === "on" || normalized === "yes"
  }
  return false
}, z.boolean())

const phoneNumberSchema = z
  .string()
  .transform(normalizePhoneNumber)
  .refine((value) => value === "" || /^\+?\d{6,15}$/.test(value), {
    message: "Phone number must contain 6 to 15 digits",
  })

export const WidgetSettingsSchema = z.object({
  enabled: boolFromInput.default(true),
  phoneNumber: phoneNumberSchema.default(""),
  message: z.string().trim().max(500).default(""),
  buttonText: z.string().trim().min(1).max(60).default("Need help?"),
  position: z.enum(["right", "left"]).default("right"),
  showOnPages: boolFromInput.default(true),
})

export type WidgetSettings = z.infer<typeof WidgetSettingsSchema>

export const PostWidgetMetaSchema = z.object({
  hide: boolFromInput.default(false),
  message: z.string().trim().max(500).default(""),
})

export type PostWidgetMeta = z.infer<typeof PostWidgetMetaSchema>

export const DEFAULT_SETTINGS: WidgetSettings = WidgetSettingsSchema.parse({})

/** Sanitizer registered with the settings API; throws a ZodError on bad input. */
export function sanitizeSettings(input: unknown): WidgetSettings {
  return WidgetSettingsSchema.parse(input)
}

export function readSettings(options: OptionStore): WidgetSettings {
  const stored = options.get(SETTINGS_OPTION)
  if (stored === undefined) {
    return DEFAULT_SETTINGS
  }

  const parsed = WidgetSettingsSchema.safeParse(stored)
  if (!parsed.success) {
    log.warn("stored settings are invalid, falling back to defaults", {
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    })
    return DEFAULT_SETTINGS
  }
  return parsed.data
}

export function readPostMeta(posts: PostStore, postId: number): PostWidgetMeta {
  const hide = posts.getMeta(postId, META_HIDE)
  const message = posts.getMeta(postId, META_MESSAGE)
  return {
    hide: hide === true,
    message: typeof message === "string" ? message : "",
  }
}
