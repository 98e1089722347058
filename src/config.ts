import dotenv from "dotenv"
import { z } from "zod"

dotenv.config({ path: ".env" })

export const DEFAULT_PLUGIN_VERSION = "1.0.0"

const intFromEnv = z.preprocess((value) => {
  if (typeof value === "number") {
    return value
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number.parseInt(value, 10)
    return Number.isNaN(parsed) ? undefined : parsed
  }
  return undefined
}, z.number().int())

const optionalString = z.preprocess((value) => {
  if (typeof value !== "string") {
    return undefined
  }
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}, z.string().optional())

const logLevelSchema = z.enum(["debug", "info", "warn", "error"])

const ConfigSchema = z.object({
  WHATSAPPSUPPORT_VERSION: optionalString,
  LOG_LEVEL: logLevelSchema.default("info"),
  LOG_FILE: z.string().default(""),
  GATEWAY_HOST: z.string().default("127.0.0.1"),
  GATEWAY_PORT: intFromEnv.default(18790),
  SITE_LOCALE: z.string().regex(/^[a-z]{2,3}(_[A-Z]{2})?$/).default("en_US"),
  ADMIN_TOKEN: z.string().default(""),
  LANGUAGES_DIR: z.string().default("languages"),
  CONTENT_FILE: z.string().default("content/posts.json"),
})

const parsed = ConfigSchema.safeParse(process.env)

if (!parsed.success) {
  console.error("[WhatsAppSupport Config Error] Invalid environment configuration.")
  for (const issue of parsed.error.issues) {
    const key = issue.path.join(".")
    console.error(`  - ${key}: ${issue.message}`)
  }
  process.exit(1)
}

export type Config = z.infer<typeof ConfigSchema>

export const config: Config = parsed.data

/**
 * Version the plugin reports: the externally configured one when present,
 * otherwise {@link DEFAULT_PLUGIN_VERSION}.
 */
export function resolvePluginVersion(configured: string | undefined): string {
  const trimmed = configured?.trim() ?? ""
  return trimmed.length > 0 ? trimmed : DEFAULT_PLUGIN_VERSION
}

export default config
