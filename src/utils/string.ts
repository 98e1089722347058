/**
 * String helpers shared by the plugin handlers and the gateway.
 */

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&quot;",
  "'": "&#039;",
}

/**
 * Escape text for use inside HTML element content or a quoted attribute.
 */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
}

/**
 * Strip the formatting people type into phone numbers: spaces, dashes,
 * dots and parentheses. A leading `+` is kept.
 *
 * @example
 *   normalizePhoneNumber("+34 (600) 123-456") // "+34600123456"
 */
export function normalizePhoneNumber(raw: string): string {
  return raw.trim().replace(/[\s().-]/g, "")
}

/**
 * Parse a positive integer route parameter. Returns null for anything else.
 */
export function parsePositiveInt(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null
  const parsed = Number.parseInt(raw, 10)
  return parsed > 0 ? parsed : null
}
