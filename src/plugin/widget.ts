import { escapeHtml } from "../utils/index.js"
import type { WidgetSettings } from "./settings.js"

const CHAT_BASE_URL = "https://wa.me/"

/**
 * Click-to-chat link for `phoneNumber`, prefilled with `message` when one
 * is given. wa.me takes the number without `+` or formatting.
 */
export function buildChatUrl(phoneNumber: string, message = ""): string {
  const digits = phoneNumber.replace(/\D/g, "")
  const text = message.trim()
  const base = `${CHAT_BASE_URL}${digits}`
  return text.length > 0 ? `${base}?text=${encodeURIComponent(text)}` : base
}

export interface WidgetView {
  settings: WidgetSettings
  /** Accessible label for the link; already translated. */
  ariaLabel: string
}

export function renderWidget({ settings, ariaLabel }: WidgetView): string {
  const href = escapeHtml(buildChatUrl(settings.phoneNumber, settings.message))
  const classes = `whatsappsupport whatsappsupport--${settings.position}`
  return (
    `<div id="whatsappsupport" class="${classes}">` +
    `<a class="whatsappsupport__button" href="${href}" target="_blank" rel="noopener noreferrer" aria-label="${escapeHtml(ariaLabel)}">` +
    `<span class="whatsappsupport__label">${escapeHtml(settings.buttonText)}</span>` +
    `</a>` +
    `</div>`
  )
}
