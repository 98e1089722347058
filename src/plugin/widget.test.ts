import { describe, expect, it } from "vitest"

import { DEFAULT_SETTINGS } from "./settings.js"
import { buildChatUrl, renderWidget } from "./widget.js"

describe("buildChatUrl", () => {
  it("strips formatting from the number and encodes the message", () => {
    expect(buildChatUrl("+34 600-123-456", "Hi, I need help & info")).toBe(
      "https://wa.me/34600123456?text=Hi%2C%20I%20need%20help%20%26%20info",
    )
  })

  it("leaves out the text parameter for a blank message", () => {
    expect(buildChatUrl("34600123456", "   ")).toBe("https://wa.me/34600123456")
    expect(buildChatUrl("34600123456")).toBe("https://wa.me/34600123456")
  })
})

describe("renderWidget", () => {
  it("escapes the button text and label", () => {
    const html = renderWidget({
      settings: { ...DEFAULT_SETTINGS, phoneNumber: "34600123456", buttonText: "<b>Help</b>" },
      ariaLabel: 'Say "hi"',
    })

    expect(html).toBe(
      '<div id="whatsappsupport" class="whatsappsupport whatsappsupport--right">' +
      '<a class="whatsappsupport__button" href="https://wa.me/34600123456" target="_blank" rel="noopener noreferrer" aria-label="Say &quot;hi&quot;">' +
      '<span class="whatsappsupport__label">&lt;b&gt;Help&lt;/b&gt;</span>' +
      "</a>" +
      "</div>",
    )
  })
})
