/**
 * Barrel export for shared utility functions.
 *
 * @example
 *   import { escapeHtml, normalizePhoneNumber } from "../utils/index.js"
 */

export { escapeHtml, normalizePhoneNumber, parsePositiveInt } from "./string.js"
