import type { EnqueuedAsset } from "../site/types.js"
import { escapeHtml } from "../utils/index.js"

export interface DocumentParts {
  title: string
  lang: string
  bodyClass: string
  styles: EnqueuedAsset[]
  scripts: EnqueuedAsset[]
  content: string
  footer: string
}

function assetUrl(asset: EnqueuedAsset): string {
  return escapeHtml(`${asset.src}?ver=${encodeURIComponent(asset.version)}`)
}

function styleTag(asset: EnqueuedAsset): string {
  return `<link rel="stylesheet" id="${escapeHtml(asset.handle)}-css" href="${assetUrl(asset)}" media="all" />`
}

function scriptTag(asset: EnqueuedAsset): string {
  return `<script id="${escapeHtml(asset.handle)}-js" src="${assetUrl(asset)}"></script>`
}

/** Assemble a full HTML page from what the request's hooks produced. */
export function renderDocument(parts: DocumentParts): string {
  const headScripts = parts.scripts.filter((script) => !script.inFooter)
  const footerScripts = parts.scripts.filter((script) => script.inFooter)

  return [
    "<!DOCTYPE html>",
    `<html lang="${escapeHtml(parts.lang.replace("_", "-"))}">`,
    "<head>",
    '<meta charset="utf-8" />',
    `<title>${escapeHtml(parts.title)}</title>`,
    ...parts.styles.map(styleTag),
    ...headScripts.map(scriptTag),
    "</head>",
    `<body class="${escapeHtml(parts.bodyClass)}">`,
    parts.content,
    parts.footer,
    ...footerScripts.map(scriptTag),
    "</body>",
    "</html>",
  ].join("\n")
}
