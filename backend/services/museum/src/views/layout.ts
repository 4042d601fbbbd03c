// backend/services/museum/src/views/layout.ts
import type { PanoramaSettings } from "../config";
import { html, when, type SafeHtml } from "./html";

export type ViewContext = {
  siteTitle: string;
  panorama: PanoramaSettings;
};

export type PageOptions = {
  title?: string;
  /** Load the vendored three/panolens scripts. */
  panorama?: boolean;
};

const STATIC = "/static";

function nav(): SafeHtml {
  return html`<nav class="site-nav">
      <a href="/">Home</a>
      <a href="/categories">Collections</a>
      <a href="/events">Events</a>
      <a href="/audio-guides">Audio guides</a>
    </nav>`;
}

export function layout(ctx: ViewContext, opts: PageOptions, body: SafeHtml): string {
  const title = opts.title ? `${opts.title} | ${ctx.siteTitle}` : ctx.siteTitle;
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
    <link rel="stylesheet" href="${STATIC}/css/main.css" />
  </head>
  <body>
    <header class="site-header">
      <a class="site-title" href="/">${ctx.siteTitle}</a>
      ${nav()}
    </header>
    <main>${body}</main>
    <footer class="site-footer">${ctx.siteTitle}</footer>
    ${when(
      opts.panorama === true,
      () => html`<script src="${STATIC}/vendor/three/three.min.js"></script>
    <script src="${STATIC}/vendor/panolens/panolens.min.js"></script>`
    )}
    <script src="${STATIC}/js/main.js" defer></script>
  </body>
</html>
`.content;
}
