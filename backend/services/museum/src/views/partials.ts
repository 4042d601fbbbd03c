// backend/services/museum/src/views/partials.ts
import type { Category, Exhibit, MuseumEvent } from "../contracts/museum.contract";
import { mediaUrl } from "../media/mediaStore";
import { each, html, when, type SafeHtml } from "./html";

/** Lazy image: page script swaps data-src into src when it scrolls into view. */
export function lazyImage(relPath: string, alt: string): SafeHtml {
  return html`<img class="lazy" data-src="${mediaUrl(relPath)}" alt="${alt}" />`;
}

export function exhibitCard(x: Exhibit): SafeHtml {
  return html`<article class="exhibit-card">
        <a href="/exhibits/${x.id}">
          ${lazyImage(x.image, x.title)}
          <h3>${x.title}</h3>
        </a>
        ${when(x.audio !== null, () => html`<span class="badge">Audio guide</span>`)}
      </article>`;
}

export function exhibitGrid(items: readonly Exhibit[]): SafeHtml {
  if (items.length === 0) return html`<p class="empty">No exhibits yet.</p>`;
  return html`<div class="exhibit-grid">${each(items, exhibitCard)}</div>`;
}

export function categoryCard(c: Category): SafeHtml {
  return html`<article class="category-card">
        <a href="/categories/${encodeURIComponent(c.slug)}">
          ${lazyImage(c.image, c.title)}
          <h3>${c.title}</h3>
        </a>
        <span class="count">${c.exhibitCount} exhibits</span>
      </article>`;
}

export function eventCard(e: MuseumEvent): SafeHtml {
  return html`<article class="event-card">
        ${lazyImage(e.image, e.title)}
        <h3>${e.title}</h3>
        ${when(e.description !== "", () => html`<p>${e.description}</p>`)}
        <time datetime="${e.createdAt.toISOString()}">${e.createdAt.toISOString().slice(0, 10)}</time>
      </article>`;
}

export function audioPlayer(relPath: string): SafeHtml {
  return html`<audio controls preload="none" src="${mediaUrl(relPath)}"></audio>`;
}
