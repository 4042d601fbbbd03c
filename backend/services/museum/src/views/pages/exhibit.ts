// backend/services/museum/src/views/pages/exhibit.ts
import type { Category, Exhibit } from "../../contracts/museum.contract";
import { mediaUrl } from "../../media/mediaStore";
import { html } from "../html";
import { layout, type ViewContext } from "../layout";
import { audioPlayer } from "../partials";

export function renderExhibit(
  ctx: ViewContext,
  m: { exhibit: Exhibit; category: Category | null }
): string {
  const x = m.exhibit;
  const c = m.category;
  const body = html`<article class="exhibit">
      <h1>${x.title}</h1>
      <img class="exhibit-image" src="${mediaUrl(x.image)}" alt="${x.title}" />
      ${x.audio ? audioPlayer(x.audio) : ""}
      <div class="description">${x.description}</div>
      <p class="meta">
        ${c ? html`<a class="category-link" href="/categories/${encodeURIComponent(c.slug)}">${c.title}</a>` : ""}
        <span class="views">${x.viewCount} views</span>
      </p>
    </article>`;
  return layout(ctx, { title: x.title }, body);
}
