// backend/services/museum/src/views/pages/home.ts
import type { Category, Exhibit, MuseumEvent } from "../../contracts/museum.contract";
import { each, html, when } from "../html";
import { layout, type ViewContext } from "../layout";
import { eventCard, exhibitGrid } from "../partials";

export type HomeModel = {
  categories: ReadonlyArray<{ category: Category; exhibits: readonly Exhibit[] }>;
  featured: readonly Exhibit[];
  events: readonly MuseumEvent[];
};

export function renderHome(ctx: ViewContext, m: HomeModel): string {
  const p = ctx.panorama;
  const body = html`
    <section class="hero">
      <div
        id="panorama"
        class="panorama"
        data-image="${p.image}"
        data-autorotate-speed="${p.autoRotateSpeed}"
        data-resume-delay="${p.resumeDelayMs}"
      ></div>
      <div class="hero-text">
        <h1 id="heading">${ctx.siteTitle}</h1>
        <p id="paragraph">Drag to look around the hall.</p>
      </div>
    </section>

    ${when(
      m.featured.length > 0,
      () => html`<section class="featured">
      <h2>Featured</h2>
      ${exhibitGrid(m.featured)}
    </section>`
    )}

    <section class="collections">
      ${each(
        m.categories,
        ({ category, exhibits }) => html`<section class="category" id="category-${category.slug}">
        <h2><a href="/categories/${encodeURIComponent(category.slug)}">${category.title}</a></h2>
        ${when(category.description !== "", () => html`<p>${category.description}</p>`)}
        ${exhibitGrid(exhibits)}
      </section>`
      )}
    </section>

    ${when(
      m.events.length > 0,
      () => html`<section class="events">
      <h2>Events</h2>
      <div class="event-list">${each(m.events, eventCard)}</div>
    </section>`
    )}`;

  return layout(ctx, { panorama: true }, body);
}
