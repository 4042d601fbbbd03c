// backend/services/museum/src/views/pages/categories.ts
import type { Category, Exhibit } from "../../contracts/museum.contract";
import { each, html, when } from "../html";
import { layout, type ViewContext } from "../layout";
import { categoryCard, exhibitGrid } from "../partials";

export function renderCategoryList(ctx: ViewContext, categories: readonly Category[]): string {
  const body = html`<h1>Collections</h1>
    ${
      categories.length === 0
        ? html`<p class="empty">No collections yet.</p>`
        : html`<div class="category-grid">${each(categories, categoryCard)}</div>`
    }`;
  return layout(ctx, { title: "Collections" }, body);
}

export type CategoryPageModel = {
  category: Category;
  exhibits: readonly Exhibit[];
  withAudio: number;
};

export function renderCategory(ctx: ViewContext, m: CategoryPageModel): string {
  const body = html`<h1>${m.category.title}</h1>
    ${when(m.category.description !== "", () => html`<p class="lead">${m.category.description}</p>`)}
    <p class="stats">
      <span class="exhibit-total">${m.exhibits.length} exhibits</span>
      <span class="audio-total">${m.withAudio} with audio guide</span>
    </p>
    ${exhibitGrid(m.exhibits)}`;
  return layout(ctx, { title: m.category.title }, body);
}
