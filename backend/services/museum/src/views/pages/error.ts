// backend/services/museum/src/views/pages/error.ts
import type { ErrorPageRenderer } from "@shared/middleware/problemJson";
import { html } from "../html";
import { layout, type ViewContext } from "../layout";

export function errorPageRenderer(ctx: ViewContext): ErrorPageRenderer {
  return ({ status, title, detail }) =>
    layout(
      ctx,
      { title },
      html`<section class="error-page">
      <h1>${status}</h1>
      <p class="error-title">${title}</p>
      <p class="error-detail">${detail}</p>
      <a href="/">Back to the museum</a>
    </section>`
    );
}
