// backend/services/museum/src/views/pages/events.ts
import type { MuseumEvent } from "../../contracts/museum.contract";
import { each, html } from "../html";
import { layout, type ViewContext } from "../layout";
import { eventCard } from "../partials";

export function renderEvents(ctx: ViewContext, events: readonly MuseumEvent[]): string {
  const body = html`<h1>Events</h1>
    ${
      events.length === 0
        ? html`<p class="empty">No upcoming events.</p>`
        : html`<div class="event-list">${each(events, eventCard)}</div>`
    }`;
  return layout(ctx, { title: "Events" }, body);
}
