// backend/services/museum/src/views/pages/audioGuides.ts
import type { Exhibit } from "../../contracts/museum.contract";
import { each, html } from "../html";
import { layout, type ViewContext } from "../layout";
import { audioPlayer } from "../partials";

export function renderAudioGuides(ctx: ViewContext, exhibits: readonly Exhibit[]): string {
  const body = html`<h1>Audio guides</h1>
    ${
      exhibits.length === 0
        ? html`<p class="empty">No audio guides yet.</p>`
        : html`<ul class="audio-guides">
      ${each(
        exhibits,
        (x) => html`<li>
        <a href="/exhibits/${x.id}">${x.title}</a>
        ${x.audio ? audioPlayer(x.audio) : ""}
      </li>`
      )}
    </ul>`
    }`;
  return layout(ctx, { title: "Audio guides" }, body);
}
