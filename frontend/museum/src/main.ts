// frontend/museum/src/main.ts
/**
 * Page bootstrap for the public site. Bundled to /static/js/main.js
 * (IIFE) and loaded with `defer` from every page.
 */
import { PanoramaViewer } from "./panorama/PanoramaViewer";
import { TextFade } from "./reveal/textFade";
import { lazyLoad } from "./utils/lazyLoad";
import { throttle } from "./utils/timing";

export type PageHandles = {
  panorama: PanoramaViewer | null;
  fade: TextFade | null;
  dispose(): void;
};

function numberAttr(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function bootPage(doc: Document = document): PageHandles {
  let panorama: PanoramaViewer | null = null;
  const container = doc.getElementById("panorama");
  const image = container?.dataset.image;
  if (container && image) {
    panorama = new PanoramaViewer(container, image, {
      autoRotateSpeed: numberAttr(container.dataset.autorotateSpeed),
      resumeDelayMs: numberAttr(container.dataset.resumeDelay),
    });
    panorama.init();
  }

  const heading = doc.getElementById("heading");
  const paragraph = doc.getElementById("paragraph");
  const fade = heading || paragraph ? new TextFade([heading, paragraph]).start() : null;

  const stopLazy = lazyLoad(doc.querySelectorAll<HTMLImageElement>("img[data-src]"));

  const header = doc.querySelector("header");
  const view = doc.defaultView;
  const onScroll = throttle(() => {
    if (header && view) header.classList.toggle("is-scrolled", view.scrollY > 10);
  }, 100);
  view?.addEventListener("scroll", onScroll, { passive: true });

  return {
    panorama,
    fade,
    dispose() {
      panorama?.destroy();
      fade?.cancel();
      stopLazy();
      onScroll.cancel();
      view?.removeEventListener("scroll", onScroll);
    },
  };
}

if (typeof document !== "undefined") {
  document.addEventListener("DOMContentLoaded", () => {
    bootPage(document);
  });
}
