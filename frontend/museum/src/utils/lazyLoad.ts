// frontend/museum/src/utils/lazyLoad.ts

export type LazyLoadOptions = {
  rootMargin?: string;
  threshold?: number;
  /** Class added once the real source is in place. */
  loadedClass?: string;
};

function reveal(img: HTMLImageElement, loadedClass: string): void {
  const src = img.dataset.src;
  if (!src) return;
  img.src = src;
  img.removeAttribute("data-src");
  img.classList.add(loadedClass);
}

/**
 * Swap `data-src` into `src` as images approach the viewport.
 * Without IntersectionObserver every image loads immediately.
 * Returns a disposer that stops observing.
 */
export function lazyLoad(
  images: Iterable<HTMLImageElement>,
  options: LazyLoadOptions = {}
): () => void {
  const loadedClass = options.loadedClass ?? "loaded";
  const list = Array.from(images);

  if (typeof IntersectionObserver === "undefined") {
    for (const img of list) reveal(img, loadedClass);
    return () => {};
  }

  const observer = new IntersectionObserver(
    (entries, obs) => {
      for (const entry of entries) {
        if (!entry.isIntersecting) continue;
        const img = entry.target;
        if (img instanceof HTMLImageElement) reveal(img, loadedClass);
        obs.unobserve(img);
      }
    },
    {
      rootMargin: options.rootMargin ?? "200px 0px",
      threshold: options.threshold ?? 0,
    }
  );

  for (const img of list) observer.observe(img);
  return () => observer.disconnect();
}
