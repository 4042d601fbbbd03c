// @vitest-environment jsdom
// frontend/museum/test/panoramaViewer.spec.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PanoramaEngine, ViewerOptions } from "../src/panorama/engine";
import { ERROR_CLASS, PanoramaViewer } from "../src/panorama/PanoramaViewer";

function fakeEngine() {
  const handle = {
    add: vi.fn(),
    enableAutoRotate: vi.fn(),
    disableAutoRotate: vi.fn(),
    dispose: vi.fn(),
  };
  const created: ViewerOptions[] = [];
  const engine: PanoramaEngine = {
    createViewer: vi.fn((opts: ViewerOptions) => {
      created.push(opts);
      return handle;
    }),
    createImagePanorama: vi.fn((url: string) => ({ url })),
  };
  return { engine, handle, created };
}

let container: HTMLElement;

beforeEach(() => {
  vi.useFakeTimers();
  document.body.innerHTML = `<div id="panorama"></div>`;
  const el = document.getElementById("panorama");
  if (!el) throw new Error("fixture missing");
  container = el;
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("PanoramaViewer – init", () => {
  it("creates an auto-rotating viewer with the configured speed and no control bar", () => {
    const { engine, handle, created } = fakeEngine();
    const viewer = new PanoramaViewer(container, "/static/images/hall.jpg", {
      engine,
      autoRotateSpeed: 0.5,
      resumeDelayMs: 3000,
    });

    expect(viewer.init()).toBe(true);
    expect(viewer.isActive).toBe(true);
    expect(created).toEqual([
      {
        container,
        autoRotate: true,
        autoRotateSpeed: 0.5,
        autoRotateActivationDuration: 3000,
        controlBar: false,
      },
    ]);
    expect(engine.createImagePanorama).toHaveBeenCalledWith("/static/images/hall.jpg");
    expect(handle.add).toHaveBeenCalledWith({ url: "/static/images/hall.jpg" });
  });

  it("defaults to speed 0.3 and a 5000 ms resume delay", () => {
    const { engine, created } = fakeEngine();
    new PanoramaViewer(container, "/p.jpg", { engine }).init();
    expect(created[0]?.autoRotateSpeed).toBe(0.3);
    expect(created[0]?.autoRotateActivationDuration).toBe(5000);
  });

  it("is idempotent", () => {
    const { engine } = fakeEngine();
    const viewer = new PanoramaViewer(container, "/p.jpg", { engine });
    viewer.init();
    viewer.init();
    expect(engine.createViewer).toHaveBeenCalledTimes(1);
  });

  it("returns false quietly when the container is missing", () => {
    const { engine } = fakeEngine();
    const viewer = new PanoramaViewer(null, "/p.jpg", { engine });
    expect(viewer.init()).toBe(false);
    expect(engine.createViewer).not.toHaveBeenCalled();
  });

  it("shows an inline error when the library is not loaded", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const viewer = new PanoramaViewer(container, "/p.jpg", { engine: null });

    expect(viewer.init()).toBe(false);
    expect(viewer.isActive).toBe(false);
    const box = container.querySelector(`.${ERROR_CLASS}`);
    expect(box?.textContent).toBe("The panorama could not be displayed.");
    expect(box?.getAttribute("role")).toBe("alert");
  });

  it("falls back to the window.PANOLENS global when no engine is given", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const viewer = new PanoramaViewer(container, "/p.jpg");
    expect(viewer.init()).toBe(false);
    expect(container.children).toHaveLength(1);
  });

  it("shows an inline error when the engine throws", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const { engine } = fakeEngine();
    engine.createViewer = () => {
      throw new Error("WebGL unavailable");
    };
    const viewer = new PanoramaViewer(container, "/p.jpg", { engine });

    expect(viewer.init()).toBe(false);
    expect(container.querySelectorAll(`.${ERROR_CLASS}`)).toHaveLength(1);
  });
});

describe("PanoramaViewer – interaction", () => {
  it("pauses on press and resumes after the delay", () => {
    const { engine, handle } = fakeEngine();
    const viewer = new PanoramaViewer(container, "/p.jpg", { engine, resumeDelayMs: 5000 });
    viewer.init();

    container.dispatchEvent(new Event("mousedown"));
    expect(handle.disableAutoRotate).toHaveBeenCalledTimes(1);
    expect(viewer.hasPendingResume).toBe(true);

    vi.advanceTimersByTime(4999);
    expect(handle.enableAutoRotate).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(handle.enableAutoRotate).toHaveBeenCalledTimes(1);
    expect(viewer.hasPendingResume).toBe(false);
  });

  it("restarts the countdown on each interaction, keeping one timer", () => {
    const { engine, handle } = fakeEngine();
    const viewer = new PanoramaViewer(container, "/p.jpg", { engine, resumeDelayMs: 5000 });
    viewer.init();

    container.dispatchEvent(new Event("pointerdown"));
    vi.advanceTimersByTime(3000);
    container.dispatchEvent(new Event("touchstart"));
    vi.advanceTimersByTime(3000);
    expect(handle.enableAutoRotate).not.toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(2000);
    expect(handle.enableAutoRotate).toHaveBeenCalledTimes(1);
  });

  it("destroy clears the timer, detaches listeners and is safe to repeat", () => {
    const { engine, handle } = fakeEngine();
    const viewer = new PanoramaViewer(container, "/p.jpg", { engine });
    viewer.init();
    container.dispatchEvent(new Event("mousedown"));

    viewer.destroy();
    viewer.destroy();

    expect(handle.dispose).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
    container.dispatchEvent(new Event("mousedown"));
    expect(handle.disableAutoRotate).toHaveBeenCalledTimes(1);
  });

  it("destroy before init is a no-op, with or without a container", () => {
    const { engine, handle } = fakeEngine();
    const viewer = new PanoramaViewer(container, "/p.jpg", { engine });
    const detached = new PanoramaViewer(null, "/p.jpg", { engine });

    expect(() => viewer.destroy()).not.toThrow();
    expect(() => detached.destroy()).not.toThrow();

    expect(engine.createViewer).not.toHaveBeenCalled();
    expect(handle.dispose).not.toHaveBeenCalled();
    expect(viewer.isActive).toBe(false);
    expect(viewer.hasPendingResume).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});
