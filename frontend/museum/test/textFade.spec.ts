// @vitest-environment jsdom
// frontend/museum/test/textFade.spec.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FADE_CLASS, TextFade } from "../src/reveal/textFade";

function byId(id: string): HTMLElement | null {
  return document.getElementById(id);
}

beforeEach(() => {
  vi.useFakeTimers();
  document.body.innerHTML = `<h1 id="heading">Hall</h1><p id="paragraph">Look around</p>`;
});

afterEach(() => {
  vi.useRealTimers();
});

describe("TextFade", () => {
  it("fades both elements out once the delay elapses", () => {
    const fade = new TextFade([byId("heading"), byId("paragraph")], 5000).start();

    vi.advanceTimersByTime(4999);
    expect(fade.hasFired).toBe(false);
    expect(byId("heading")?.classList.contains(FADE_CLASS)).toBe(false);

    vi.advanceTimersByTime(1);
    expect(fade.hasFired).toBe(true);
    expect(byId("heading")?.classList.contains(FADE_CLASS)).toBe(true);
    expect(byId("paragraph")?.classList.contains(FADE_CLASS)).toBe(true);
  });

  it("uses a 5000 ms default delay", () => {
    const fade = new TextFade([byId("heading")]).start();
    vi.advanceTimersByTime(5000);
    expect(fade.hasFired).toBe(true);
  });

  it("fadeIn brings the text back", () => {
    const fade = new TextFade([byId("heading"), byId("paragraph")]);
    fade.fadeOut();
    fade.fadeIn();
    expect(byId("heading")?.className).toBe("");
    expect(byId("paragraph")?.className).toBe("");
  });

  it("cancel stops a pending fade", () => {
    const fade = new TextFade([byId("heading")], 1000).start();
    fade.cancel();
    vi.advanceTimersByTime(2000);
    expect(fade.hasFired).toBe(false);
    expect(byId("heading")?.classList.contains(FADE_CLASS)).toBe(false);
  });

  it("skips missing elements", () => {
    const fade = new TextFade([null, byId("paragraph")], 10).start();
    vi.advanceTimersByTime(10);
    expect(fade.hasFired).toBe(true);
    expect(byId("paragraph")?.classList.contains(FADE_CLASS)).toBe(true);
  });

  it("restarting keeps a single pending timer", () => {
    const fade = new TextFade([byId("heading")], 1000);
    fade.start();
    fade.start();
    expect(vi.getTimerCount()).toBe(1);
  });
});
