// frontend/museum/src/reveal/textFade.ts

export const FADE_CLASS = "fade-out";
export const DEFAULT_FADE_DELAY_MS = 5000;

/**
 * Hides the hero heading/paragraph a while after load so the panorama
 * behind them is unobstructed. Missing elements are skipped.
 */
export class TextFade {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private fired = false;
  private readonly elements: Element[];

  constructor(
    elements: ReadonlyArray<Element | null>,
    private readonly delayMs: number = DEFAULT_FADE_DELAY_MS
  ) {
    this.elements = elements.filter((el): el is Element => el !== null);
  }

  /** True once the scheduled fade has run. */
  get hasFired(): boolean {
    return this.fired;
  }

  start(): this {
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.fired = true;
      this.fadeOut();
    }, this.delayMs);
    return this;
  }

  fadeOut(): void {
    for (const el of this.elements) el.classList.add(FADE_CLASS);
  }

  fadeIn(): void {
    for (const el of this.elements) el.classList.remove(FADE_CLASS);
  }

  cancel(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
