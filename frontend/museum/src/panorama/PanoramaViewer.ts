// frontend/museum/src/panorama/PanoramaViewer.ts
import { globalEngine, type PanoramaEngine, type PanoramaHandle } from "./engine";

export type PanoramaViewerOptions = {
  /** Angular speed passed to the library. */
  autoRotateSpeed?: number;
  /** Idle time after an interaction before auto-rotate comes back. */
  resumeDelayMs?: number;
  /** Defaults to the global panolens library. */
  engine?: PanoramaEngine | null;
};

export const DEFAULT_AUTOROTATE_SPEED = 0.3;
export const DEFAULT_RESUME_DELAY_MS = 5000;
export const ERROR_CLASS = "panorama-error";

const INTERACTION_EVENTS = ["pointerdown", "mousedown", "touchstart"] as const;

/**
 * Auto-rotating 360° panorama bound to one container.
 *
 * Any press on the container stops the rotation; it resumes after
 * `resumeDelayMs` of quiet. Only one resume timer is ever pending.
 */
export class PanoramaViewer {
  private readonly autoRotateSpeed: number;
  private readonly resumeDelayMs: number;
  private readonly engine: PanoramaEngine | null;

  private viewer: PanoramaHandle | null = null;
  private resumeTimer: ReturnType<typeof setTimeout> | null = null;
  private listening = false;

  constructor(
    private readonly container: HTMLElement | null,
    private readonly imageUrl: string,
    options: PanoramaViewerOptions = {}
  ) {
    this.autoRotateSpeed = options.autoRotateSpeed ?? DEFAULT_AUTOROTATE_SPEED;
    this.resumeDelayMs = options.resumeDelayMs ?? DEFAULT_RESUME_DELAY_MS;
    this.engine = options.engine === undefined ? globalEngine() : options.engine;
  }

  get isActive(): boolean {
    return this.viewer !== null;
  }

  get hasPendingResume(): boolean {
    return this.resumeTimer !== null;
  }

  /** Returns whether a viewer is running afterwards. Never throws. */
  init(): boolean {
    if (!this.container) return false;
    if (this.viewer) return true;

    try {
      if (!this.engine) throw new Error("Panorama library is not loaded");
      const viewer = this.engine.createViewer({
        container: this.container,
        autoRotate: true,
        autoRotateSpeed: this.autoRotateSpeed,
        autoRotateActivationDuration: this.resumeDelayMs,
        controlBar: false,
      });
      viewer.add(this.engine.createImagePanorama(this.imageUrl));
      this.viewer = viewer;
    } catch (err) {
      this.showError(err);
      return false;
    }

    for (const type of INTERACTION_EVENTS) {
      this.container.addEventListener(type, this.onInteraction, { passive: true });
    }
    this.listening = true;
    return true;
  }

  /** Stop rotating now; resume after the configured delay. */
  private readonly onInteraction = (): void => {
    if (!this.viewer) return;
    this.viewer.disableAutoRotate();
    this.clearResumeTimer();
    this.resumeTimer = setTimeout(() => {
      this.resumeTimer = null;
      this.viewer?.enableAutoRotate();
    }, this.resumeDelayMs);
  };

  private clearResumeTimer(): void {
    if (this.resumeTimer !== null) {
      clearTimeout(this.resumeTimer);
      this.resumeTimer = null;
    }
  }

  private showError(err: unknown): void {
    if (!this.container) return;
    const message = err instanceof Error ? err.message : String(err);
    console.error("[panorama] failed to start:", message);

    const box = this.container.ownerDocument.createElement("p");
    box.className = ERROR_CLASS;
    box.setAttribute("role", "alert");
    box.textContent = "The panorama could not be displayed.";
    this.container.replaceChildren(box);
  }

  destroy(): void {
    this.clearResumeTimer();
    if (this.container && this.listening) {
      for (const type of INTERACTION_EVENTS) {
        this.container.removeEventListener(type, this.onInteraction);
      }
      this.listening = false;
    }
    if (this.viewer) {
      const viewer = this.viewer;
      this.viewer = null;
      viewer.dispose();
    }
  }
}
