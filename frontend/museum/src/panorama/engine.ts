// frontend/museum/src/panorama/engine.ts

/**
 * The slice of the panorama library the viewer wrapper uses.
 *
 * The page loads three.js and panolens as plain scripts (collected into
 * /static/vendor), so the library is reached through `window.PANOLENS`
 * rather than imported. Tests pass their own engine.
 */

export type ViewerOptions = {
  container: HTMLElement;
  autoRotate: boolean;
  autoRotateSpeed: number;
  autoRotateActivationDuration: number;
  controlBar: boolean;
};

export interface PanoramaHandle {
  add(panorama: unknown): void;
  enableAutoRotate(): void;
  disableAutoRotate(): void;
  dispose(): void;
}

export interface PanoramaEngine {
  createViewer(options: ViewerOptions): PanoramaHandle;
  createImagePanorama(url: string): unknown;
}

/** panolens' own method names (sic: "AutoRate"). */
interface PanolensViewer {
  add(object: unknown): void;
  enableAutoRate(): void;
  disableAutoRate(): void;
  dispose(): void;
}

export interface PanolensGlobal {
  Viewer: new (options: ViewerOptions) => PanolensViewer;
  ImagePanorama: new (url: string) => unknown;
}

declare global {
  interface Window {
    PANOLENS?: PanolensGlobal;
  }
}

export function panolensEngine(lib: PanolensGlobal): PanoramaEngine {
  return {
    createViewer(options) {
      const viewer = new lib.Viewer(options);
      return {
        add: (p) => viewer.add(p),
        enableAutoRotate: () => viewer.enableAutoRate(),
        disableAutoRotate: () => viewer.disableAutoRate(),
        dispose: () => viewer.dispose(),
      };
    },
    createImagePanorama: (url) => new lib.ImagePanorama(url),
  };
}

/** The engine behind `window.PANOLENS`, or null when the script never loaded. */
export function globalEngine(): PanoramaEngine | null {
  if (typeof window === "undefined" || !window.PANOLENS) return null;
  return panolensEngine(window.PANOLENS);
}
