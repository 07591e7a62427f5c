import type { RawSurfaceElement } from "../types/pageCandidate";

export interface InspectArgs {
  rootSelector: string;
  iconFloorPx: number;
}

/**
 * Runs inside the viewer page via `page.evaluate`, so it must not reference
 * anything outside its own body.
 */
export function inspectPageImages(args: InspectArgs): RawSurfaceElement[] {
  const root = document.querySelector(args.rootSelector);
  if (!root) return [];

  const result: RawSurfaceElement[] = [];
  for (const el of Array.from(root.querySelectorAll("canvas, img"))) {
    const rect = el.getBoundingClientRect();

    if (el instanceof HTMLCanvasElement) {
      const width = el.width || rect.width || 0;
      const height = el.height || rect.height || 0;
      if (width < args.iconFloorPx || height < args.iconFloorPx) continue;
      try {
        result.push({ tag: "canvas", width, height, dataUrl: el.toDataURL("image/png") });
      } catch (error) {
        result.push({
          tag: "canvas",
          width,
          height,
          extractionError: error instanceof Error ? error.message : String(error)
        });
      }
    } else if (el instanceof HTMLImageElement) {
      const width = el.width || el.naturalWidth || rect.width || 0;
      const height = el.height || el.naturalHeight || rect.height || 0;
      if (width < args.iconFloorPx || height < args.iconFloorPx) continue;
      result.push({ tag: "img", width, height, src: el.src || null });
    }
  }
  return result;
}
