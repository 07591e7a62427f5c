import { PageCandidate, RawSurfaceElement } from "../types/pageCandidate";
import { Logger } from "../utils/logger";

export const DEFAULT_ICON_FLOOR_PX = 100;

function describe(element: RawSurfaceElement): string {
  return `${element.tag} ${element.width}x${element.height}`;
}

/**
 * Turns raw surface elements into page candidates, keeping surface order.
 * Anything smaller than `iconFloorPx` on either axis is UI chrome.
 */
export function classifyElements(
  elements: RawSurfaceElement[],
  logger: Logger,
  iconFloorPx = DEFAULT_ICON_FLOOR_PX
): PageCandidate[] {
  const candidates: PageCandidate[] = [];

  for (const element of elements) {
    const width = element.width || 0;
    const height = element.height || 0;
    if (width < iconFloorPx || height < iconFloorPx) continue;

    if (element.tag === "canvas") {
      if (element.extractionError) {
        logger.warn(`Skipping ${describe(element)}: ${element.extractionError}`);
        continue;
      }
      const dataUrl = element.dataUrl;
      if (!dataUrl || !dataUrl.startsWith("data:image")) {
        logger.warn(`Skipping ${describe(element)}: no image data`);
        continue;
      }
      candidates.push({
        fingerprint: dataUrl,
        payload: { type: "inline", dataUrl },
        width,
        height,
        kind: "raster"
      });
      continue;
    }

    const src = element.src;
    if (!src) continue;
    candidates.push({
      fingerprint: src,
      payload: src.startsWith("data:image")
        ? { type: "inline", dataUrl: src }
        : { type: "reference", url: src },
      width,
      height,
      kind: "image"
    });
  }

  return candidates;
}

export function meetsPageWidth(candidate: PageCandidate, minPageWidth: number): boolean {
  return candidate.width >= minPageWidth;
}
