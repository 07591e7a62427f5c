import { PageCandidate } from "../types/pageCandidate";
import { Clock } from "../utils/clock";
import { Logger, errorMessage } from "../utils/logger";
import { classifyElements, meetsPageWidth } from "./classifier";
import { SurfaceInspector, isTransientSurfaceError } from "./surface";

export interface StabilizeOptions {
  minPageWidth: number;
  timeoutMs: number;
  pollIntervalMs: number;
  loadStateTimeoutMs: number;
  iconFloorPx: number;
  logger: Logger;
  clock: Clock;
}

/**
 * Samples the surface until it shows at least one full-size page.
 * Low-resolution placeholders are waited out rather than accepted.
 * Gives up with an empty result once `timeoutMs` has elapsed, or at once on a
 * non-transient inspection failure.
 */
export async function pollForPages(
  inspector: SurfaceInspector,
  options: StabilizeOptions
): Promise<PageCandidate[]> {
  const { logger, clock } = options;
  const start = clock.now();
  const timedOut = () => clock.now() - start > options.timeoutMs;

  for (;;) {
    await inspector.awaitLoaded(options.loadStateTimeoutMs);

    let candidates: PageCandidate[];
    try {
      const elements = await inspector.snapshot();
      candidates = classifyElements(elements, logger, options.iconFloorPx);
    } catch (error) {
      logger.warn(`Surface inspection failed: ${errorMessage(error)}`);
      if (!isTransientSurfaceError(error)) {
        return [];
      }
      if (timedOut()) {
        logger.warn("Gave up waiting for a stable surface.");
        return [];
      }
      logger.info("Surface still navigating; waiting and retrying...");
      await clock.sleep(options.pollIntervalMs);
      continue;
    }

    if (candidates.length) {
      const pages = candidates.filter((candidate) => meetsPageWidth(candidate, options.minPageWidth));
      if (pages.length) {
        logger.info(`Found ${pages.length} page-like images (width >= ${options.minPageWidth}).`);
        return pages;
      }
      logger.info("Only small images found, waiting for hi-res pages...");
    } else {
      logger.info("No page images yet, waiting...");
    }

    if (timedOut()) {
      logger.warn("Timeout waiting for hi-res pages.");
      return [];
    }
    await clock.sleep(options.pollIntervalMs);
  }
}
