import { Clock } from "../utils/clock";
import { Logger, errorMessage } from "../utils/logger";
import { classifyElements, meetsPageWidth } from "./classifier";
import { ViewerSurface } from "./surface";

export interface AdvanceOptions {
  maxAttempts: number;
  settleMs: number;
  minPageWidth: number;
  iconFloorPx: number;
  nextKey: string;
  logger: Logger;
  clock: Clock;
}

async function pressFallbackKey(surface: ViewerSurface, key: string, logger: Logger): Promise<void> {
  try {
    await surface.pressKey(key);
  } catch (error) {
    logger.warn(`Pressing ${key} failed: ${errorMessage(error)}`);
  }
}

async function triggerAdvance(surface: ViewerSurface, options: AdvanceOptions): Promise<void> {
  const { logger } = options;
  try {
    if (await surface.isNextControlUsable()) {
      logger.info("Clicking next-page control...");
      await surface.clickNext();
      return;
    }
    logger.info(`Next-page control not usable; pressing ${options.nextKey}...`);
  } catch (error) {
    logger.warn(`Next-page control failed: ${errorMessage(error)}; pressing ${options.nextKey}...`);
  }
  await pressFallbackKey(surface, options.nextKey, logger);
}

async function revealsUnseenPage(
  surface: ViewerSurface,
  seen: ReadonlySet<string>,
  options: AdvanceOptions
): Promise<boolean> {
  try {
    const candidates = classifyElements(await surface.snapshot(), options.logger, options.iconFloorPx);
    return candidates.some(
      (candidate) => meetsPageWidth(candidate, options.minPageWidth) && !seen.has(candidate.fingerprint)
    );
  } catch (error) {
    options.logger.warn(`Checking for new pages failed: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Tries to move the viewer forward. Success means an unseen full-size page is
 * on the surface afterwards, whatever happened to the click or key press.
 * `false` marks the end of the document.
 */
export async function advanceToUnseenPage(
  surface: ViewerSurface,
  seen: ReadonlySet<string>,
  options: AdvanceOptions
): Promise<boolean> {
  const { logger } = options;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    logger.info(`Attempting to go to next page (attempt ${attempt}/${options.maxAttempts})`);
    await triggerAdvance(surface, options);
    await options.clock.sleep(options.settleMs);

    if (await revealsUnseenPage(surface, seen, options)) {
      logger.info("New page image detected after navigation.");
      return true;
    }
    logger.info("No new page images detected after this attempt.");
  }

  logger.info("No new page images after navigation attempts; assuming end.");
  return false;
}
