import { CaptureConfig } from "../config/captureConfig";
import { CaptureStopReason } from "../types/captureManifest";
import { SavedArtifact } from "../types/pageCandidate";
import { Clock, systemClock } from "../utils/clock";
import { Logger, consoleLogger } from "../utils/logger";
import { CaptureSession, persistNewCandidates } from "./ledger";
import { advanceToUnseenPage } from "./navigation";
import { pollForPages } from "./stabilize";
import { AssetFetcher, ViewerSurface } from "./surface";

export interface CaptureLoopDeps {
  surface: ViewerSurface;
  fetcher: AssetFetcher;
  pagesDir: string;
  logger?: Logger;
  clock?: Clock;
}

export interface CaptureResult {
  savedArtifacts: SavedArtifact[];
  seenCount: number;
  steps: number;
  navigations: number;
  stopReason: CaptureStopReason;
}

export class CaptureLoop {
  private readonly logger: Logger;
  private readonly clock: Clock;
  readonly session = new CaptureSession();

  constructor(
    private readonly deps: CaptureLoopDeps,
    private readonly config: CaptureConfig
  ) {
    this.logger = deps.logger ?? consoleLogger;
    this.clock = deps.clock ?? systemClock;
  }

  async run(): Promise<CaptureResult> {
    const { surface } = this.deps;
    const { config, logger, session } = this;
    let steps = 0;
    let navigations = 0;
    let stopReason: CaptureStopReason;

    for (;;) {
      steps += 1;
      logger.info(`Capturing step ${steps}, pages saved so far: ${session.savedArtifacts.length}`);
      await surface.awaitIdle(config.idleTimeoutMs);

      const candidates = await pollForPages(surface, {
        minPageWidth: config.minPageWidth,
        timeoutMs: config.stabilizationTimeoutMs,
        pollIntervalMs: config.pollIntervalMs,
        loadStateTimeoutMs: config.loadStateTimeoutMs,
        iconFloorPx: config.iconFloorPx,
        logger,
        clock: this.clock
      });
      if (!candidates.length) {
        logger.warn("No page-like images at this step; stopping.");
        stopReason = "no-content";
        break;
      }

      const newCount = await persistNewCandidates(session, candidates, {
        pagesDir: this.deps.pagesDir,
        fetcher: this.deps.fetcher,
        logger
      });
      logger.info(`New pages this step: ${newCount}`);

      // Re-checked by the next capture step; both checks are intentional.
      const advanced = await advanceToUnseenPage(surface, session.seenFingerprints, {
        maxAttempts: config.navMaxAttempts,
        settleMs: config.navSettleMs,
        minPageWidth: config.minPageWidth,
        iconFloorPx: config.iconFloorPx,
        nextKey: config.nextKey,
        logger,
        clock: this.clock
      });
      if (!advanced) {
        logger.info("No further pages available; finishing capture.");
        stopReason = "end-of-document";
        break;
      }
      navigations += 1;
    }

    logger.info(
      `Finished capturing. Unique page images seen: ${session.seenFingerprints.size}, saved: ${session.savedArtifacts.length}`
    );
    return {
      savedArtifacts: [...session.savedArtifacts],
      seenCount: session.seenFingerprints.size,
      steps,
      navigations,
      stopReason
    };
  }
}
