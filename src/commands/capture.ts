import path from "path";
import { loadViewerConfig, readCredentials } from "../config/loadViewer";
import { CaptureConfigInput, resolveCaptureConfig } from "../config/captureConfig";
import { launchChromium, newContext } from "../capture/playwright";
import { PlaywrightAssetFetcher, PlaywrightSurface } from "../capture/playwrightSurface";
import { CaptureLoop } from "../capture/captureLoop";
import { openViewer } from "../viewer/session";
import { imagesToPdf } from "../assemble/pdf";
import { buildCaptureManifest, writeCaptureManifest } from "../io/captureManifest";
import { pdfPath } from "../io/paths";
import { ensureDir } from "../utils/fs";
import { localDateStamp, nowUtcIsoSeconds } from "../utils/time";
import { consoleLogger } from "../utils/logger";

export interface CaptureOptions {
  viewerPath: string;
  outDir: string;
  pagesDir?: string;
  usernameEnv: string;
  passwordEnv: string;
  headless: boolean;
  tuning: CaptureConfigInput;
}

export async function runCapture(options: CaptureOptions): Promise<void> {
  const logger = consoleLogger;
  const viewerPath = path.resolve(options.viewerPath);
  const viewer = await loadViewerConfig(viewerPath);
  const credentials = readCredentials(options.usernameEnv, options.passwordEnv);
  const config = resolveCaptureConfig(options.tuning);

  const outDir = path.resolve(options.outDir);
  const pagesDir = path.resolve(options.pagesDir ?? path.join(outDir, "pages"));
  await ensureDir(pagesDir);

  // Named from the computer's date at the start of the run.
  const targetPdf = pdfPath(outDir, localDateStamp());
  logger.info(`PDF will be saved as: ${path.basename(targetPdf)}`);

  const startedAt = nowUtcIsoSeconds();
  const browser = await launchChromium({ headless: options.headless });
  try {
    const context = await newContext(browser, viewer.viewport);
    const page = await openViewer(context, viewer, credentials, logger);

    const loop = new CaptureLoop(
      {
        surface: new PlaywrightSurface(page, {
          rootSelector: viewer.root_selector,
          nextPageSelector: viewer.next_page_selector,
          iconFloorPx: config.iconFloorPx
        }),
        fetcher: new PlaywrightAssetFetcher(context),
        pagesDir,
        logger
      },
      config
    );
    const result = await loop.run();

    const written = await imagesToPdf(
      result.savedArtifacts.map((artifact) => artifact.path),
      targetPdf,
      logger
    );

    const manifest = buildCaptureManifest({
      viewerConfigPath: viewerPath,
      startedAt,
      endedAt: nowUtcIsoSeconds(),
      stopReason: result.stopReason,
      steps: result.steps,
      navigations: result.navigations,
      pagesDir,
      artifacts: result.savedArtifacts,
      pdfPath: written ? targetPdf : null
    });
    const manifestPath = await writeCaptureManifest(outDir, manifest);
    logger.info(`Wrote capture manifest to ${manifestPath}`);
  } finally {
    await browser.close().catch(() => undefined);
  }
}
