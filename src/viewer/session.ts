import { BrowserContext, Page } from "playwright";
import { ViewerConfig } from "../config/viewerConfig";
import { ViewerCredentials } from "../config/loadViewer";
import { Logger, errorMessage } from "../utils/logger";

const LOGIN_LINK_TIMEOUT_MS = 15000;
const FIELD_TIMEOUT_MS = 20000;
const STEP_PAUSE_MS = 2000;

async function clickIfPresent(page: Page, selector: string, label: string, logger: Logger): Promise<boolean> {
  try {
    await page.waitForSelector(selector, { timeout: FIELD_TIMEOUT_MS });
    await page.click(selector);
    await page.waitForTimeout(STEP_PAUSE_MS);
    return true;
  } catch (error) {
    logger.warn(`${label} not clicked (${errorMessage(error)}); continuing anyway.`);
    return false;
  }
}

async function logIn(page: Page, config: ViewerConfig, credentials: ViewerCredentials, logger: Logger): Promise<void> {
  const linkSelector = config.login.link_selector;
  if (linkSelector) {
    try {
      await page.waitForSelector(linkSelector, { timeout: LOGIN_LINK_TIMEOUT_MS });
      logger.info("Clicking login link...");
      await page.click(linkSelector);
      await page.waitForTimeout(STEP_PAUSE_MS);
    } catch (error) {
      logger.warn(`Login link not found (${errorMessage(error)}); assuming the login form is shown.`);
    }
  }

  await page.waitForSelector(config.login.username_selector, { timeout: FIELD_TIMEOUT_MS });
  await page.fill(config.login.username_selector, credentials.username);
  await page.waitForSelector(config.login.password_selector, { timeout: FIELD_TIMEOUT_MS });
  await page.fill(config.login.password_selector, credentials.password);

  logger.info("Submitting login...");
  await page.locator(config.login.password_selector).press("Enter");
  await page.waitForLoadState("networkidle");
  await page.waitForTimeout(2500);
}

/**
 * Logs in, opens the configured paper (the viewer opens in a new tab) and
 * runs the pre-capture clicks. Returns the viewer page.
 */
export async function openViewer(
  context: BrowserContext,
  config: ViewerConfig,
  credentials: ViewerCredentials,
  logger: Logger
): Promise<Page> {
  const page = await context.newPage();
  logger.info(`Opening ${config.start_url}...`);
  await page.goto(config.start_url, { waitUntil: "networkidle" });
  await page.waitForTimeout(1500);

  await logIn(page, config, credentials, logger);

  logger.info("Opening paper, expecting viewer tab...");
  await page.waitForSelector(config.paper_selector, { timeout: FIELD_TIMEOUT_MS });
  const [viewer] = await Promise.all([context.waitForEvent("page"), page.click(config.paper_selector)]);
  await viewer.bringToFront();
  await viewer.waitForLoadState("networkidle");
  await viewer.waitForTimeout(STEP_PAUSE_MS);

  for (const [index, selector] of config.pre_capture_selectors.entries()) {
    await clickIfPresent(viewer, selector, `Pre-capture control ${index + 1}`, logger);
  }

  logger.info("Giving viewer time to load initial pages...");
  await viewer.waitForTimeout(config.pre_capture_settle_ms);
  return viewer;
}
