import { chromium, Browser, BrowserContext } from "playwright";

export interface Viewport {
  width: number;
  height: number;
}

export const DEFAULT_VIEWPORT: Viewport = { width: 1920, height: 1080 };

export interface LaunchOptions {
  headless?: boolean;
}

export async function launchChromium(options: LaunchOptions = {}): Promise<Browser> {
  return chromium.launch({
    headless: options.headless ?? false,
    args: ["--start-maximized", "--disable-blink-features=AutomationControlled"]
  });
}

/** A fresh incognito context; cookies from the login flow live here. */
export async function newContext(
  browser: Browser,
  viewport: Viewport = DEFAULT_VIEWPORT
): Promise<BrowserContext> {
  return browser.newContext({ viewport });
}
