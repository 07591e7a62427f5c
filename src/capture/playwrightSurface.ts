import { BrowserContext, Page } from "playwright";
import { RawSurfaceElement } from "../types/pageCandidate";
import { AssetFetcher, FetchedAsset, ViewerSurface } from "./surface";
import { InspectArgs, inspectPageImages } from "./inspectScript";

export interface PlaywrightSurfaceOptions {
  rootSelector: string;
  nextPageSelector: string;
  iconFloorPx: number;
}

export class PlaywrightSurface implements ViewerSurface {
  constructor(
    private readonly page: Page,
    private readonly options: PlaywrightSurfaceOptions
  ) {}

  async snapshot(): Promise<RawSurfaceElement[]> {
    const args: InspectArgs = {
      rootSelector: this.options.rootSelector,
      iconFloorPx: this.options.iconFloorPx
    };
    return this.page.evaluate(inspectPageImages, args);
  }

  async awaitLoaded(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState("domcontentloaded", { timeout: timeoutMs }).catch(() => undefined);
  }

  async awaitIdle(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState("networkidle", { timeout: timeoutMs }).catch(() => undefined);
  }

  async isNextControlUsable(): Promise<boolean> {
    const control = this.page.locator(this.options.nextPageSelector);
    if ((await control.count()) === 0) return false;
    return control.first().isEnabled();
  }

  async clickNext(): Promise<void> {
    await this.page.locator(this.options.nextPageSelector).first().click();
  }

  async pressKey(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }
}

/** Fetches through the context's request API so the viewer's session cookies apply. */
export class PlaywrightAssetFetcher implements AssetFetcher {
  constructor(private readonly context: BrowserContext) {}

  async fetch(url: string): Promise<FetchedAsset> {
    const response = await this.context.request.get(url);
    return {
      ok: response.ok(),
      status: response.status(),
      contentType: response.headers()["content-type"] ?? null,
      body: await response.body()
    };
  }
}
