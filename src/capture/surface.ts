import { RawSurfaceElement } from "../types/pageCandidate";

/** Reads the `<canvas>`/`<img>` elements currently rendered by the viewer. */
export interface SurfaceInspector {
  snapshot(): Promise<RawSurfaceElement[]>;
  /** Bounded wait for the document to be parsed; never throws. */
  awaitLoaded(timeoutMs: number): Promise<void>;
  /** Bounded wait for network activity to settle; never throws. */
  awaitIdle(timeoutMs: number): Promise<void>;
}

export interface SurfaceNavigator {
  isNextControlUsable(): Promise<boolean>;
  clickNext(): Promise<void>;
  pressKey(key: string): Promise<void>;
}

export type ViewerSurface = SurfaceInspector & SurfaceNavigator;

export interface FetchedAsset {
  ok: boolean;
  status: number;
  contentType: string | null;
  body: Buffer;
}

/** Retrieves a referenced page image through the authenticated browsing session. */
export interface AssetFetcher {
  fetch(url: string): Promise<FetchedAsset>;
}

const TRANSIENT_PATTERNS = [/Execution context was destroyed/i, /Most likely because of a navigation/i];

export function isTransientSurfaceError(error: unknown): boolean {
  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}
