import { PageCandidate, SavedArtifact } from "../types/pageCandidate";
import { pagePath } from "../io/paths";
import { writeBinary } from "../utils/fs";
import { sha256 } from "../utils/hash";
import { Logger, errorMessage } from "../utils/logger";
import { AssetFetcher } from "./surface";
import { decodeImageDataUrl, defaultExtensionFor, extensionForMediaType } from "./payload";

/** State of one capture run. Only ever grows. */
export class CaptureSession {
  private readonly seen = new Set<string>();
  private readonly saved: SavedArtifact[] = [];
  private index = 1;

  get seenFingerprints(): ReadonlySet<string> {
    return this.seen;
  }

  get savedArtifacts(): readonly SavedArtifact[] {
    return this.saved;
  }

  get nextIndex(): number {
    return this.index;
  }

  hasSeen(fingerprint: string): boolean {
    return this.seen.has(fingerprint);
  }

  markSeen(fingerprint: string): void {
    this.seen.add(fingerprint);
  }

  recordSaved(artifact: SavedArtifact): void {
    this.saved.push(artifact);
    this.index += 1;
  }
}

export interface PersistOptions {
  pagesDir: string;
  fetcher: AssetFetcher;
  logger: Logger;
}

interface ResolvedPayload {
  body: Buffer;
  extension: string;
}

async function resolvePayload(candidate: PageCandidate, fetcher: AssetFetcher): Promise<ResolvedPayload> {
  if (candidate.payload.type === "inline") {
    const decoded = decodeImageDataUrl(candidate.payload.dataUrl);
    return {
      body: decoded.body,
      extension: extensionForMediaType(decoded.mediaType) ?? defaultExtensionFor(candidate.kind)
    };
  }

  const response = await fetcher.fetch(candidate.payload.url);
  if (!response.ok) {
    throw new Error(`Image fetch failed (${response.status}) for ${candidate.payload.url}`);
  }
  if (!response.body.length) {
    throw new Error(`Image fetch returned no data for ${candidate.payload.url}`);
  }
  return {
    body: response.body,
    extension: extensionForMediaType(response.contentType) ?? defaultExtensionFor(candidate.kind)
  };
}

/**
 * Saves every candidate whose fingerprint has not been seen yet and returns how
 * many were new. A candidate that fails to save stays marked as seen.
 */
export async function persistNewCandidates(
  session: CaptureSession,
  candidates: PageCandidate[],
  options: PersistOptions
): Promise<number> {
  const { logger } = options;
  let newCount = 0;

  for (const candidate of candidates) {
    if (session.hasSeen(candidate.fingerprint)) continue;
    session.markSeen(candidate.fingerprint);
    newCount += 1;

    const index = session.nextIndex;
    try {
      const payload = await resolvePayload(candidate, options.fetcher);
      const filePath = pagePath(options.pagesDir, index, payload.extension);
      await writeBinary(filePath, payload.body);
      session.recordSaved({
        index,
        path: filePath,
        kind: candidate.kind,
        width: candidate.width,
        height: candidate.height,
        sha256: sha256(payload.body),
        bytes: payload.body.length
      });
      logger.info(
        `New page image #${index}: ${candidate.kind}, ${candidate.width}x${candidate.height}, saved as ${filePath}`
      );
    } catch (error) {
      logger.warn(`Failed to save page image #${index}: ${errorMessage(error)}; continuing.`);
    }
  }

  return newCount;
}
