import { promises as fs } from "fs";
import path from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { CaptureLoop } from "../src/capture/captureLoop";
import { resolveCaptureConfig } from "../src/config/captureConfig";
import { RawSurfaceElement } from "../src/types/pageCandidate";
import { FakeClock, MapFetcher, RecordingLogger, ScriptedSurface, asset, canvas, img, makeTempDir } from "./helpers/stubs";

const config = resolveCaptureConfig({ stabilizationTimeoutMs: 3000 });

describe("capture loop", () => {
  let pagesDir: string;

  beforeEach(async () => {
    pagesDir = await makeTempDir();
  });

  function loopFor(frames: RawSurfaceElement[][], fetcher = new MapFetcher({})) {
    const surface = new ScriptedSurface(frames);
    const clock = new FakeClock();
    const logger = new RecordingLogger();
    const loop = new CaptureLoop({ surface, fetcher, pagesDir, logger, clock }, config);
    return { loop, surface, clock, logger };
  }

  it("captures a page revealed by navigation and stops when nothing new appears", async () => {
    const first = [canvas("p1"), canvas("p2"), canvas("p3")];
    const { loop, surface } = loopFor([first, [...first, canvas("p4")]]);

    const result = await loop.run();

    expect(result.savedArtifacts.map((artifact) => path.basename(artifact.path))).toEqual([
      "page_001.png",
      "page_002.png",
      "page_003.png",
      "page_004.png"
    ]);
    expect(result).toMatchObject({ seenCount: 4, steps: 2, navigations: 1, stopReason: "end-of-document" });
    expect(surface.clicks).toBe(3);
    expect(await fs.readFile(path.join(pagesDir, "page_004.png"), "utf8")).toBe("p4");
  });

  it("stops on the first step when no page content ever appears", async () => {
    const { loop, surface } = loopFor([[]]);

    const result = await loop.run();

    expect(result).toEqual({
      savedArtifacts: [],
      seenCount: 0,
      steps: 1,
      navigations: 0,
      stopReason: "no-content"
    });
    expect(surface.clicks).toBe(0);
    expect(surface.keyPresses).toEqual([]);
  });

  it("keeps going when one element cannot be extracted", async () => {
    const { loop, logger } = loopFor([
      [
        canvas("p1"),
        { tag: "canvas", width: 1200, height: 1600, extractionError: "The canvas has been tainted" },
        canvas("p3")
      ]
    ]);

    const result = await loop.run();

    expect(result.savedArtifacts.map((artifact) => path.basename(artifact.path))).toEqual([
      "page_001.png",
      "page_002.png"
    ]);
    expect(result.stopReason).toBe("end-of-document");
    expect(logger.lines).toContain("info: New pages this step: 2");
  });

  it("keeps going when one page fails to download", async () => {
    const fetcher = new MapFetcher({
      "https://viewer.test/p1.jpg": asset("p1"),
      "https://viewer.test/p3.jpg": asset("p3")
    });
    const { loop } = loopFor(
      [[img("https://viewer.test/p1.jpg"), img("https://viewer.test/p2.jpg"), img("https://viewer.test/p3.jpg")]],
      fetcher
    );

    const result = await loop.run();

    expect(result.savedArtifacts).toHaveLength(2);
    expect(result.seenCount).toBe(3);
  });

  it("terminates within the navigation attempt budget when nothing new ever appears", async () => {
    const { loop, surface, clock } = loopFor([[canvas("p1"), canvas("p2")]]);

    const result = await loop.run();

    expect(result.savedArtifacts).toHaveLength(2);
    expect(result.steps).toBe(1);
    expect(surface.clicks).toBe(config.navMaxAttempts);
    expect(clock.sleeps).toEqual([config.navSettleMs, config.navSettleMs]);
  });

  it("follows successive navigations until the end", async () => {
    const { loop } = loopFor([[canvas("p1")], [canvas("p2")], [canvas("p2"), canvas("p3")]]);

    const result = await loop.run();

    expect(result.savedArtifacts.map((artifact) => path.basename(artifact.path))).toEqual([
      "page_001.png",
      "page_002.png",
      "page_003.png"
    ]);
    expect(result.navigations).toBe(2);
  });

  it("never shrinks the session while it runs", async () => {
    const { loop, surface } = loopFor([[canvas("a")], [canvas("a"), canvas("b")], [canvas("c")]]);
    const sizes: Array<[number, number]> = [];
    const snapshot = surface.snapshot.bind(surface);
    surface.snapshot = async () => {
      sizes.push([loop.session.seenFingerprints.size, loop.session.savedArtifacts.length]);
      return snapshot();
    };

    await loop.run();

    for (let i = 1; i < sizes.length; i += 1) {
      expect(sizes[i][0]).toBeGreaterThanOrEqual(sizes[i - 1][0]);
      expect(sizes[i][1]).toBeGreaterThanOrEqual(sizes[i - 1][1]);
    }
    expect(sizes[sizes.length - 1]).toEqual([3, 3]);
  });
});
