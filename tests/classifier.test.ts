import { describe, expect, it } from "vitest";
import { classifyElements } from "../src/capture/classifier";
import { RecordingLogger, canvas, dataUrlFor, img } from "./helpers/stubs";

describe("content classifier", () => {
  it("keeps canvases as inline raster candidates in surface order", () => {
    const logger = new RecordingLogger();
    const candidates = classifyElements([canvas("b"), canvas("a")], logger);

    expect(candidates.map((candidate) => candidate.fingerprint)).toEqual([dataUrlFor("b"), dataUrlFor("a")]);
    expect(candidates[0]).toEqual({
      fingerprint: dataUrlFor("b"),
      payload: { type: "inline", dataUrl: dataUrlFor("b") },
      width: 1200,
      height: 1600,
      kind: "raster"
    });
  });

  it("drops icons below the floor on either axis", () => {
    const candidates = classifyElements(
      [canvas("wide-strip", 1200, 99), img("https://viewer.test/icon.png", 99, 400), canvas("page", 100, 100)],
      new RecordingLogger()
    );

    expect(candidates.map((candidate) => candidate.fingerprint)).toEqual([dataUrlFor("page")]);
  });

  it("skips a canvas whose data could not be extracted and logs it", () => {
    const logger = new RecordingLogger();
    const candidates = classifyElements(
      [
        canvas("one"),
        { tag: "canvas", width: 1200, height: 1600, extractionError: "The canvas has been tainted" },
        canvas("three")
      ],
      logger
    );

    expect(candidates).toHaveLength(2);
    expect(logger.lines).toEqual(["warn: Skipping canvas 1200x1600: The canvas has been tainted"]);
  });

  it("skips a blank canvas export", () => {
    const logger = new RecordingLogger();
    const candidates = classifyElements([{ tag: "canvas", width: 900, height: 900, dataUrl: "data:," }], logger);

    expect(candidates).toEqual([]);
    expect(logger.lines).toEqual(["warn: Skipping canvas 900x900: no image data"]);
  });

  it("treats img sources as references unless they are inline data", () => {
    const candidates = classifyElements(
      [img("https://viewer.test/p1.jpg"), img(""), img(dataUrlFor("inline", "image/jpeg"))],
      new RecordingLogger()
    );

    expect(candidates.map((candidate) => candidate.payload)).toEqual([
      { type: "reference", url: "https://viewer.test/p1.jpg" },
      { type: "inline", dataUrl: dataUrlFor("inline", "image/jpeg") }
    ]);
    expect(candidates.every((candidate) => candidate.kind === "image")).toBe(true);
  });
});
