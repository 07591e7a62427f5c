import { promises as fs } from "fs";
import path from "path";
import sharp from "sharp";
import { beforeEach, describe, expect, it } from "vitest";
import { runValidate } from "../src/commands/validate";
import { imagesToPdf } from "../src/assemble/pdf";
import { buildCaptureManifest, writeCaptureManifest } from "../src/io/captureManifest";
import { SavedArtifact } from "../src/types/pageCandidate";
import { sha256 } from "../src/utils/hash";
import { writeJson } from "../src/utils/fs";
import { RecordingLogger, makeTempDir } from "./helpers/stubs";

async function savePage(pagesDir: string, index: number): Promise<SavedArtifact> {
  const body = await sharp({
    create: { width: 30, height: 40, channels: 3, background: { r: 255, g: 255, b: 255 } }
  })
    .png()
    .toBuffer();
  const filePath = path.join(pagesDir, `page_00${index}.png`);
  await fs.writeFile(filePath, body);
  return { index, path: filePath, kind: "raster", width: 30, height: 40, sha256: sha256(body), bytes: body.length };
}

describe("capture run validation", () => {
  let outDir: string;
  let pagesDir: string;

  beforeEach(async () => {
    outDir = await makeTempDir();
    pagesDir = path.join(outDir, "pages");
    await fs.mkdir(pagesDir);
  });

  async function writeRun(artifacts: SavedArtifact[], pdfImages: string[]): Promise<void> {
    const pdfFile = path.join(outDir, "20261018.pdf");
    const written = await imagesToPdf(pdfImages, pdfFile, new RecordingLogger());
    const manifest = buildCaptureManifest({
      viewerConfigPath: "/etc/viewer.json",
      startedAt: "2026-10-18T06:00:00Z",
      endedAt: "2026-10-18T06:05:00Z",
      stopReason: "end-of-document",
      steps: 2,
      navigations: 1,
      pagesDir,
      artifacts,
      pdfPath: written ? pdfFile : null
    });
    await writeCaptureManifest(outDir, manifest);
  }

  it("accepts a run whose PDF matches its pages", async () => {
    const artifacts = [await savePage(pagesDir, 1), await savePage(pagesDir, 2)];
    await writeRun(artifacts, artifacts.map((artifact) => artifact.path));

    await expect(runValidate({ runDir: outDir })).resolves.toEqual({ pages: 2, pdfPages: 2 });
  });

  it("rejects a PDF with a different page count", async () => {
    const artifacts = [await savePage(pagesDir, 1), await savePage(pagesDir, 2)];
    await writeRun(artifacts, [artifacts[0].path]);

    await expect(runValidate({ runDir: outDir })).rejects.toThrow("PDF has 1 pages, manifest lists 2");
  });

  it("rejects a missing page file", async () => {
    const artifacts = [await savePage(pagesDir, 1)];
    await writeRun(artifacts, [artifacts[0].path]);
    await fs.rm(artifacts[0].path);

    await expect(runValidate({ runDir: outDir })).rejects.toThrow("Page 1 is missing");
  });

  it("rejects a manifest that does not match the schema", async () => {
    await writeJson(path.join(outDir, "capture_manifest.json"), { schema_version: "2.0" });

    await expect(runValidate({ runDir: outDir })).rejects.toThrow(
      "capture_manifest.json failed schema validation"
    );
  });

  it("accepts an empty run without a PDF", async () => {
    await writeRun([], []);

    await expect(runValidate({ runDir: outDir })).resolves.toEqual({ pages: 0, pdfPages: null });
  });
});
