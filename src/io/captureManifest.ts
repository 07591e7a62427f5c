import path from "path";
import { captureManifestPath } from "./paths";
import { writeJson } from "../utils/fs";
import { CaptureManifest, CaptureStopReason } from "../types/captureManifest";
import { SavedArtifact } from "../types/pageCandidate";

export interface CaptureManifestParams {
  viewerConfigPath: string;
  startedAt: string;
  endedAt: string;
  stopReason: CaptureStopReason;
  steps: number;
  navigations: number;
  pagesDir: string;
  artifacts: readonly SavedArtifact[];
  pdfPath: string | null;
}

export function buildCaptureManifest(params: CaptureManifestParams): CaptureManifest {
  return {
    schema_version: "1.0",
    started_at: params.startedAt,
    ended_at: params.endedAt,
    viewer_config_path: params.viewerConfigPath,
    stop_reason: params.stopReason,
    steps: params.steps,
    navigations: params.navigations,
    pages_dir: params.pagesDir,
    pages: params.artifacts.map((artifact) => ({
      index: artifact.index,
      file: path.basename(artifact.path),
      kind: artifact.kind,
      width: artifact.width,
      height: artifact.height,
      sha256: artifact.sha256,
      bytes: artifact.bytes
    })),
    pdf_path: params.pdfPath
  };
}

export async function writeCaptureManifest(outDir: string, manifest: CaptureManifest): Promise<string> {
  const filePath = captureManifestPath(outDir);
  await writeJson(filePath, manifest);
  return filePath;
}
