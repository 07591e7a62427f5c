export type CaptureStopReason = "no-content" | "end-of-document";

export interface CaptureManifestPage {
  index: number;
  file: string;
  kind: "raster" | "image";
  width: number;
  height: number;
  sha256: string;
  bytes: number;
}

export interface CaptureManifest {
  schema_version: "1.0";
  started_at: string;
  ended_at: string;
  viewer_config_path: string;
  stop_reason: CaptureStopReason;
  steps: number;
  navigations: number;
  pages_dir: string;
  pages: CaptureManifestPage[];
  pdf_path: string | null;
}
