import path from "path";

export const PAGE_FILE_PATTERN = /^page_(\d+)\.(png|jpe?g)$/i;

export function pageFileName(index: number, extension: string): string {
  return `page_${String(index).padStart(3, "0")}${extension}`;
}

export function pagePath(pagesDir: string, index: number, extension: string): string {
  return path.join(pagesDir, pageFileName(index, extension));
}

export function pdfPath(outDir: string, stamp: string): string {
  return path.join(outDir, `${stamp}.pdf`);
}

export function captureManifestPath(outDir: string): string {
  return path.join(outDir, "capture_manifest.json");
}
