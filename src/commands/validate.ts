import path from "path";
import { countPdfPages } from "../assemble/pdf";
import { captureManifestPath } from "../io/paths";
import { pathExists, readJson } from "../utils/fs";
import { assertValidSchema, getManifestValidator } from "../validation/jsonSchema";

export interface ValidateOptions {
  runDir: string;
}

export interface ValidateReport {
  pages: number;
  pdfPages: number | null;
}

export async function runValidate(options: ValidateOptions): Promise<ValidateReport> {
  const manifestPath = captureManifestPath(path.resolve(options.runDir));
  if (!(await pathExists(manifestPath))) {
    throw new Error(`Capture manifest not found in ${options.runDir}`);
  }

  const manifest = await readJson(manifestPath);
  assertValidSchema(getManifestValidator(), manifest, "capture_manifest.json");

  for (const page of manifest.pages) {
    const pageFile = path.join(manifest.pages_dir, page.file);
    if (!(await pathExists(pageFile))) {
      throw new Error(`Page ${page.index} is missing: ${pageFile}`);
    }
  }

  if (manifest.pdf_path === null) {
    if (manifest.pages.length) {
      throw new Error(`Manifest lists ${manifest.pages.length} pages but no PDF`);
    }
    return { pages: 0, pdfPages: null };
  }

  const pdfPages = await countPdfPages(manifest.pdf_path);
  if (pdfPages !== manifest.pages.length) {
    throw new Error(`PDF has ${pdfPages} pages, manifest lists ${manifest.pages.length}`);
  }
  return { pages: manifest.pages.length, pdfPages };
}
