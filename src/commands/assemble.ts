import path from "path";
import { imagesToPdf } from "../assemble/pdf";
import { listPageFiles } from "../io/pageFiles";
import { pdfPath } from "../io/paths";
import { localDateStamp } from "../utils/time";
import { consoleLogger } from "../utils/logger";

export interface AssembleOptions {
  pagesDir: string;
  outPath?: string;
}

export async function runAssemble(options: AssembleOptions): Promise<void> {
  const pagesDir = path.resolve(options.pagesDir);
  const outPath = options.outPath
    ? path.resolve(options.outPath)
    : pdfPath(path.dirname(pagesDir), localDateStamp());

  const pages = await listPageFiles(pagesDir);
  const written = await imagesToPdf(pages, outPath, consoleLogger);
  if (!written) {
    throw new Error(`No page images found in ${pagesDir}`);
  }
}
