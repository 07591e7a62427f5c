import { promises as fs } from "fs";
import { PDFDocument } from "pdf-lib";
import sharp from "sharp";
import { writeBinary } from "../utils/fs";
import { Logger, consoleLogger } from "../utils/logger";

async function toRgbJpeg(imagePath: string): Promise<Buffer> {
  const input = await fs.readFile(imagePath);
  return sharp(input).flatten({ background: "#ffffff" }).jpeg({ quality: 92 }).toBuffer();
}

/**
 * Writes one PDF page per image, in the given order, each sized to the
 * image's pixel dimensions. Returns false when there is nothing to write.
 */
export async function imagesToPdf(
  imagePaths: readonly string[],
  outPath: string,
  logger: Logger = consoleLogger
): Promise<boolean> {
  if (!imagePaths.length) {
    logger.warn("No images to convert to PDF.");
    return false;
  }

  logger.info(`Creating PDF from ${imagePaths.length} images...`);
  const doc = await PDFDocument.create();
  for (const imagePath of imagePaths) {
    const image = await doc.embedJpg(await toRgbJpeg(imagePath));
    const page = doc.addPage([image.width, image.height]);
    page.drawImage(image, { x: 0, y: 0, width: image.width, height: image.height });
  }

  await writeBinary(outPath, Buffer.from(await doc.save()));
  logger.info(`Saved PDF to: ${outPath}`);
  return true;
}

export async function countPdfPages(pdfPath: string): Promise<number> {
  const doc = await PDFDocument.load(await fs.readFile(pdfPath));
  return doc.getPageCount();
}
