import { promises as fs } from "fs";
import path from "path";
import { PAGE_FILE_PATTERN } from "./paths";

/** Page image files in `pagesDir`, ordered by their numeric index. */
export async function listPageFiles(pagesDir: string): Promise<string[]> {
  const entries = await fs.readdir(pagesDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => ({ name: entry.name, match: PAGE_FILE_PATTERN.exec(entry.name) }))
    .flatMap(({ name, match }) => (match ? [{ name, index: Number(match[1]) }] : []))
    .sort((a, b) => a.index - b.index)
    .map(({ name }) => path.join(pagesDir, name));
}
