import * as fs from "node:fs/promises";
import * as path from "node:path";

import { logger } from "@/lib/logging/logger";

/**
 * Upload storage rooted at a single directory.
 * Stored paths are relative to the root so rows survive a root move.
 */
export class FileStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolve(relativePath: string): string {
    const absolute = path.resolve(this.root, relativePath);
    if (absolute !== this.root && !absolute.startsWith(this.root + path.sep)) {
      throw new Error(`Path escapes upload root: ${relativePath}`);
    }
    return absolute;
  }

  async save(
    segments: readonly string[],
    fileName: string,
    bytes: Uint8Array,
  ): Promise<string> {
    const relativePath = path.join(...segments, fileName);
    const absolute = this.resolve(relativePath);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, bytes);
    return relativePath;
  }

  async exists(relativePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.resolve(relativePath));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async read(relativePath: string): Promise<Buffer> {
    return fs.readFile(this.resolve(relativePath));
  }

  /**
   * Delete a stored file and prune parent directories left empty,
   * stopping at the store root.
   */
  async remove(relativePath: string): Promise<void> {
    const absolute = this.resolve(relativePath);
    await fs.rm(absolute, { force: true });

    let dir = path.dirname(absolute);
    while (dir !== this.root && dir.startsWith(this.root + path.sep)) {
      const entries = await fs.readdir(dir).catch(() => null);
      if (entries === null || entries.length > 0) break;
      try {
        await fs.rmdir(dir);
      } catch (error) {
        logger.debug({ dir, error: String(error) }, "Directory not pruned");
        break;
      }
      dir = path.dirname(dir);
    }
  }
}

export function extensionFor(mimeType: string, fileName?: string | null): string {
  const fromName = fileName ? path.extname(fileName).toLowerCase() : "";
  if (fromName) return fromName;
  switch (mimeType) {
    case "image/jpeg":
      return ".jpg";
    case "image/png":
      return ".png";
    case "application/pdf":
      return ".pdf";
    default:
      return "";
  }
}
