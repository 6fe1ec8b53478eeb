/**
 * Local digest archive
 * Writes each rendered digest to <DATA_DIR>/digests/digest_YYYY-MM-DD.md
 */

import fs from "fs";
import path from "path";
import { logger } from "../logger";

const DIGEST_FILE_PATTERN = /^digest_\d{4}-\d{2}-\d{2}\.md$/;

export interface DigestArchive {
  write(date: string, markdown: string): Promise<string>;
  list(): Promise<string[]>;
  read(fileName: string): Promise<string | null>;
}

export function digestFileName(date: string): string {
  return `digest_${date}.md`;
}

/**
 * File-system archive. A later run on the same day overwrites that day's file.
 */
export class LocalDigestArchive implements DigestArchive {
  constructor(private readonly directory: string) {}

  async write(date: string, markdown: string): Promise<string> {
    try {
      await fs.promises.mkdir(this.directory, { recursive: true });
      const filePath = path.join(this.directory, digestFileName(date));
      await fs.promises.writeFile(filePath, markdown, "utf-8");
      logger.info("Digest archived", { path: filePath, bytes: Buffer.byteLength(markdown) });
      return filePath;
    } catch (error) {
      logger.error("Failed to archive digest", {
        date,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Archived file names, newest first
   */
  async list(): Promise<string[]> {
    if (!fs.existsSync(this.directory)) {
      return [];
    }
    const entries = await fs.promises.readdir(this.directory);
    return entries.filter((name) => DIGEST_FILE_PATTERN.test(name)).sort().reverse();
  }

  async read(fileName: string): Promise<string | null> {
    if (!DIGEST_FILE_PATTERN.test(fileName)) {
      return null;
    }
    const filePath = path.join(this.directory, fileName);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return fs.promises.readFile(filePath, "utf-8");
  }
}
