import { mkdir, unlink, writeFile } from "fs/promises";
import path from "path";
import { nanoid } from "nanoid";

import { logger } from "../logger";

export type ScreenshotKind = "before" | "after";

export interface UploadedFile {
  originalname: string;
  buffer: Buffer;
}

export interface ScreenshotStorage {
  /** Stores the file and returns its opaque name. */
  save(kind: ScreenshotKind, file: UploadedFile): Promise<string>;
  remove(name: string): Promise<void>;
}

/**
 * Keeps letters, digits, dots, dashes and underscores; drops any directory part.
 */
export function sanitizeFilename(original: string): string {
  const base = original.split(/[\\/]/).pop() ?? "";
  const cleaned = base
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^[._]+/, "");
  return cleaned || "screenshot";
}

export function screenshotName(kind: ScreenshotKind, original: string, id: string = nanoid(10)): string {
  return `${id}_${kind}_${sanitizeFilename(original)}`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class DiskScreenshotStorage implements ScreenshotStorage {
  private ready: Promise<string | undefined> | null = null;

  constructor(private readonly dir: string) {}

  private ensureDir() {
    this.ready ??= mkdir(this.dir, { recursive: true });
    return this.ready;
  }

  private resolve(name: string): string {
    // Names come from save(); refuse anything that would escape the upload dir
    if (name !== path.basename(name)) {
      throw new Error(`Invalid screenshot name: ${name}`);
    }
    return path.join(this.dir, name);
  }

  async save(kind: ScreenshotKind, file: UploadedFile): Promise<string> {
    await this.ensureDir();
    const name = screenshotName(kind, file.originalname);
    await writeFile(this.resolve(name), file.buffer);
    logger.debug({ name, bytes: file.buffer.length }, "Screenshot stored");
    return name;
  }

  async remove(name: string): Promise<void> {
    try {
      await unlink(this.resolve(name));
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }
  }
}
