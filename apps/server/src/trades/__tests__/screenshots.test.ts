import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import os from "os";
import path from "path";

import { DiskScreenshotStorage, sanitizeFilename, screenshotName } from "../screenshots";
import { png } from "./fakes";

describe("sanitizeFilename", () => {
  it("replaces whitespace and strips unsafe characters", () => {
    expect(sanitizeFilename("my chart (1).png")).toBe("my_chart_1.png");
  });

  it("drops directory parts from either separator", () => {
    expect(sanitizeFilename("../../etc/passwd")).toBe("passwd");
    expect(sanitizeFilename("C:\\shots\\a b.PNG")).toBe("a_b.PNG");
  });

  it("never produces a hidden or empty name", () => {
    expect(sanitizeFilename(".hidden.png")).toBe("hidden.png");
    expect(sanitizeFilename("$$$")).toBe("screenshot");
  });
});

describe("screenshotName", () => {
  it("prefixes the id and kind", () => {
    expect(screenshotName("after", "x y.png", "abc123")).toBe("abc123_after_x_y.png");
  });

  it("generates a random id when none is given", () => {
    expect(screenshotName("before", "chart.png")).toMatch(/^[A-Za-z0-9_-]{10}_before_chart\.png$/);
  });
});

describe("DiskScreenshotStorage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "tradebook-shots-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates the directory lazily and writes the file", async () => {
    const storage = new DiskScreenshotStorage(path.join(dir, "nested"));

    const name = await storage.save("before", png("entry.png"));

    const written = await readFile(path.join(dir, "nested", name), "utf8");
    expect(written).toBe("not-really-a-png");
    expect(name.endsWith("_before_entry.png")).toBe(true);
  });

  it("removes files and ignores ones already gone", async () => {
    const storage = new DiskScreenshotStorage(dir);
    const name = await storage.save("after", png("exit.png"));

    await storage.remove(name);
    await expect(storage.remove(name)).resolves.toBeUndefined();
    expect(await readdir(dir)).toEqual([]);
  });

  it("refuses names outside the upload directory", async () => {
    const storage = new DiskScreenshotStorage(dir);
    await expect(storage.remove("../outside.png")).rejects.toThrow("Invalid screenshot name: ../outside.png");
  });
});
