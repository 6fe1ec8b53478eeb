/**
 * Tests for the local digest archive
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { LocalDigestArchive, digestFileName } from "../../../src/lib/storage/local";

describe("LocalDigestArchive", () => {
  let root: string;
  let archive: LocalDigestArchive;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "digest-archive-"));
    archive = new LocalDigestArchive(path.join(root, "digests"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("names files by date", () => {
    expect(digestFileName("2026-10-19")).toBe("digest_2026-10-19.md");
  });

  it("writes, lists newest first and reads back", async () => {
    const first = await archive.write("2026-10-18", "# one");
    await archive.write("2026-10-19", "# two");

    expect(first).toBe(path.join(root, "digests", "digest_2026-10-18.md"));
    expect(await archive.list()).toEqual(["digest_2026-10-19.md", "digest_2026-10-18.md"]);
    expect(await archive.read("digest_2026-10-18.md")).toBe("# one");
  });

  it("overwrites the same day", async () => {
    await archive.write("2026-10-19", "# first");
    await archive.write("2026-10-19", "# second");

    expect(await archive.list()).toEqual(["digest_2026-10-19.md"]);
    expect(await archive.read("digest_2026-10-19.md")).toBe("# second");
  });

  it("returns nothing for a missing directory, a missing file or a foreign name", async () => {
    expect(await archive.list()).toEqual([]);
    expect(await archive.read("digest_2026-01-01.md")).toBeNull();
    expect(await archive.read("../secrets.md")).toBeNull();
  });
});
