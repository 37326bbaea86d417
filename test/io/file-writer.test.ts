/**
 * Tests for file writing, moving and removal
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { moveFile, openForWriting, removeIfExists } from "../../src/io/file-writer";

describe("file writer", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "refsmith-writer-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("openForWriting", () => {
    test("writes one gzip member per call that reads back as one text", async () => {
      const file = join(dir, "out.fa");
      const result = await openForWriting(
        file,
        async (handle) => {
          await handle.writeString(">a\nAC\n");
          await handle.writeString(">b\nGT\n");
          return "done";
        },
        { compressionFormat: "gzip" }
      );

      expect(result).toBe("done");
      expect(gunzipSync(readFileSync(file)).toString("utf8")).toBe(">a\nAC\n>b\nGT\n");
    });

    test("compresses .gz output by name", async () => {
      const file = join(dir, "out.fa.gz");
      await openForWriting(file, async (handle) => {
        await handle.writeString(">a\nAC\n");
      });

      const bytes = readFileSync(file);
      expect([bytes[0], bytes[1]]).toEqual([0x1f, 0x8b]);
      expect(gunzipSync(bytes).toString("utf8")).toBe(">a\nAC\n");
    });

    test("honours autoCompress: false", async () => {
      const file = join(dir, "out.fa.gz");
      await openForWriting(file, (handle) => handle.writeString("plain"), { autoCompress: false });
      expect(readFileSync(file, "utf8")).toBe("plain");
    });

    test("raises FileError for a missing directory", async () => {
      const file = join(dir, "missing", "out.txt");
      const error = await openForWriting(file, async () => {}).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileError);
      expect(error).toMatchObject({ operation: "write", filePath: file });
    });

    test("truncates an existing file", async () => {
      const file = join(dir, "out.txt");
      writeFileSync(file, "previous contents that are longer");

      await openForWriting(file, async (handle) => {
        await handle.writeBytes(new TextEncoder().encode("new"));
      });

      expect(readFileSync(file, "utf8")).toBe("new");
    });

    test("propagates callback errors unchanged", async () => {
      const failure = new Error("callback failed");
      const error = await openForWriting(join(dir, "out.txt"), async () => {
        throw failure;
      }).catch((e: unknown) => e);

      expect(error).toBe(failure);
    });
  });

  describe("moveFile", () => {
    test("renames over an existing destination", async () => {
      const from = join(dir, "a.tmp");
      const to = join(dir, "a.fa");
      writeFileSync(from, "new");
      writeFileSync(to, "old");

      await moveFile(from, to);

      expect(readFileSync(to, "utf8")).toBe("new");
      expect(existsSync(from)).toBe(false);
    });

    test("raises FileError for a missing source", async () => {
      const from = join(dir, "missing.tmp");
      const error = await moveFile(from, join(dir, "a.fa")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileError);
      expect(error).toMatchObject({ operation: "move", filePath: from });
    });
  });

  describe("removeIfExists", () => {
    test("removes a file and reports it", async () => {
      const file = join(dir, "a.tmp");
      writeFileSync(file, "x");

      expect(await removeIfExists(file)).toBe(true);
      expect(existsSync(file)).toBe(false);
    });

    test("reports a missing file without failing", async () => {
      expect(await removeIfExists(join(dir, "missing.tmp"))).toBe(false);
    });
  });
});
