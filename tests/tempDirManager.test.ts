import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { LocalTempDirManager, withTempDir } from "../src/util/tempDirManager.js";

describe("LocalTempDirManager", () => {
  let base: string;

  beforeEach(() => {
    base = fs.mkdtempSync(path.join(os.tmpdir(), "tempdirs-"));
  });

  afterEach(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  it("creates uniquely named directories under the base", async () => {
    const manager = new LocalTempDirManager(base);
    const a = await manager.makeDir("My Clone");
    const b = await manager.makeDir("My Clone");
    expect(a).not.toBe(b);
    expect(path.dirname(a)).toBe(base);
    expect(path.basename(a).startsWith("my-clone-")).toBe(true);
    expect(fs.statSync(a).isDirectory()).toBe(true);
    expect(manager.active).toEqual([a, b]);
  });

  it("creates the base directory on demand", async () => {
    const nested = path.join(base, "nested", "deeper");
    const dir = await new LocalTempDirManager(nested).makeDir("x");
    expect(path.dirname(dir)).toBe(nested);
  });

  it("removes a directory and its contents", async () => {
    const manager = new LocalTempDirManager(base);
    const dir = await manager.makeDir("clone");
    fs.mkdirSync(path.join(dir, "sub"));
    fs.writeFileSync(path.join(dir, "sub", "file.txt"), "data");
    await manager.cleanup(dir);
    expect(fs.existsSync(dir)).toBe(false);
    expect(manager.active).toEqual([]);
  });

  it("tolerates cleaning up a directory that is already gone", async () => {
    const manager = new LocalTempDirManager(base);
    await expect(manager.cleanup(path.join(base, "never-created"))).resolves.toBeUndefined();
  });

  it("removes everything it created", async () => {
    const manager = new LocalTempDirManager(base);
    const dirs = [await manager.makeDir("a"), await manager.makeDir("b")];
    await manager.cleanupAll();
    expect(dirs.map((d) => fs.existsSync(d))).toEqual([false, false]);
  });

  it("withTempDir cleans up after success and failure", async () => {
    const manager = new LocalTempDirManager(base);
    let first = "";
    await expect(
      withTempDir(manager, "ok", async (dir) => {
        first = dir;
        return 42;
      }),
    ).resolves.toBe(42);
    expect(fs.existsSync(first)).toBe(false);

    let second = "";
    await expect(
      withTempDir(manager, "boom", async (dir) => {
        second = dir;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(fs.existsSync(second)).toBe(false);
  });
});
