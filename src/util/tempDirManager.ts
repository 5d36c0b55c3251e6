import fs from "fs/promises";
import os from "os";
import path from "path";
import { sanitizeSegment } from "../git/utils/fsUtils.js";
import { createLogger } from "../logger.js";

const logger = createLogger("TempDirManager");

export interface TempDirManager {
  makeDir(prefix: string): Promise<string>;
  cleanup(dir: string): Promise<void>;
}

export class LocalTempDirManager implements TempDirManager {
  private readonly created = new Set<string>();

  constructor(private readonly baseDir: string = os.tmpdir()) {}

  async makeDir(prefix: string): Promise<string> {
    await fs.mkdir(this.baseDir, { recursive: true });
    const safePrefix = sanitizeSegment(prefix) || "tmp";
    const dir = await fs.mkdtemp(path.join(this.baseDir, `${safePrefix}-`));
    this.created.add(dir);
    logger.trace("temp dir created", { dir });
    return dir;
  }

  async cleanup(dir: string): Promise<void> {
    try {
      await fs.rm(dir, { recursive: true, force: true });
      this.created.delete(dir);
    } catch (e) {
      logger.warn("temp dir cleanup failed", { dir, error: e });
    }
  }

  async cleanupAll(): Promise<void> {
    for (const dir of [...this.created]) {
      await this.cleanup(dir);
    }
  }

  get active(): readonly string[] {
    return [...this.created];
  }
}

export async function withTempDir<T>(
  manager: TempDirManager,
  prefix: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await manager.makeDir(prefix);
  try {
    return await fn(dir);
  } finally {
    await manager.cleanup(dir);
  }
}
