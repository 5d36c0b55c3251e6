import fs from "fs/promises";
import os from "os";

export function sanitizeSegment(seg: string) {
  return seg.replace(/[^A-Za-z0-9._-]/g, "-").toLowerCase();
}

export function expandHome(p: string, home: string = os.homedir()) {
  return p.replace(/^~(?=$|\/|\\)/, home);
}

export async function directoryExists(p: string) {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}
