import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import { vi } from "vitest";

const created: string[] = [];

/**
 * Write `files` (relative path → content) into a fresh temporary directory
 */
export async function createSite(
  files: Record<string, string>
): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "htl-static-"));
  created.push(dir);
  for (const [name, content] of Object.entries(files)) {
    const path = join(dir, name);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
  return dir;
}

export async function removeSites(): Promise<void> {
  await Promise.all(
    created.splice(0).map((dir) => rm(dir, { recursive: true, force: true }))
  );
}

export function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
