import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { logWarn } from "@/lib/logging/error-logger";

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * on success and on failure alike.
 */
export async function withTempDir<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
      logWarn("Temporary directory cleanup failed", {
        dir,
        error: String(error),
      });
    });
  }
}
