import createDebug from "debug";
import { mkdir, open, rename, unlink } from "fs/promises";
import { dirname } from "path";

const debug = createDebug("poster:fs");

export type FileWriter = (path: string, data: string) => Promise<void>;

/**
 * Write to a sibling temp file, fsync, then rename over the target. Readers see
 * either the previous contents or the new ones, never a partial file.
 */
export const writeFileAtomic: FileWriter = async (path, data) => {
  await mkdir(dirname(path), { recursive: true });
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    const handle = await open(tmpPath, "w");
    try {
      await handle.writeFile(data, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, path);
  } catch (err) {
    await unlink(tmpPath).catch((cleanupErr) => {
      debug("could not remove %s: %o", tmpPath, cleanupErr);
    });
    throw err;
  }
};
