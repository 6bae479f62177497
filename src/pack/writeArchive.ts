/**
 * Atomic archive write
 */

import * as fs from "fs";
import * as path from "path";

/**
 * Write archive bytes to outputPath without ever exposing a partial file.
 *
 * Bytes go to a sibling temp file that is renamed over the destination.
 * On failure the temp file is removed and the original error is rethrown.
 *
 * @returns Absolute path of the written archive
 */
export async function writeArchiveAtomic(
  data: Uint8Array,
  outputPath: string,
): Promise<string> {
  const target = path.resolve(outputPath);
  const tempPath = `${target}.${process.pid}.tmp`;

  await fs.promises.mkdir(path.dirname(target), { recursive: true });

  try {
    await fs.promises.writeFile(tempPath, data);
    await fs.promises.rename(tempPath, target);
  } catch (err) {
    await fs.promises.rm(tempPath, { force: true });
    throw err;
  }

  return target;
}
