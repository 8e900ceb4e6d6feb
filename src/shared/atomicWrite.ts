import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { FileSystemError, errorMessage } from "./errors";

const tempPathFor = (destination: string): string =>
  path.join(
    path.dirname(destination),
    `.${path.basename(destination)}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`
  );

/**
 * Write `data` to a temp sibling, check the written size and rename it over
 * `destination`. The final path either keeps its old content or gets the new
 * content in full; the temp file is removed on failure.
 */
export const writeFileAtomic = async (
  destination: string,
  data: Buffer | string
): Promise<void> => {
  const bytes = typeof data === "string" ? Buffer.from(data, "utf8") : data;
  const tempPath = tempPathFor(destination);
  let tempCreated = false;

  try {
    await fs.promises.mkdir(path.dirname(destination), { recursive: true });

    const handle = await fs.promises.open(tempPath, "w");
    tempCreated = true;
    try {
      await handle.writeFile(bytes);
      await handle.sync();
    } finally {
      await handle.close();
    }

    const { size } = await fs.promises.stat(tempPath);
    if (size !== bytes.length) {
      throw new Error(`short write (${size} of ${bytes.length} bytes)`);
    }

    await fs.promises.rename(tempPath, destination);
  } catch (error) {
    if (tempCreated) {
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`  ⚠️  Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
      });
    }
    throw new FileSystemError(
      `Failed to write ${destination}: ${errorMessage(error)}`,
      destination,
      { cause: error }
    );
  }
};
