import { randomBytes } from "node:crypto";
import { link, mkdir, open, rename, stat, unlink } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { logWarning } from "../shared/logger.js";
import { CodegenError, errorCode, errorMessage } from "./errors.js";

export type WriteOutcome = "written" | "preserved";

export type DurableFileWriterOptions = {
  /**
   * Runs after the temp file is complete on disk and before it is committed
   * to the destination. Throwing here behaves like a crash at that point.
   */
  beforeCommit?: (tempPath: string, targetPath: string) => Promise<void> | void;
};

const TEMP_SUFFIX = ".tmp";

export function tempPathFor(targetPath: string): string {
  const token = randomBytes(6).toString("hex");
  return join(dirname(targetPath), `.${basename(targetPath)}.${token}${TEMP_SUFFIX}`);
}

async function writeDurably(path: string, content: string): Promise<void> {
  const handle = await open(path, "wx", 0o644);
  try {
    await handle.writeFile(content, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function syncDirectory(directory: string): Promise<void> {
  // Directory handles cannot be fsynced on Windows.
  if (process.platform === "win32") {
    return;
  }
  const handle = await open(directory, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (error) {
    if (errorCode(error) !== "ENOENT") {
      logWarning("file-writer", `Could not remove ${tempPath}: ${errorMessage(error)}`);
    }
  }
}

export class DurableFileWriter {
  private readonly beforeCommit: DurableFileWriterOptions["beforeCommit"];

  constructor(options: DurableFileWriterOptions = {}) {
    this.beforeCommit = options.beforeCommit;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return false;
      }
      throw new CodegenError("WriteFailure", `Cannot inspect ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Replaces `path` so that readers only ever see the previous content or the
   * new content in full. The temp file lives beside the destination so the
   * final rename stays on one volume.
   */
  async writeOverwriteAtomic(path: string, content: string): Promise<WriteOutcome> {
    const directory = await this.ensureDirectory(path);
    const tempPath = tempPathFor(path);

    try {
      await writeDurably(tempPath, content);
      await this.beforeCommit?.(tempPath, path);
      await rename(tempPath, path);
    } catch (error) {
      await removeTempFile(tempPath);
      throw new CodegenError("WriteFailure", `Failed to write ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    await this.syncAfterCommit(directory, path);
    return "written";
  }

  /**
   * Creates `path` only when nothing exists there. The content is staged in a
   * temp file and hard-linked into place, so the destination appears complete
   * or not at all, and an existing file is never replaced.
   */
  async writeIfNotExists(path: string, content: string): Promise<WriteOutcome> {
    const directory = await this.ensureDirectory(path);
    if (await this.exists(path)) {
      return "preserved";
    }

    const tempPath = tempPathFor(path);
    let outcome: WriteOutcome = "written";

    try {
      await writeDurably(tempPath, content);
      await this.beforeCommit?.(tempPath, path);
      await link(tempPath, path);
    } catch (error) {
      if (errorCode(error) === "EEXIST") {
        outcome = "preserved";
      } else {
        await removeTempFile(tempPath);
        throw new CodegenError("WriteFailure", `Failed to create ${path}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    await removeTempFile(tempPath);
    if (outcome === "written") {
      await this.syncAfterCommit(directory, path);
    }
    return outcome;
  }

  private async ensureDirectory(path: string): Promise<string> {
    const directory = dirname(path);
    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new CodegenError(
        "WriteFailure",
        `Cannot create directory ${directory}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    return directory;
  }

  private async syncAfterCommit(directory: string, path: string): Promise<void> {
    try {
      await syncDirectory(directory);
    } catch (error) {
      // The rename already happened; only durability of the directory entry is in doubt.
      logWarning("file-writer", `Could not fsync directory of ${path}: ${errorMessage(error)}`);
    }
  }
}
