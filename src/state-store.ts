// stateStore.ts
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

/** ~/.frame-automation/last_content_id */
export function defaultStateFilePath(): string {
  return path.join(os.homedir(), ".frame-automation", "last_content_id");
}

/**
 * Remembers the content id of the last artwork we uploaded, so the next run can
 * delete it before uploading a replacement. One file, one id, no history.
 */
export class ArtworkStateStore {
  constructor(readonly filePath: string = defaultStateFilePath()) {}

  async read(): Promise<string | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (e) {
      if (isNotFound(e)) return undefined;
      throw e;
    }
    const id = raw.trim();
    return id ? id : undefined;
  }

  async write(contentId: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, contentId, "utf8");
    console.log(`[STATE] Saved ${contentId} -> ${this.filePath}`);
  }
}

// fs errors may come from another realm (test sandboxes), so no instanceof
function isNotFound(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT";
}
