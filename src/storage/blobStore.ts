import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";

/** Stores attachment bytes and hands back an opaque handle. */
export interface BlobStore {
  store(bytes: Buffer, originalName: string): Promise<string>;
}

export function safeFileName(name: string): string {
  const base = path.basename(name).replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^\.+/, "");
  return base.slice(0, 100) || "file";
}

export class DiskBlobStore implements BlobStore {
  constructor(private readonly dir: string) {}

  async store(bytes: Buffer, originalName: string): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const handle = `${nanoid(12)}-${safeFileName(originalName)}`;
    // wx: never overwrite an existing blob
    await writeFile(path.join(this.dir, handle), bytes, { flag: "wx" });
    return handle;
  }
}
