import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import type { BlobStore, CallOptions } from "../recordings/ports";
import type { AudioPayload } from "../recordings/types";
import { BlobStoreError } from "./errors";
import { DEFAULT_AUDIO_MIME_TYPE, mimeTypeForFilename } from "./mime";
import { toArrayBuffer } from "./bytes";

/** BlobStore over a local directory, for development. Refs are paths under `rootDir`. */
export class LocalBlobStore implements BlobStore {
  private readonly rootDir: string;
  private readonly maxBytes: number;

  constructor(options: { rootDir: string; maxBytes: number }) {
    this.rootDir = path.resolve(options.rootDir);
    this.maxBytes = options.maxBytes;
  }

  resolve(audioRef: string): string {
    const resolved = path.resolve(this.rootDir, audioRef);
    const relative = path.relative(this.rootDir, resolved);
    const escapes =
      relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
    if (!audioRef.trim() || !relative || escapes) {
      throw new BlobStoreError("invalid_ref", `Audio reference escapes storage root: ${audioRef}`);
    }
    return resolved;
  }

  async fetch(audioRef: string, options?: CallOptions): Promise<AudioPayload> {
    const filePath = this.resolve(audioRef);

    let size: number;
    try {
      size = (await stat(filePath)).size;
    } catch (err) {
      throw new BlobStoreError("not_found", `Audio not found: ${audioRef}`, { cause: err });
    }
    if (size > this.maxBytes) {
      throw new BlobStoreError("too_large", `Audio exceeds ${this.maxBytes} bytes`);
    }
    if (size === 0) throw new BlobStoreError("empty", "Audio is empty");

    const bytes = await readFile(filePath, { signal: options?.signal });
    const filename = path.basename(filePath);
    return {
      bytes: toArrayBuffer(bytes),
      mimeType: mimeTypeForFilename(filename) ?? DEFAULT_AUDIO_MIME_TYPE,
      filename,
    };
  }
}
