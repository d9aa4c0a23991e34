import { BlobNotFoundError, head } from "@vercel/blob";
import type { BlobStore, CallOptions } from "../recordings/ports";
import type { AudioPayload } from "../recordings/types";
import { BlobStoreError } from "./errors";
import { DEFAULT_AUDIO_MIME_TYPE, basename, normalizeAudioMimeType } from "./mime";
import { concatBytes } from "./bytes";

export function isTrustedBlobHost(hostname: string): boolean {
  return hostname === "blob.vercel-storage.com" || hostname.endsWith(".blob.vercel-storage.com");
}

/**
 * BlobStore over Vercel Blob. `audioRef` is a blob URL or pathname; metadata
 * comes from `head` so oversized blobs are refused before downloading.
 */
export class VercelBlobStore implements BlobStore {
  constructor(private readonly options: { token?: string; maxBytes: number }) {}

  async fetch(audioRef: string, options?: CallOptions): Promise<AudioPayload> {
    if (!audioRef.trim()) throw new BlobStoreError("invalid_ref", "Audio reference is empty");

    let metadata: Awaited<ReturnType<typeof head>>;
    try {
      metadata = await head(audioRef, { token: this.options.token });
    } catch (err) {
      if (err instanceof BlobNotFoundError) {
        throw new BlobStoreError("not_found", `Audio not found: ${audioRef}`, { cause: err });
      }
      throw err;
    }

    if (metadata.size > this.options.maxBytes) {
      throw new BlobStoreError("too_large", `Audio exceeds ${this.options.maxBytes} bytes`);
    }
    if (!isTrustedBlobHost(new URL(metadata.url).hostname)) {
      throw new BlobStoreError("invalid_ref", "Audio is not hosted on Vercel Blob");
    }

    const response = await fetch(metadata.url, { redirect: "error", signal: options?.signal });
    if (!response.ok) {
      throw new BlobStoreError("read_failed", `Failed to download audio: ${response.status}`);
    }

    const bytes = await this.readBody(response);
    if (!bytes.byteLength) throw new BlobStoreError("empty", "Audio is empty");

    return {
      bytes,
      mimeType:
        normalizeAudioMimeType(metadata.contentType) ??
        normalizeAudioMimeType(response.headers.get("content-type")) ??
        DEFAULT_AUDIO_MIME_TYPE,
      filename: basename(metadata.pathname),
    };
  }

  /** The blob can change after `head`, so the body is limited again while streaming. */
  private async readBody(response: Response): Promise<ArrayBuffer> {
    const tooLarge = () =>
      new BlobStoreError("too_large", `Audio exceeds ${this.options.maxBytes} bytes`);
    if (Number(response.headers.get("content-length")) > this.options.maxBytes) throw tooLarge();

    const chunks: Uint8Array[] = [];
    let received = 0;
    for await (const chunk of response.body ?? []) {
      received += chunk.byteLength;
      if (received > this.options.maxBytes) throw tooLarge();
      chunks.push(chunk);
    }
    return concatBytes(chunks);
  }
}
