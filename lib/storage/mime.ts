export const DEFAULT_AUDIO_MIME_TYPE = "audio/webm";

const MIME_BY_EXTENSION: Record<string, string> = {
  webm: "audio/webm",
  mp3: "audio/mpeg",
  m4a: "audio/mp4",
  mp4: "audio/mp4",
  ogg: "audio/ogg",
  oga: "audio/ogg",
  wav: "audio/wav",
  flac: "audio/flac",
};

export function normalizeAudioMimeType(mimeType: string | null | undefined): string | undefined {
  if (!mimeType) return undefined;
  const base = mimeType.split(";")[0]?.trim().toLowerCase();
  return base || undefined;
}

export function mimeTypeForFilename(filename: string): string | undefined {
  const dot = filename.lastIndexOf(".");
  if (dot < 0) return undefined;
  return MIME_BY_EXTENSION[filename.slice(dot + 1).toLowerCase()];
}

/** Last path segment of a blob pathname or URL. */
export function basename(pathOrUrl: string): string {
  const path = pathOrUrl.split(/[?#]/)[0] ?? "";
  const segments = path.split("/").filter(Boolean);
  return segments[segments.length - 1] ?? "audio";
}
