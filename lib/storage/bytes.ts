/** Join byte chunks into one standalone ArrayBuffer. */
export function concatBytes(chunks: Uint8Array[]): ArrayBuffer {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const buffer = new ArrayBuffer(total);
  const view = new Uint8Array(buffer);
  let offset = 0;
  for (const chunk of chunks) {
    view.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return buffer;
}

export function toArrayBuffer(view: Uint8Array): ArrayBuffer {
  return concatBytes([view]);
}
