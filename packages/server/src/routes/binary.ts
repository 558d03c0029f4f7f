/**
 * Copy bytes into a standalone ArrayBuffer for c.body(). A Buffer may be a
 * view into a larger pooled allocation, so its .buffer can't be sent as is.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}
