/**
 * Utility helpers shared across the package.
 */

/**
 * Narrow an unknown value to a plain property bag.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Copy a byte view into a standalone ArrayBuffer.
 *
 * Node Buffers are slices of a shared pool, so their `.buffer` can hold
 * unrelated bytes before and after the view. Codecs that take an
 * ArrayBuffer must get one that starts at the file's first byte.
 */
export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

/**
 * Format a date as a TIFF DateTime value ("YYYY:MM:DD HH:MM:SS",
 * local time, 19 characters).
 */
export function formatTiffDateTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}:${pad(date.getMonth() + 1)}:${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Raw bytes of a typed array in host byte order.
 */
export function viewBytes(data: ArrayBufferView): Uint8Array {
  return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
}
