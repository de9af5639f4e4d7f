/**
 * @lapcut/core — fixed-width field helpers shared by the header and catalog
 * codecs.
 *
 * Text fields are NUL-padded byte arrays. A field whose decoded value has
 * not changed is left untouched on write, so bytes after the terminator
 * (some loggers leave stale text there) survive a round trip.
 */

// Module-level codecs are stateless and shared by every call.
const utf8Decoder = new TextDecoder();
const utf8Encoder = new TextEncoder();

/**
 * A copy of `bytes[start, end)` with its own ArrayBuffer at offset 0.
 * Buffer.prototype.slice returns a view, so Uint8Array.prototype.slice is
 * not enough when the input came from node:fs.
 */
export function copyBytes(bytes: Uint8Array, start = 0, end = bytes.length): Uint8Array {
  return new Uint8Array(bytes.subarray(start, end));
}

/** DataView over exactly the bytes of `bytes`, honouring its byteOffset. */
export function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Decode a NUL-terminated text field of `width` bytes. */
export function readText(bytes: Uint8Array, offset: number, width: number): string {
  const field = bytes.subarray(offset, offset + width);
  const nul   = field.indexOf(0);
  return utf8Decoder.decode(nul < 0 ? field : field.subarray(0, nul));
}

/**
 * Encode `value` into a text field of `width` bytes, zero-filling the rest.
 * No-op when the field already decodes to `value`.
 *
 * @throws RangeError if the UTF-8 encoding does not fit in `width` bytes.
 */
export function writeText(
  bytes:  Uint8Array,
  offset: number,
  width:  number,
  value:  string,
  label:  string,
): void {
  if (readText(bytes, offset, width) === value) return;

  const encoded = utf8Encoder.encode(value);
  if (encoded.length > width) {
    throw new RangeError(
      `${label} "${value}" encodes to ${encoded.length} bytes; ` +
      `the field holds at most ${width}.`,
    );
  }
  bytes.fill(0, offset, offset + width);
  bytes.set(encoded, offset);
}

/**
 * Sample buffers are typed arrays laid directly over little-endian file
 * bytes, so the host must be little-endian too.
 * The probe [0x01, 0x00] reads as 0x0001 on LE and 0x0100 on BE.
 */
export function isLittleEndianHost(): boolean {
  return new Uint16Array(new Uint8Array([0x01, 0x00]).buffer)[0] === 1;
}
