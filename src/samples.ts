/**
 * @lapcut/core — sample buffers
 *
 * A channel's samples live in a typed array whose element type matches the
 * stored encoding. Buffers are created over a fresh copy of the file bytes,
 * so on a little-endian host the typed array holds exactly the stored bit
 * patterns: no float is ever widened and narrowed on the way through, and
 * writing the buffer back reproduces the input byte for byte.
 */

import { copyBytes } from './fields';
import {
  SAMPLE_BYTE_WIDTHS,
  type Channel,
  type SampleBuffer,
  type SampleType,
} from './types';

// ─── Allocation ───────────────────────────────────────────────────────────────

export function allocateSamples(type: SampleType, length: number): SampleBuffer {
  switch (type) {
    case 'i16': return new Int16Array(length);
    case 'i32': return new Int32Array(length);
    case 'f16': return new Uint16Array(length);
    case 'f32': return new Float32Array(length);
  }
}

/**
 * Wrap a copy of `bytes` as samples of `type`.
 * `bytes.length` must be a multiple of the type's byte width.
 */
export function samplesFromBytes(type: SampleType, bytes: Uint8Array): SampleBuffer {
  const width = SAMPLE_BYTE_WIDTHS[type];
  if (bytes.length % width !== 0) {
    throw new RangeError(
      `${bytes.length} bytes is not a whole number of '${type}' samples (${width} bytes each).`,
    );
  }

  // The copy owns an ArrayBuffer starting at offset 0, which satisfies the
  // element alignment every typed array constructor requires.
  const buffer = copyBytes(bytes).buffer;
  const count  = bytes.length / width;
  switch (type) {
    case 'i16': return new Int16Array(buffer, 0, count);
    case 'i32': return new Int32Array(buffer, 0, count);
    case 'f16': return new Uint16Array(buffer, 0, count);
    case 'f32': return new Float32Array(buffer, 0, count);
  }
}

/** The stored bytes of `samples`, without copying. */
export function sampleBytes(samples: SampleBuffer): Uint8Array {
  return new Uint8Array(samples.buffer, samples.byteOffset, samples.byteLength);
}

/** The SampleType a typed array holds, or undefined for anything else. */
export function sampleTypeOf(value: SampleBuffer | ArrayLike<number>): SampleType | undefined {
  if (value instanceof Int16Array)   return 'i16';
  if (value instanceof Int32Array)   return 'i32';
  if (value instanceof Uint16Array)  return 'f16';
  if (value instanceof Float32Array) return 'f32';
  return undefined;
}

// ─── Physical values ──────────────────────────────────────────────────────────

/** Decode an IEEE 754 half-precision bit pattern. */
export function decodeHalf(bits: number): number {
  const sign     = bits & 0x8000 ? -1 : 1;
  const exponent = (bits >> 10) & 0x1f;
  const fraction = bits & 0x03ff;

  if (exponent === 0)    return sign * fraction * 2 ** -24;          // subnormal / zero
  if (exponent === 0x1f) return fraction === 0 ? sign * Infinity : NaN;
  return sign * (1 + fraction / 1024) * 2 ** (exponent - 15);
}

/**
 * Convert a channel's raw samples to physical units:
 *
 *   (raw / scale × 10^-decimals + shift) × multiplier
 *
 * A stored scale of 0 is read as 1.
 */
export function physicalValues(channel: Channel): Float64Array {
  const { type, conversion } = channel.descriptor;
  const scale  = conversion.scale === 0 ? 1 : conversion.scale;
  const factor = 10 ** -conversion.decimals / scale;
  const decode = type === 'f16' ? decodeHalf : (raw: number) => raw;

  return Float64Array.from(
    channel.samples,
    raw => (decode(raw) * factor + conversion.shift) * conversion.multiplier,
  );
}
