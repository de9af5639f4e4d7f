/**
 * @lapcut/core — channel catalog records
 *
 * Wire format of one catalog record (124 bytes, little-endian):
 *
 *   [prev_ptr:     u32]  ← previous record, 0 for the head
 *   [next_ptr:     u32]  ← next record, 0 for the tail
 *   [data_ptr:     u32]
 *   [sample_count: u32]
 *   [counter:      u16]  ← opaque, carried through
 *   [type_class:   u16]  ← 0/3/5 integer, 7 float
 *   [type_width:   u16]  ← bytes per sample, 2 or 4
 *   [frequency:    u16]  ← Hz
 *   [shift, multiplier, scale, decimals: i16 × 4]
 *   [name: char[32]][short_name: char[8]][unit: char[12]]
 *   [40 reserved bytes]
 *
 * The stored (type_class, type_width) pair resolves to one SampleType.
 * The stored type_class is kept so a re-encoded record is byte-identical.
 */

import {
  CHANNEL_RECORD_SIZE,
  OFFSET_CH_PREV_PTR,
  OFFSET_CH_NEXT_PTR,
  OFFSET_CH_DATA_PTR,
  OFFSET_CH_SAMPLE_COUNT,
  OFFSET_CH_TYPE_CLASS,
  OFFSET_CH_TYPE_WIDTH,
  OFFSET_CH_FREQUENCY,
  OFFSET_CH_SHIFT,
  OFFSET_CH_MULTIPLIER,
  OFFSET_CH_SCALE,
  OFFSET_CH_DECIMALS,
  OFFSET_CH_NAME,
  OFFSET_CH_SHORT_NAME,
  OFFSET_CH_UNIT,
  WIDTH_CH_NAME,
  WIDTH_CH_SHORT_NAME,
  WIDTH_CH_UNIT,
  TYPE_CLASS_INT_CODES,
  TYPE_CLASS_FLOAT,
  DEFAULT_TYPE_CLASS_INT,
} from './constants';
import { UnknownDataTypeError } from './errors';
import { copyBytes, readText, viewOf, writeText } from './fields';
import { allocateSamples, sampleTypeOf } from './samples';
import {
  SAMPLE_BYTE_WIDTHS,
  type Channel,
  type ChannelConversion,
  type ChannelDescriptor,
  type SampleBuffer,
  type SampleType,
} from './types';

// ─── Type resolution ──────────────────────────────────────────────────────────

/**
 * Map a stored (type_class, type_width) pair to a SampleType.
 * Returns undefined for any pair outside the supported set.
 */
export function resolveSampleType(typeClass: number, typeWidth: number): SampleType | undefined {
  if (TYPE_CLASS_INT_CODES.includes(typeClass)) {
    if (typeWidth === 2) return 'i16';
    if (typeWidth === 4) return 'i32';
    return undefined;
  }
  if (typeClass === TYPE_CLASS_FLOAT) {
    if (typeWidth === 2) return 'f16';
    if (typeWidth === 4) return 'f32';
  }
  return undefined;
}

/** The type_class written for a freshly created channel of `type`. */
export function defaultTypeClass(type: SampleType): number {
  return type === 'f16' || type === 'f32' ? TYPE_CLASS_FLOAT : DEFAULT_TYPE_CLASS_INT;
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

/**
 * Decode the catalog record held in `bytes` (at least CHANNEL_RECORD_SIZE
 * long), read from file offset `recordPtr`.
 *
 * @throws UnknownDataTypeError if the type pair is not supported.
 */
export function decodeChannelRecord(
  bytes:     Uint8Array,
  recordPtr: number,
): { readonly descriptor: ChannelDescriptor; readonly nextPtr: number } {
  const template  = copyBytes(bytes, 0, CHANNEL_RECORD_SIZE);
  const view      = viewOf(template);
  const name      = readText(template, OFFSET_CH_NAME, WIDTH_CH_NAME);
  const typeClass = view.getUint16(OFFSET_CH_TYPE_CLASS, true);
  const typeWidth = view.getUint16(OFFSET_CH_TYPE_WIDTH, true);
  const type      = resolveSampleType(typeClass, typeWidth);

  if (type === undefined) {
    throw new UnknownDataTypeError(
      `Channel '${name}' at offset ${recordPtr} declares type class ` +
      `0x${typeClass.toString(16)} with width ${typeWidth}; supported pairs are ` +
      `integer (0x0/0x3/0x5) or float (0x7) with width 2 or 4.`,
      { channel: name, offset: recordPtr, typeClass, typeWidth },
    );
  }

  return {
    descriptor: {
      name,
      shortName:   readText(template, OFFSET_CH_SHORT_NAME, WIDTH_CH_SHORT_NAME),
      unit:        readText(template, OFFSET_CH_UNIT,       WIDTH_CH_UNIT),
      type,
      typeClass,
      frequency:   view.getUint16(OFFSET_CH_FREQUENCY,    true),
      sampleCount: view.getUint32(OFFSET_CH_SAMPLE_COUNT, true),
      recordPtr,
      dataPtr:     view.getUint32(OFFSET_CH_DATA_PTR,     true),
      conversion: {
        shift:      view.getInt16(OFFSET_CH_SHIFT,      true),
        multiplier: view.getInt16(OFFSET_CH_MULTIPLIER, true),
        scale:      view.getInt16(OFFSET_CH_SCALE,      true),
        decimals:   view.getInt16(OFFSET_CH_DECIMALS,   true),
      },
      template,
    },
    nextPtr: view.getUint32(OFFSET_CH_NEXT_PTR, true),
  };
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

/** Layout fields of one record; assigned by the writer's layout pass. */
export interface ChannelPointers {
  readonly prevPtr:     number;
  readonly nextPtr:     number;
  readonly dataPtr:     number;
  readonly sampleCount: number;
}

export function encodeChannelRecord(
  descriptor: ChannelDescriptor,
  pointers:   ChannelPointers,
): Uint8Array {
  if (descriptor.template.length !== CHANNEL_RECORD_SIZE) {
    throw new RangeError(
      `Channel '${descriptor.name}' record template is ${descriptor.template.length} ` +
      `bytes; expected ${CHANNEL_RECORD_SIZE}.`,
    );
  }

  const out  = copyBytes(descriptor.template);
  const view = viewOf(out);
  const conv = descriptor.conversion;

  view.setUint32(OFFSET_CH_PREV_PTR,     pointers.prevPtr,                     true);
  view.setUint32(OFFSET_CH_NEXT_PTR,     pointers.nextPtr,                     true);
  view.setUint32(OFFSET_CH_DATA_PTR,     pointers.dataPtr,                     true);
  view.setUint32(OFFSET_CH_SAMPLE_COUNT, pointers.sampleCount,                 true);
  view.setUint16(OFFSET_CH_TYPE_CLASS,   descriptor.typeClass,                 true);
  view.setUint16(OFFSET_CH_TYPE_WIDTH,   SAMPLE_BYTE_WIDTHS[descriptor.type],  true);
  view.setUint16(OFFSET_CH_FREQUENCY,    descriptor.frequency,                 true);
  view.setInt16(OFFSET_CH_SHIFT,         conv.shift,                           true);
  view.setInt16(OFFSET_CH_MULTIPLIER,    conv.multiplier,                      true);
  view.setInt16(OFFSET_CH_SCALE,         conv.scale,                           true);
  view.setInt16(OFFSET_CH_DECIMALS,      conv.decimals,                        true);

  writeText(out, OFFSET_CH_NAME,       WIDTH_CH_NAME,       descriptor.name,      'channel name');
  writeText(out, OFFSET_CH_SHORT_NAME, WIDTH_CH_SHORT_NAME, descriptor.shortName, 'channel short name');
  writeText(out, OFFSET_CH_UNIT,       WIDTH_CH_UNIT,       descriptor.unit,      'channel unit');

  return out;
}

// ─── Channel builder ──────────────────────────────────────────────────────────

export interface ChannelInit {
  name:        string;
  type:        SampleType;
  frequency:   number;
  /** Raw stored values: a typed array of the matching kind, or plain numbers. */
  samples:     SampleBuffer | ArrayLike<number>;
  shortName?:  string;
  unit?:       string;
  conversion?: Partial<ChannelConversion>;
}

/**
 * Build a channel from scratch.
 *
 * Usage:
 *   const speed = createChannel({
 *     name: 'Ground Speed', unit: 'km/h', type: 'i16', frequency: 20,
 *     samples: [0, 12, 25, 37],
 *     conversion: { decimals: 1 },
 *   });
 */
export function createChannel(init: ChannelInit): Channel {
  const { name, type, frequency } = init;

  if (!Number.isInteger(frequency) || frequency < 0 || frequency > 0xffff) {
    throw new RangeError(
      `Channel '${name}': frequency must be an integer in [0, 65535] Hz; got ${frequency}.`,
    );
  }

  const bufferType = sampleTypeOf(init.samples);
  if (bufferType !== undefined && bufferType !== type) {
    throw new TypeError(
      `Channel '${name}': samples hold '${bufferType}' values; the channel is '${type}'.`,
    );
  }

  // Same-type TypedArray.set copies bit patterns, so NaN payloads survive.
  const samples = allocateSamples(type, init.samples.length);
  samples.set(init.samples);

  const template = new Uint8Array(CHANNEL_RECORD_SIZE);
  const descriptor: ChannelDescriptor = {
    name,
    shortName:   init.shortName ?? '',
    unit:        init.unit ?? '',
    type,
    typeClass:   defaultTypeClass(type),
    frequency,
    sampleCount: samples.length,
    recordPtr:   0,
    dataPtr:     0,
    conversion: {
      shift:      init.conversion?.shift      ?? 0,
      multiplier: init.conversion?.multiplier ?? 1,
      scale:      init.conversion?.scale      ?? 1,
      decimals:   init.conversion?.decimals   ?? 0,
    },
    template,
  };

  // Encode once so the text fields are validated against their widths now
  // rather than at write time.
  const encoded = encodeChannelRecord(descriptor, { prevPtr: 0, nextPtr: 0, dataPtr: 0, sampleCount: 0 });
  return { descriptor: { ...descriptor, template: encoded }, samples };
}
