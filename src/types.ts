/**
 * @lapcut/core — type definitions
 *
 * A Container is a lens over the bytes it was read from: every record keeps
 * its original bytes as a `template`, and the typed fields beside it are the
 * values the writer re-encodes over that template. Nothing here is mutable;
 * slicing and editing always produce new objects.
 */

// ─── Sample Types ─────────────────────────────────────────────────────────────

/**
 * Supported sample encodings.
 *
 * f16: IEEE 754 half precision. There is no Float16Array on the targeted
 *      runtimes, so the samples are held as their raw u16 bit patterns and
 *      decoded only by physicalValues().
 */
export type SampleType = 'i16' | 'i32' | 'f16' | 'f32';

/** Byte width of one stored sample of each SampleType. */
export const SAMPLE_BYTE_WIDTHS: Readonly<Record<SampleType, number>> = {
  i16: 2,
  i32: 4,
  f16: 2,
  f32: 4,
};

/** The typed array that holds a channel's raw samples, by SampleType. */
export interface SampleBufferMap {
  i16: Int16Array;
  i32: Int32Array;
  f16: Uint16Array;
  f32: Float32Array;
}

export type SampleBuffer = SampleBufferMap[SampleType];

// ─── Header ───────────────────────────────────────────────────────────────────

/**
 * The fixed-size file header.
 *
 * catalogPtr, dataPtr, eventPtr and recordCount describe the layout the
 * header was read from. The writer never trusts them: it derives all four
 * from the container's contents.
 */
export interface Header {
  readonly marker:        number;
  readonly catalogPtr:    number;
  readonly dataPtr:       number;
  readonly eventPtr:      number;
  readonly recordCount:   number;
  readonly deviceSerial:  number;
  readonly deviceType:    string;
  readonly deviceVersion: number;
  readonly date:          string; // as stored, e.g. "18/10/2026"
  readonly time:          string; // as stored, e.g. "14:05:09"
  readonly driver:        string;
  readonly vehicle:       string;
  readonly venue:         string;
  readonly shortComment:  string;
  readonly template:      Uint8Array;
}

// ─── Session Blocks ───────────────────────────────────────────────────────────

export interface SessionVehicle {
  readonly id:       string;
  readonly weight:   number;
  readonly type:     string;
  readonly comment:  string;
  readonly template: Uint8Array;
}

export interface SessionVenue {
  readonly name:     string;
  readonly vehicle?: SessionVehicle;
  readonly template: Uint8Array;
}

export interface SessionEvent {
  readonly name:     string;
  readonly session:  string;
  readonly comment:  string;
  readonly venue?:   SessionVenue;
  readonly template: Uint8Array;
}

// ─── Channels ─────────────────────────────────────────────────────────────────

/**
 * Raw-to-physical conversion stored with every channel:
 *
 *   physical = (raw / scale × 10^-decimals + shift) × multiplier
 */
export interface ChannelConversion {
  readonly shift:      number;
  readonly multiplier: number;
  readonly scale:      number;
  readonly decimals:   number;
}

export interface ChannelDescriptor {
  readonly name:        string;
  readonly shortName:   string;
  readonly unit:        string;
  readonly type:        SampleType;
  /** Type-class code as stored; several integer codes map to one SampleType. */
  readonly typeClass:   number;
  /** Samples per second. */
  readonly frequency:   number;
  readonly sampleCount: number;
  /** Offset of this channel's catalog record in the source file. */
  readonly recordPtr:   number;
  /** Offset of this channel's data block in the source file. */
  readonly dataPtr:     number;
  readonly conversion:  ChannelConversion;
  readonly template:    Uint8Array;
}

export interface Channel {
  readonly descriptor: ChannelDescriptor;
  readonly samples:    SampleBuffer;
}

// ─── Container ────────────────────────────────────────────────────────────────

/** Bytes at a fixed file offset. */
export interface ByteSpan {
  readonly offset: number;
  readonly bytes:  Uint8Array;
}

/** Where one channel's record and data block sat in the source file. */
export interface SourceChannelSlot {
  readonly recordPtr:   number;
  readonly dataPtr:     number;
  readonly sampleCount: number;
}

/**
 * Layout of the file a container was read from. Header, catalog and data
 * pointers live on the Header and descriptors; this holds what they do not:
 * the inner session pointers, the file length and every byte no decoded
 * region covers.
 */
export interface SourceLayout {
  readonly length:     number;
  readonly venuePtr:   number;
  readonly vehiclePtr: number;
  readonly channels:   readonly SourceChannelSlot[];
  readonly gaps:       readonly ByteSpan[];
}

export interface Container {
  readonly header:   Header;
  readonly event?:   SessionEvent;
  /** Order is significant: it fixes catalog and data-block order on write. */
  readonly channels: readonly Channel[];
  /**
   * Set by readContainer. While every channel still matches its slot, the
   * writer reproduces this layout instead of packing the regions.
   */
  readonly source?:  SourceLayout;
}

// ─── Markers & Laps ───────────────────────────────────────────────────────────

export interface Marker {
  readonly name: string;
  /** Seconds since session start. */
  readonly time: number;
}

export interface LapBoundary {
  readonly index:     number;
  readonly startTime: number;
  readonly endTime:   number;
  readonly duration:  number;
}

/** A lap index, or the lap with the smallest duration. */
export type LapSelector = number | 'fastest';

/** Half-open interval [startTime, endTime) in seconds. */
export interface TimeWindow {
  readonly startTime: number;
  readonly endTime:   number;
}

export type TimeUnit = 'seconds' | 'microseconds';
