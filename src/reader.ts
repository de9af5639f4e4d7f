/**
 * @lapcut/core — container reader
 *
 * readContainer() turns the bytes of an `.ld` file into a Container. Every
 * read is a pure function of (bytes, offset): offsets come only from fields
 * already decoded (header → session chain → catalog chain → data blocks),
 * never from a running file cursor.
 *
 * Validation order, cheapest first:
 *   host endianness → header bounds → magic → session chain bounds →
 *   catalog chain bounds and type codes → data block bounds →
 *   pairwise region overlap
 *
 * Samples are decoded only after the whole layout has been validated, so a
 * malformed file fails before any large copy is made. The input bytes are
 * never modified.
 *
 * The offsets of every region and the bytes between them are kept on
 * `container.source`, so files with padding between regions or trailing
 * bytes after the last data block are written back unchanged.
 */

import {
  HEADER_SIZE,
  EVENT_SIZE,
  VENUE_SIZE,
  VEHICLE_SIZE,
  CHANNEL_RECORD_SIZE,
} from './constants';
import { decodeChannelRecord } from './catalog';
import {
  OverlappingRegionsError,
  TruncatedFileError,
  UnsupportedFormatError,
} from './errors';
import { copyBytes, isLittleEndianHost } from './fields';
import { decodeEvent, decodeHeader, decodeVehicle, decodeVenue } from './header';
import { samplesFromBytes } from './samples';
import {
  SAMPLE_BYTE_WIDTHS,
  type ByteSpan,
  type Channel,
  type ChannelDescriptor,
  type Container,
  type SessionEvent,
  type SessionVenue,
  type SourceLayout,
} from './types';

// ─── Region bookkeeping ───────────────────────────────────────────────────────

interface Region {
  readonly label: string;
  readonly start: number;
  readonly end:   number;
}

/**
 * Tracks every byte range the file claims to use. Bounds are checked as each
 * region is claimed; overlap is checked once, after all regions are known.
 */
class RegionMap {
  private readonly regions: Region[] = [];

  constructor(private readonly fileLength: number) {}

  claim(label: string, start: number, size: number): void {
    const end = start + size;
    if (end > this.fileLength) {
      throw new TruncatedFileError(
        `${label} spans bytes ${start}..${end}, ` +
        `but the file is only ${this.fileLength} bytes long.`,
        { region: label, offset: start, expectedEnd: end, actualLength: this.fileLength },
      );
    }
    // Empty data blocks occupy no bytes and cannot overlap anything.
    if (size > 0) this.regions.push({ label, start, end });
  }

  assertDisjoint(): void {
    const sorted = [...this.regions].sort((a, b) => a.start - b.start || a.end - b.end);
    for (let i = 1; i < sorted.length; i++) {
      const prev = sorted[i - 1];
      const cur  = sorted[i];
      if (prev !== undefined && cur !== undefined && cur.start < prev.end) {
        throw new OverlappingRegionsError(
          `${cur.label} (bytes ${cur.start}..${cur.end}) overlaps ` +
          `${prev.label} (bytes ${prev.start}..${prev.end}).`,
          {
            region:      cur.label,
            offset:      cur.start,
            otherRegion: prev.label,
            otherEnd:    prev.end,
          },
        );
      }
    }
  }

  /** Every byte range of `bytes` no claimed region covers, in file order. */
  gaps(bytes: Uint8Array): ByteSpan[] {
    const sorted = [...this.regions].sort((a, b) => a.start - b.start);
    const spans: ByteSpan[] = [];
    let cursor = 0;
    for (const region of sorted) {
      if (region.start > cursor) {
        spans.push({ offset: cursor, bytes: copyBytes(bytes, cursor, region.start) });
      }
      cursor = Math.max(cursor, region.end);
    }
    if (cursor < bytes.length) {
      spans.push({ offset: cursor, bytes: copyBytes(bytes, cursor) });
    }
    return spans;
  }
}

// ─── Session chain ────────────────────────────────────────────────────────────

interface SessionChain {
  readonly event:      SessionEvent;
  readonly venuePtr:   number;
  readonly vehiclePtr: number;
}

function readSessionChain(
  bytes:    Uint8Array,
  eventPtr: number,
  regions:  RegionMap,
): SessionChain {
  regions.claim('event block', eventPtr, EVENT_SIZE);
  const event = decodeEvent(bytes.subarray(eventPtr));
  const venuePtr = event.nextPtr;
  if (venuePtr === 0) return { event: event.value, venuePtr: 0, vehiclePtr: 0 };

  regions.claim('venue block', venuePtr, VENUE_SIZE);
  const venue = decodeVenue(bytes.subarray(venuePtr));
  const vehiclePtr = venue.nextPtr;

  let venueValue: SessionVenue = venue.value;
  if (vehiclePtr !== 0) {
    regions.claim('vehicle block', vehiclePtr, VEHICLE_SIZE);
    venueValue = { ...venue.value, vehicle: decodeVehicle(bytes.subarray(vehiclePtr)) };
  }
  return { event: { ...event.value, venue: venueValue }, venuePtr, vehiclePtr };
}

// ─── Catalog chain ────────────────────────────────────────────────────────────

function readCatalog(
  bytes:      Uint8Array,
  catalogPtr: number,
  regions:    RegionMap,
): ChannelDescriptor[] {
  const descriptors: ChannelDescriptor[] = [];
  const visited = new Set<number>();

  for (let ptr = catalogPtr; ptr !== 0;) {
    if (visited.has(ptr)) {
      throw new OverlappingRegionsError(
        `Catalog chain revisits the channel record at offset ${ptr} ` +
        `after ${descriptors.length} records; the next-pointers form a cycle.`,
        { region: `channel record @${ptr}`, offset: ptr, recordsRead: descriptors.length },
      );
    }
    visited.add(ptr);

    regions.claim(`channel record @${ptr}`, ptr, CHANNEL_RECORD_SIZE);
    const { descriptor, nextPtr } = decodeChannelRecord(bytes.subarray(ptr), ptr);
    descriptors.push(descriptor);
    ptr = nextPtr;
  }

  return descriptors;
}

// ─── readContainer ────────────────────────────────────────────────────────────

/**
 * Parse and strictly validate an `.ld` container.
 *
 * Throws:
 *   UnsupportedFormatError   big-endian host, or wrong magic marker
 *   TruncatedFileError       any region ends past the end of the file
 *   UnknownDataTypeError     a channel declares an unsupported type pair
 *   OverlappingRegionsError  two regions share bytes, or the catalog loops
 */
export function readContainer(bytes: Uint8Array): Container {
  if (!isLittleEndianHost()) {
    throw new UnsupportedFormatError(
      'Reading .ld containers requires a little-endian host; ' +
      'sample buffers are typed arrays over the stored little-endian bytes.',
    );
  }

  const regions = new RegionMap(bytes.length);

  regions.claim('header', 0, HEADER_SIZE);
  const header = decodeHeader(bytes);

  if (header.dataPtr > bytes.length) {
    throw new TruncatedFileError(
      `Header data pointer ${header.dataPtr} lies past the end of the ` +
      `${bytes.length}-byte file.`,
      { region: 'data region', offset: header.dataPtr, actualLength: bytes.length },
    );
  }

  const chain = header.eventPtr !== 0
    ? readSessionChain(bytes, header.eventPtr, regions)
    : undefined;

  const descriptors = readCatalog(bytes, header.catalogPtr, regions);

  for (const d of descriptors) {
    regions.claim(
      `data block of '${d.name}'`,
      d.dataPtr,
      d.sampleCount * SAMPLE_BYTE_WIDTHS[d.type],
    );
  }

  regions.assertDisjoint();

  const channels: Channel[] = descriptors.map(descriptor => {
    const start = descriptor.dataPtr;
    const end   = start + descriptor.sampleCount * SAMPLE_BYTE_WIDTHS[descriptor.type];
    return { descriptor, samples: samplesFromBytes(descriptor.type, bytes.subarray(start, end)) };
  });

  const source: SourceLayout = {
    length:     bytes.length,
    venuePtr:   chain?.venuePtr ?? 0,
    vehiclePtr: chain?.vehiclePtr ?? 0,
    channels:   descriptors.map(({ recordPtr, dataPtr, sampleCount }) => ({ recordPtr, dataPtr, sampleCount })),
    gaps:       regions.gaps(bytes),
  };

  return chain !== undefined
    ? { header, event: chain.event, channels, source }
    : { header, channels, source };
}
