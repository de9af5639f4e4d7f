/**
 * @lapcut/core — container writer
 *
 * The single source of truth for turning a Container back into bytes.
 *
 * ── Two passes ───────────────────────────────────────────────────────────────
 *
 *   1. plan  — planLayout() assigns an offset to every region from the
 *              current buffer sizes alone. No bytes are produced.
 *   2. emit  — writeContainer() allocates the exact file size and copies each
 *              encoded region to its planned offset.
 *
 * Every pointer in the output (header catalog/data/event pointers, the
 * record count, venue/vehicle pointers, each record's prev/next/data pointer
 * and sample count) is taken from the plan.
 *
 * ── Source layout ────────────────────────────────────────────────────────────
 *
 * A container from readContainer() remembers where each region sat and the
 * bytes between them. While the channel list and every sample count are
 * unchanged, the plan reuses those offsets and the gap bytes are copied back,
 * so writeContainer(readContainer(b)) reproduces b for any valid file.
 *
 * ── Canonical layout ─────────────────────────────────────────────────────────
 *
 *   [header][event][venue][vehicle][record 0 … record n-1][data 0 … data n-1]
 *
 * Used for built and sliced containers. Session blocks are present only when
 * the container has them. There is no padding between regions.
 */

import {
  HEADER_SIZE,
  EVENT_SIZE,
  VENUE_SIZE,
  VEHICLE_SIZE,
  CHANNEL_RECORD_SIZE,
} from './constants';
import { encodeChannelRecord } from './catalog';
import {
  encodeEvent,
  encodeHeader,
  encodeVehicle,
  encodeVenue,
} from './header';
import { sampleBytes, sampleTypeOf } from './samples';
import type { ByteSpan, Channel, Container, SourceLayout } from './types';

// ─── Layout ───────────────────────────────────────────────────────────────────

export interface ChannelLayout {
  readonly channel:     Channel;
  readonly recordPtr:   number;
  readonly prevPtr:     number;
  readonly nextPtr:     number;
  readonly dataPtr:     number;
  readonly dataLength:  number;
  readonly sampleCount: number;
}

export interface ContainerLayout {
  /** 0 when the corresponding block is absent. */
  readonly eventPtr:    number;
  readonly venuePtr:    number;
  readonly vehiclePtr:  number;
  /** 0 when the container has no channels. */
  readonly catalogPtr:  number;
  readonly dataPtr:     number;
  readonly channels:    readonly ChannelLayout[];
  /** Source bytes between and after regions; empty for the packed layout. */
  readonly gaps:        readonly ByteSpan[];
  readonly totalBytes:  number;
}

function assertBufferTypes(container: Container): void {
  for (const { descriptor, samples } of container.channels) {
    const held = sampleTypeOf(samples);
    if (held !== descriptor.type) {
      throw new TypeError(
        `Channel '${descriptor.name}' is declared '${descriptor.type}' ` +
        `but its sample buffer holds '${held ?? 'unknown'}' values.`,
      );
    }
  }
}

/**
 * The source layout still fits when the session chain has the same shape,
 * the header still names the first record, and every channel keeps its
 * record, data block and sample count.
 */
function sourceLayoutFits(container: Container, source: SourceLayout): boolean {
  const { header, event, channels } = container;
  const venue = event?.venue;

  if ((event !== undefined) !== (header.eventPtr !== 0)) return false;
  if ((venue !== undefined) !== (source.venuePtr !== 0)) return false;
  if ((venue?.vehicle !== undefined) !== (source.vehiclePtr !== 0)) return false;
  if (header.dataPtr > source.length) return false;
  if (channels.length !== source.channels.length) return false;
  if (channels.length > 0 && header.catalogPtr !== source.channels[0]?.recordPtr) return false;

  return channels.every(({ descriptor, samples }, i) => {
    const slot = source.channels[i];
    return slot !== undefined &&
      descriptor.recordPtr === slot.recordPtr &&
      descriptor.dataPtr   === slot.dataPtr &&
      samples.length       === slot.sampleCount;
  });
}

function planSourceLayout(container: Container, source: SourceLayout): ContainerLayout {
  const slots = source.channels;
  const ptrOf = (i: number): number => slots[i]?.recordPtr ?? 0;

  const channels = container.channels.map((channel, i): ChannelLayout => ({
    channel,
    recordPtr:   ptrOf(i),
    prevPtr:     ptrOf(i - 1),
    nextPtr:     ptrOf(i + 1),
    dataPtr:     channel.descriptor.dataPtr,
    dataLength:  channel.samples.byteLength,
    sampleCount: channel.samples.length,
  }));

  return {
    eventPtr:   container.header.eventPtr,
    venuePtr:   source.venuePtr,
    vehiclePtr: source.vehiclePtr,
    catalogPtr: container.header.catalogPtr,
    dataPtr:    container.header.dataPtr,
    channels,
    gaps:       source.gaps,
    totalBytes: source.length,
  };
}

function planPackedLayout(container: Container): ContainerLayout {
  let cursor = HEADER_SIZE;

  let eventPtr   = 0;
  let venuePtr   = 0;
  let vehiclePtr = 0;

  const event = container.event;
  if (event !== undefined) {
    eventPtr = cursor;
    cursor  += EVENT_SIZE;
    if (event.venue !== undefined) {
      venuePtr = cursor;
      cursor  += VENUE_SIZE;
      if (event.venue.vehicle !== undefined) {
        vehiclePtr = cursor;
        cursor    += VEHICLE_SIZE;
      }
    }
  }

  const count       = container.channels.length;
  const catalogPtr  = count > 0 ? cursor : 0;
  const recordPtrOf = (i: number): number => catalogPtr + i * CHANNEL_RECORD_SIZE;

  cursor += count * CHANNEL_RECORD_SIZE;
  const dataPtr = count > 0 ? cursor : 0;

  const channels = container.channels.map((channel, i): ChannelLayout => {
    const { samples } = channel;
    const slot: ChannelLayout = {
      channel,
      recordPtr:   recordPtrOf(i),
      prevPtr:     i > 0 ? recordPtrOf(i - 1) : 0,
      nextPtr:     i < count - 1 ? recordPtrOf(i + 1) : 0,
      dataPtr:     cursor,
      dataLength:  samples.byteLength,
      sampleCount: samples.length,
    };
    cursor += samples.byteLength;
    return slot;
  });

  return { eventPtr, venuePtr, vehiclePtr, catalogPtr, dataPtr, channels, gaps: [], totalBytes: cursor };
}

/**
 * Assign every region its offset in the output file: the source layout when
 * it still fits, the canonical packed layout otherwise.
 *
 * @throws TypeError if a channel's sample buffer does not hold values of its
 *                   descriptor's type.
 */
export function planLayout(container: Container): ContainerLayout {
  assertBufferTypes(container);
  const source = container.source;
  return source !== undefined && sourceLayoutFits(container, source)
    ? planSourceLayout(container, source)
    : planPackedLayout(container);
}

// ─── writeContainer ───────────────────────────────────────────────────────────

/** Serialize `container` in the layout planLayout() chooses. */
export function writeContainer(container: Container): Uint8Array {
  const layout = planLayout(container);
  const out    = new Uint8Array(layout.totalBytes);

  for (const gap of layout.gaps) out.set(gap.bytes, gap.offset);

  out.set(
    encodeHeader(container.header, {
      catalogPtr:  layout.catalogPtr,
      dataPtr:     layout.dataPtr,
      eventPtr:    layout.eventPtr,
      recordCount: layout.channels.length,
    }),
    0,
  );

  const event = container.event;
  if (event !== undefined) {
    out.set(encodeEvent(event, layout.venuePtr), layout.eventPtr);
    if (event.venue !== undefined) {
      out.set(encodeVenue(event.venue, layout.vehiclePtr), layout.venuePtr);
      if (event.venue.vehicle !== undefined) {
        out.set(encodeVehicle(event.venue.vehicle), layout.vehiclePtr);
      }
    }
  }

  for (const slot of layout.channels) {
    out.set(
      encodeChannelRecord(slot.channel.descriptor, {
        prevPtr:     slot.prevPtr,
        nextPtr:     slot.nextPtr,
        dataPtr:     slot.dataPtr,
        sampleCount: slot.sampleCount,
      }),
      slot.recordPtr,
    );
    out.set(sampleBytes(slot.channel.samples), slot.dataPtr);
  }

  return out;
}
