/**
 * @lapcut/core — header and session-block codecs
 *
 *   decodeHeader()  — typed view over a header-sized byte slice
 *   encodeHeader()  — header template with caller-supplied pointers patched in
 *   createHeader()  — header built from scratch with the logger's defaults
 *
 * The same trio exists for the Event → Venue → Vehicle session chain.
 *
 * Decoders never look past their own slice: following pointers, bounds
 * checks and overlap checks belong to the reader, which knows the file.
 */

import {
  LD_MARKER,
  HEADER_SIZE,
  OFFSET_MARKER,
  OFFSET_CATALOG_PTR,
  OFFSET_DATA_PTR,
  OFFSET_EVENT_PTR,
  OFFSET_STATIC_A,
  OFFSET_STATIC_B,
  OFFSET_STATIC_C,
  OFFSET_DEVICE_SERIAL,
  OFFSET_DEVICE_TYPE,
  OFFSET_DEVICE_VERSION,
  OFFSET_STATIC_D,
  OFFSET_CHANNEL_COUNT,
  OFFSET_DATE,
  OFFSET_TIME,
  OFFSET_DRIVER,
  OFFSET_VEHICLE,
  OFFSET_VENUE,
  OFFSET_PRO_LOGGING,
  OFFSET_SHORT_COMMENT,
  WIDTH_DEVICE_TYPE,
  WIDTH_DATE,
  WIDTH_TIME,
  WIDTH_DRIVER,
  WIDTH_VEHICLE,
  WIDTH_VENUE,
  WIDTH_SHORT_COMMENT,
  DEFAULT_STATIC_A,
  DEFAULT_STATIC_B,
  DEFAULT_STATIC_C,
  DEFAULT_DEVICE_SERIAL,
  DEFAULT_DEVICE_TYPE,
  DEFAULT_DEVICE_VERSION,
  DEFAULT_STATIC_D,
  DEFAULT_PRO_LOGGING,
  EVENT_SIZE,
  OFFSET_EVENT_NAME,
  OFFSET_EVENT_SESSION,
  OFFSET_EVENT_COMMENT,
  OFFSET_EVENT_VENUE_PTR,
  WIDTH_EVENT_NAME,
  WIDTH_EVENT_SESSION,
  WIDTH_EVENT_COMMENT,
  VENUE_SIZE,
  OFFSET_VENUE_NAME,
  OFFSET_VENUE_VEHICLE_PTR,
  WIDTH_VENUE_NAME,
  VEHICLE_SIZE,
  OFFSET_VEHICLE_ID,
  OFFSET_VEHICLE_WEIGHT,
  OFFSET_VEHICLE_TYPE,
  OFFSET_VEHICLE_COMMENT,
  WIDTH_VEHICLE_ID,
  WIDTH_VEHICLE_TYPE,
  WIDTH_VEHICLE_COMMENT,
  MAX_SHORT_PTR,
} from './constants';
import { UnsupportedFormatError } from './errors';
import { copyBytes, readText, viewOf, writeText } from './fields';
import type { Header, SessionEvent, SessionVehicle, SessionVenue } from './types';

// ─── Header ───────────────────────────────────────────────────────────────────

/** Layout fields the writer derives; everything else comes from the Header. */
export interface HeaderPointers {
  readonly catalogPtr:  number;
  readonly dataPtr:     number;
  readonly eventPtr:    number;
  readonly recordCount: number;
}

export interface HeaderInit {
  deviceSerial?:  number;
  deviceType?:    string;
  deviceVersion?: number;
  date?:          string;
  time?:          string;
  driver?:        string;
  vehicle?:       string;
  venue?:         string;
  shortComment?:  string;
}

/**
 * Decode the header from the first HEADER_SIZE bytes of `bytes`.
 * The caller has already checked that the file is at least that long.
 *
 * @throws UnsupportedFormatError when the magic marker is not LD_MARKER.
 */
export function decodeHeader(bytes: Uint8Array): Header {
  const template = copyBytes(bytes, 0, HEADER_SIZE);
  const view     = viewOf(template);

  const marker = view.getUint32(OFFSET_MARKER, true);
  if (marker !== LD_MARKER) {
    throw new UnsupportedFormatError(
      `Invalid marker: got 0x${marker.toString(16).padStart(8, '0')}; ` +
      `expected 0x${LD_MARKER.toString(16).padStart(8, '0')}. ` +
      `This is not an .ld telemetry container.`,
      { offset: OFFSET_MARKER, expected: LD_MARKER, actual: marker },
    );
  }

  return {
    marker,
    catalogPtr:    view.getUint32(OFFSET_CATALOG_PTR,    true),
    dataPtr:       view.getUint32(OFFSET_DATA_PTR,       true),
    eventPtr:      view.getUint32(OFFSET_EVENT_PTR,      true),
    recordCount:   view.getUint32(OFFSET_CHANNEL_COUNT,  true),
    deviceSerial:  view.getUint32(OFFSET_DEVICE_SERIAL,  true),
    deviceType:    readText(template, OFFSET_DEVICE_TYPE, WIDTH_DEVICE_TYPE),
    deviceVersion: view.getUint16(OFFSET_DEVICE_VERSION, true),
    date:          readText(template, OFFSET_DATE,          WIDTH_DATE),
    time:          readText(template, OFFSET_TIME,          WIDTH_TIME),
    driver:        readText(template, OFFSET_DRIVER,        WIDTH_DRIVER),
    vehicle:       readText(template, OFFSET_VEHICLE,       WIDTH_VEHICLE),
    venue:         readText(template, OFFSET_VENUE,         WIDTH_VENUE),
    shortComment:  readText(template, OFFSET_SHORT_COMMENT, WIDTH_SHORT_COMMENT),
    template,
  };
}

/**
 * Serialize `header` with the layout fields taken from `pointers`.
 * The Header's own catalogPtr/dataPtr/eventPtr/recordCount are ignored:
 * they describe the file it was read from, not the one being written.
 */
export function encodeHeader(header: Header, pointers: HeaderPointers): Uint8Array {
  if (header.template.length !== HEADER_SIZE) {
    throw new RangeError(
      `Header template is ${header.template.length} bytes; expected ${HEADER_SIZE}.`,
    );
  }

  const out  = copyBytes(header.template);
  const view = viewOf(out);

  view.setUint32(OFFSET_MARKER,        header.marker,        /* le */ true);
  view.setUint32(OFFSET_CATALOG_PTR,   pointers.catalogPtr,           true);
  view.setUint32(OFFSET_DATA_PTR,      pointers.dataPtr,              true);
  view.setUint32(OFFSET_EVENT_PTR,     pointers.eventPtr,             true);
  view.setUint32(OFFSET_DEVICE_SERIAL, header.deviceSerial,           true);
  view.setUint16(OFFSET_DEVICE_VERSION, header.deviceVersion,         true);
  view.setUint32(OFFSET_CHANNEL_COUNT, pointers.recordCount,          true);

  writeText(out, OFFSET_DEVICE_TYPE,   WIDTH_DEVICE_TYPE,   header.deviceType,   'deviceType');
  writeText(out, OFFSET_DATE,          WIDTH_DATE,          header.date,         'date');
  writeText(out, OFFSET_TIME,          WIDTH_TIME,          header.time,         'time');
  writeText(out, OFFSET_DRIVER,        WIDTH_DRIVER,        header.driver,       'driver');
  writeText(out, OFFSET_VEHICLE,       WIDTH_VEHICLE,       header.vehicle,      'vehicle');
  writeText(out, OFFSET_VENUE,         WIDTH_VENUE,         header.venue,        'venue');
  writeText(out, OFFSET_SHORT_COMMENT, WIDTH_SHORT_COMMENT, header.shortComment, 'shortComment');

  return out;
}

/**
 * Build a header from scratch. The static words the logging device always
 * writes are filled in; pointers and record count start at zero and are
 * assigned by the writer.
 */
export function createHeader(init: HeaderInit = {}): Header {
  const template = new Uint8Array(HEADER_SIZE);
  const view     = viewOf(template);

  view.setUint32(OFFSET_MARKER,      LD_MARKER,           true);
  view.setUint16(OFFSET_STATIC_A,    DEFAULT_STATIC_A,    true);
  view.setUint16(OFFSET_STATIC_B,    DEFAULT_STATIC_B,    true);
  view.setUint16(OFFSET_STATIC_C,    DEFAULT_STATIC_C,    true);
  view.setUint16(OFFSET_STATIC_D,    DEFAULT_STATIC_D,    true);
  view.setUint32(OFFSET_PRO_LOGGING, DEFAULT_PRO_LOGGING, true);

  return {
    marker:        LD_MARKER,
    catalogPtr:    0,
    dataPtr:       0,
    eventPtr:      0,
    recordCount:   0,
    deviceSerial:  init.deviceSerial  ?? DEFAULT_DEVICE_SERIAL,
    deviceType:    init.deviceType    ?? DEFAULT_DEVICE_TYPE,
    deviceVersion: init.deviceVersion ?? DEFAULT_DEVICE_VERSION,
    date:          init.date          ?? '',
    time:          init.time          ?? '',
    driver:        init.driver        ?? '',
    vehicle:       init.vehicle       ?? '',
    venue:         init.venue         ?? '',
    shortComment:  init.shortComment  ?? '',
    template,
  };
}

/**
 * Session start as a UTC Date, from the header's "dd/mm/yyyy" date and
 * "HH:MM:SS" time fields. Undefined when either field does not parse.
 */
export function sessionStart(header: Header): Date | undefined {
  const date = /^\s*(\d{1,2})\/(\d{1,2})\/(\d{4})\s*$/.exec(header.date);
  const time = /^\s*(\d{1,2}):(\d{2})(?::(\d{2}))?\s*$/.exec(header.time);
  if (date === null || time === null) return undefined;

  const [, dd, mm, yyyy] = date;
  const [, hh, mi, ss]   = time;
  const ms = Date.UTC(
    Number(yyyy), Number(mm) - 1, Number(dd),
    Number(hh), Number(mi), Number(ss ?? 0),
  );
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

// ─── Session chain ────────────────────────────────────────────────────────────
//
// Each decoder returns the pointer to the next block alongside the record so
// the reader can follow the chain with its own bounds checks.

export interface Decoded<T> {
  readonly value:   T;
  readonly nextPtr: number;
}

export type EventFields   = Omit<SessionEvent,   'venue'>;
export type VenueFields   = Omit<SessionVenue,   'vehicle'>;

export function decodeEvent(bytes: Uint8Array): Decoded<EventFields> {
  const template = copyBytes(bytes, 0, EVENT_SIZE);
  return {
    value: {
      name:    readText(template, OFFSET_EVENT_NAME,    WIDTH_EVENT_NAME),
      session: readText(template, OFFSET_EVENT_SESSION, WIDTH_EVENT_SESSION),
      comment: readText(template, OFFSET_EVENT_COMMENT, WIDTH_EVENT_COMMENT),
      template,
    },
    nextPtr: viewOf(template).getUint16(OFFSET_EVENT_VENUE_PTR, true),
  };
}

export function decodeVenue(bytes: Uint8Array): Decoded<VenueFields> {
  const template = copyBytes(bytes, 0, VENUE_SIZE);
  return {
    value:   { name: readText(template, OFFSET_VENUE_NAME, WIDTH_VENUE_NAME), template },
    nextPtr: viewOf(template).getUint16(OFFSET_VENUE_VEHICLE_PTR, true),
  };
}

export function decodeVehicle(bytes: Uint8Array): SessionVehicle {
  const template = copyBytes(bytes, 0, VEHICLE_SIZE);
  return {
    id:      readText(template, OFFSET_VEHICLE_ID,      WIDTH_VEHICLE_ID),
    weight:  viewOf(template).getUint32(OFFSET_VEHICLE_WEIGHT, true),
    type:    readText(template, OFFSET_VEHICLE_TYPE,    WIDTH_VEHICLE_TYPE),
    comment: readText(template, OFFSET_VEHICLE_COMMENT, WIDTH_VEHICLE_COMMENT),
    template,
  };
}

function checkShortPtr(ptr: number, label: string): void {
  if (ptr > MAX_SHORT_PTR) {
    throw new RangeError(
      `${label} ${ptr} does not fit the u16 pointer field (max ${MAX_SHORT_PTR}).`,
    );
  }
}

export function encodeEvent(event: SessionEvent, venuePtr: number): Uint8Array {
  checkShortPtr(venuePtr, 'venue pointer');
  const out = copyBytes(event.template);
  writeText(out, OFFSET_EVENT_NAME,    WIDTH_EVENT_NAME,    event.name,    'event name');
  writeText(out, OFFSET_EVENT_SESSION, WIDTH_EVENT_SESSION, event.session, 'event session');
  writeText(out, OFFSET_EVENT_COMMENT, WIDTH_EVENT_COMMENT, event.comment, 'event comment');
  viewOf(out).setUint16(OFFSET_EVENT_VENUE_PTR, venuePtr, true);
  return out;
}

export function encodeVenue(venue: SessionVenue, vehiclePtr: number): Uint8Array {
  checkShortPtr(vehiclePtr, 'vehicle pointer');
  const out = copyBytes(venue.template);
  writeText(out, OFFSET_VENUE_NAME, WIDTH_VENUE_NAME, venue.name, 'venue name');
  viewOf(out).setUint16(OFFSET_VENUE_VEHICLE_PTR, vehiclePtr, true);
  return out;
}

export function encodeVehicle(vehicle: SessionVehicle): Uint8Array {
  const out = copyBytes(vehicle.template);
  writeText(out, OFFSET_VEHICLE_ID,      WIDTH_VEHICLE_ID,      vehicle.id,      'vehicle id');
  viewOf(out).setUint32(OFFSET_VEHICLE_WEIGHT, vehicle.weight, true);
  writeText(out, OFFSET_VEHICLE_TYPE,    WIDTH_VEHICLE_TYPE,    vehicle.type,    'vehicle type');
  writeText(out, OFFSET_VEHICLE_COMMENT, WIDTH_VEHICLE_COMMENT, vehicle.comment, 'vehicle comment');
  return out;
}

export interface EventInit {
  name?:    string;
  session?: string;
  comment?: string;
  venue?:   { name?: string; vehicle?: { id?: string; weight?: number; type?: string; comment?: string } };
}

/** Build a session chain from scratch. */
export function createEvent(init: EventInit = {}): SessionEvent {
  const venueInit   = init.venue;
  const vehicleInit = venueInit?.vehicle;

  const vehicle: SessionVehicle | undefined = vehicleInit && {
    id:       vehicleInit.id      ?? '',
    weight:   vehicleInit.weight  ?? 0,
    type:     vehicleInit.type    ?? '',
    comment:  vehicleInit.comment ?? '',
    template: new Uint8Array(VEHICLE_SIZE),
  };
  const venue: SessionVenue | undefined = venueInit && {
    name:     venueInit.name ?? '',
    template: new Uint8Array(VENUE_SIZE),
    ...(vehicle && { vehicle }),
  };

  return {
    name:     init.name    ?? '',
    session:  init.session ?? '',
    comment:  init.comment ?? '',
    template: new Uint8Array(EVENT_SIZE),
    ...(venue && { venue }),
  };
}
