// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  SampleType,
  SampleBufferMap,
  SampleBuffer,
  Header,
  SessionEvent,
  SessionVenue,
  SessionVehicle,
  ChannelConversion,
  ChannelDescriptor,
  Channel,
  Container,
  Marker,
  LapBoundary,
  LapSelector,
  TimeWindow,
  TimeUnit,
} from './types';

export { SAMPLE_BYTE_WIDTHS } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  LD_MARKER,
  HEADER_SIZE,
  EVENT_SIZE,
  VENUE_SIZE,
  VEHICLE_SIZE,
  CHANNEL_RECORD_SIZE,
  OFFSET_MARKER,
  OFFSET_CATALOG_PTR,
  OFFSET_DATA_PTR,
  OFFSET_EVENT_PTR,
  OFFSET_CHANNEL_COUNT,
  OFFSET_EVENT_VENUE_PTR,
  OFFSET_VENUE_VEHICLE_PTR,
  OFFSET_CH_PREV_PTR,
  OFFSET_CH_NEXT_PTR,
  OFFSET_CH_DATA_PTR,
  OFFSET_CH_SAMPLE_COUNT,
  OFFSET_CH_TYPE_CLASS,
  OFFSET_CH_TYPE_WIDTH,
  TYPE_CLASS_INT_CODES,
  TYPE_CLASS_FLOAT,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  LapcutError,
  MalformedMarkerFileError,
  EmptyMarkerSetError,
  LapIndexOutOfRangeError,
  InvalidWindowError,
  TruncatedFileError,
  UnknownDataTypeError,
  OverlappingRegionsError,
  UnsupportedFormatError,
  InvalidOptionsError,
} from './errors';
export type { ErrorContext, LapcutErrorCode } from './errors';

// ─── Header & session ─────────────────────────────────────────────────────────
export { createHeader, createEvent, sessionStart } from './header';
export type { HeaderInit, EventInit } from './header';

// ─── Catalog & samples ────────────────────────────────────────────────────────
export { createChannel, resolveSampleType } from './catalog';
export type { ChannelInit } from './catalog';
export { physicalValues, decodeHalf } from './samples';

// ─── Container ────────────────────────────────────────────────────────────────
export { readContainer } from './reader';
export { createContainer, findChannel } from './container';
export type { ContainerInit } from './container';
export { sliceContainer, sampleRange } from './slicer';
export type { SampleRange } from './slicer';
export { writeContainer, planLayout } from './writer';
export type { ChannelLayout, ContainerLayout } from './writer';

// ─── Markers & laps ───────────────────────────────────────────────────────────
export { parseMarkers, parseMarkerFile, writeMarkers } from './markers';
export type { MarkerFile } from './markers';
export { computeLaps, selectLap, formatLapTime } from './laps';
export type { LapOptions } from './laps';

// ─── Pipeline ─────────────────────────────────────────────────────────────────
export { extractLap, extractLapFiles, companionPath } from './extract';
export type {
  ExtractInput,
  ExtractResult,
  ExtractPaths,
  ExtractFilesResult,
} from './extract';

export {
  ExtractOptionsSchema,
  MarkerOptionsSchema,
  TimeUnitSchema,
  LogLevelSchema,
  LapSelectorSchema,
} from './config';
export type {
  ExtractOptions,
  ResolvedExtractOptions,
  MarkerOptions,
  LogLevel,
} from './config';

export { createLogger } from './logger';
export type { Logger } from './logger';
