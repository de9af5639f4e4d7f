/**
 * @lapcut/core — lap extraction pipeline
 *
 * One call extracts one lap from one (container, companion) pair:
 *
 *   parse markers → compute laps → select lap → read container →
 *   slice every channel to the lap window → write container + companion
 *
 * Both output byte streams are complete before anything is returned or
 * written. Both files are staged under temp names and only then renamed into
 * place; a failed rename removes whichever output already landed.
 */

import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { resolveExtractOptions, type ExtractOptions, type ResolvedExtractOptions } from './config';
import { InvalidOptionsError } from './errors';
import { computeLaps, selectLap } from './laps';
import { createLogger, type Logger } from './logger';
import { parseMarkers, writeMarkers } from './markers';
import { readContainer } from './reader';
import { sliceContainer } from './slicer';
import type { Container, LapBoundary } from './types';
import { writeContainer } from './writer';

// ─── Public types ─────────────────────────────────────────────────────────────

export interface ExtractInput {
  /** Bytes of the `.ld` container. */
  readonly container: Uint8Array;
  /** Bytes of the `.ldx` companion file. */
  readonly markers:   Uint8Array;
}

export interface ExtractResult {
  readonly laps:      readonly LapBoundary[];
  readonly lap:       LapBoundary;
  /** The sliced container that `container` bytes were written from. */
  readonly sliced:    Container;
  readonly container: Uint8Array;
  readonly markers:   Uint8Array;
}

export interface ExtractPaths {
  readonly source:   string;
  /** Companion of `source`; defaults to `source` with an `.ldx` extension. */
  readonly markers?: string;
  /** Output container path; its companion is written beside it. */
  readonly output:   string;
}

export interface ExtractFilesResult extends ExtractResult {
  readonly outputPath:  string;
  readonly markersPath: string;
}

// ─── In-memory pipeline ───────────────────────────────────────────────────────

function runExtraction(
  input: ExtractInput,
  opts:  ResolvedExtractOptions,
  log:   Logger,
): ExtractResult {
  const beacons = parseMarkers(input.markers, { timeUnit: opts.timeUnit });
  const laps    = computeLaps(beacons, { fromSessionStart: opts.fromSessionStart });
  log.debug({ markers: beacons.length, laps: laps.length }, 'lap boundaries computed');

  const lap = selectLap(laps, opts.lap);
  log.debug(
    { lap: lap.index, startTime: lap.startTime, endTime: lap.endTime, duration: lap.duration },
    'lap selected',
  );

  const source = readContainer(input.container);
  const sliced = sliceContainer(source, { startTime: lap.startTime, endTime: lap.endTime });

  sliced.channels.forEach((channel, i) => {
    const before = source.channels[i]?.samples.length ?? 0;
    log.debug(
      { channel: channel.descriptor.name, frequency: channel.descriptor.frequency, before, after: channel.samples.length },
      'channel sliced',
    );
    if (before > 0 && channel.samples.length === 0) {
      log.warn({ channel: channel.descriptor.name }, 'channel has no samples inside the lap');
    }
  });

  const container = writeContainer(sliced);
  const markers   = writeMarkers(lap.duration, { timeUnit: opts.timeUnit });

  log.info(
    { lap: lap.index, duration: lap.duration, channels: sliced.channels.length, bytes: container.length },
    'lap extracted',
  );

  return { laps, lap, sliced, container, markers };
}

/**
 * Extract one lap from in-memory `.ld` and `.ldx` bytes.
 *
 * Throws any codec error (see errors.ts) or InvalidOptionsError; returns
 * nothing partial.
 */
export function extractLap(input: ExtractInput, options?: ExtractOptions): ExtractResult {
  const opts = resolveExtractOptions(options);
  return runExtraction(input, opts, createLogger('extract', opts.logLevel));
}

// ─── File pipeline ────────────────────────────────────────────────────────────

/** `session.ld` → `session.ldx`. */
export function companionPath(path: string): string {
  const ext = extname(path);
  return `${ext.length > 0 ? path.slice(0, -ext.length) : path}.ldx`;
}

interface PendingFile {
  readonly path:  string;
  readonly bytes: Uint8Array;
}

/**
 * Write every file to a sibling temp path, then rename them into place in
 * order. On failure no temp file is left and no output that was already
 * renamed survives.
 */
async function writeTogether(files: readonly PendingFile[]): Promise<void> {
  const staged = files.map(file => ({ ...file, temp: `${file.path}.${process.pid}.tmp` }));
  const placed: string[] = [];
  try {
    for (const file of staged) await writeFile(file.temp, file.bytes);
    for (const file of staged) {
      await rename(file.temp, file.path);
      placed.push(file.path);
    }
  } catch (err) {
    await Promise.all([
      ...staged.map(file => rm(file.temp, { force: true })),
      ...placed.map(path => rm(path, { force: true })),
    ]);
    throw err;
  }
}

/**
 * Extract one lap from files on disk and write the output pair.
 *
 * Usage:
 *   await extractLapFiles(
 *     { source: 'Spa-session-1.ld', output: 'Spa-fastest.ld' },
 *     { lap: 'fastest', timeUnit: 'microseconds' },
 *   );
 */
export async function extractLapFiles(
  paths:    ExtractPaths,
  options?: ExtractOptions,
): Promise<ExtractFilesResult> {
  const opts = resolveExtractOptions(options);
  const log  = createLogger('extract', opts.logLevel);

  const markersPath = companionPath(paths.output);
  if (resolve(markersPath) === resolve(paths.output)) {
    throw new InvalidOptionsError(
      `Output path ${paths.output} is its own companion; give the container an extension other than .ldx.`,
      { output: paths.output },
    );
  }

  const sourceMarkers = paths.markers ?? companionPath(paths.source);
  const [containerBytes, markerBytes] = await Promise.all([
    readFile(paths.source),
    readFile(sourceMarkers),
  ]);
  log.debug(
    { source: paths.source, markers: sourceMarkers, bytes: containerBytes.length },
    'input read',
  );

  const result = runExtraction({ container: containerBytes, markers: markerBytes }, opts, log);

  await writeTogether([
    { path: paths.output, bytes: result.container },
    { path: markersPath,  bytes: result.markers },
  ]);
  log.info({ output: paths.output, markers: markersPath }, 'output written');

  return { ...result, outputPath: paths.output, markersPath };
}
