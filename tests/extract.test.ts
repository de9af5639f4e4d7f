/**
 * @lapcut/core — extraction pipeline
 *
 * The session fixture runs for 100 s; markers at [10, 22.5, 32.5] give
 * lap 0 = [10, 22.5) (12.5 s) and lap 1 = [22.5, 32.5) (10 s, fastest).
 */

import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  InvalidOptionsError,
  LapIndexOutOfRangeError,
  companionPath,
  extractLap,
  extractLapFiles,
  parseMarkerFile,
  readContainer,
  writeContainer,
} from '../src/index';
import { markerXml, sessionContainer } from './fixtures';

const source  = writeContainer(sessionContainer());
const markers = markerXml([10, 22.5, 32.5]);

// ─── extractLap ───────────────────────────────────────────────────────────────

describe('extractLap', () => {
  it('extracts lap 0 with per-rate sample counts', () => {
    const result = extractLap({ container: source, markers }, { lap: 0, logLevel: 'silent' });

    expect(result.laps).toHaveLength(2);
    expect(result.lap).toEqual({ index: 0, startTime: 10, endTime: 22.5, duration: 12.5 });

    const out = readContainer(result.container);
    expect(out.channels.map(c => c.samples.length)).toEqual([125, 1250, 0]);
    expect(out.channels[0]?.samples[0]).toBe(100);
    expect(out.header.driver).toBe('Test Driver');
    expect(out.event?.venue?.vehicle?.id).toBe('Test Car');
  });

  it('defaults to the fastest lap', () => {
    const result = extractLap({ container: source, markers }, { logLevel: 'silent' });

    expect(result.lap.index).toBe(1);
    expect(result.sliced.channels.map(c => c.samples.length)).toEqual([100, 1000, 0]);
    expect(result.sliced.channels[1]?.samples[0]).toBe(2250);
  });

  it('writes a companion file describing the lap', () => {
    const result = extractLap({ container: source, markers }, { lap: 0, logLevel: 'silent' });
    const file   = parseMarkerFile(result.markers);

    expect(file.markers.map(m => m.time)).toEqual([0, 12.5]);
    expect(file.details['Fastest Time']).toBe('0:12.500');
  });

  it('returns exactly the bytes of the sliced container', () => {
    const result = extractLap({ container: source, markers }, { logLevel: 'silent' });
    expect(result.container).toEqual(writeContainer(result.sliced));
  });

  it('counts the out-lap with fromSessionStart', () => {
    const result = extractLap(
      { container: source, markers },
      { lap: 0, fromSessionStart: true, logLevel: 'silent' },
    );
    expect(result.laps).toHaveLength(3);
    expect(result.lap).toEqual({ index: 0, startTime: 0, endTime: 10, duration: 10 });
    expect(result.sliced.channels.map(c => c.samples.length)).toEqual([100, 1000, 5]);
  });

  it('reads microsecond markers and writes microsecond output', () => {
    const micro  = markerXml([10_000_000, 22_500_000, 32_500_000]);
    const result = extractLap(
      { container: source, markers: micro },
      { lap: 0, timeUnit: 'microseconds', logLevel: 'silent' },
    );
    expect(result.lap.duration).toBe(12.5);
    expect(new TextDecoder().decode(result.markers)).toContain('Time="12500000.000000"');
  });

  it('rejects an out-of-range lap', () => {
    expect(() => extractLap({ container: source, markers }, { lap: 5, logLevel: 'silent' }))
      .toThrow(LapIndexOutOfRangeError);
  });

  it('rejects invalid options before reading anything', () => {
    expect(() => extractLap({ container: new Uint8Array(0), markers }, { lap: 1.5 }))
      .toThrow(InvalidOptionsError);
  });
});

// ─── extractLapFiles ──────────────────────────────────────────────────────────

describe('extractLapFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lapcut-'));
    await writeFile(join(dir, 'session.ld'), source);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the container and its companion beside it', async () => {
    await writeFile(join(dir, 'session.ldx'), markers);

    const result = await extractLapFiles(
      { source: join(dir, 'session.ld'), output: join(dir, 'fastest.ld') },
      { logLevel: 'silent' },
    );

    expect(result.outputPath).toBe(join(dir, 'fastest.ld'));
    expect(result.markersPath).toBe(join(dir, 'fastest.ldx'));
    expect(new Uint8Array(await readFile(result.outputPath))).toEqual(result.container);
    expect(new Uint8Array(await readFile(result.markersPath))).toEqual(result.markers);
    expect((await readdir(dir)).sort()).toEqual(['fastest.ld', 'fastest.ldx', 'session.ld', 'session.ldx']);
  });

  it('reads markers from an explicit path', async () => {
    await writeFile(join(dir, 'beacons.xml'), markers);

    const result = await extractLapFiles(
      { source: join(dir, 'session.ld'), markers: join(dir, 'beacons.xml'), output: join(dir, 'lap0.ld') },
      { lap: 0, logLevel: 'silent' },
    );
    expect(result.lap.duration).toBe(12.5);
  });

  it('writes nothing when the companion file is missing', async () => {
    await expect(
      extractLapFiles({ source: join(dir, 'session.ld'), output: join(dir, 'out.ld') }, { logLevel: 'silent' }),
    ).rejects.toMatchObject({ code: 'ENOENT' });
    expect(await readdir(dir)).toEqual(['session.ld']);
  });

  it('writes nothing when the lap does not exist', async () => {
    await writeFile(join(dir, 'session.ldx'), markers);

    await expect(
      extractLapFiles({ source: join(dir, 'session.ld'), output: join(dir, 'out.ld') }, { lap: 7, logLevel: 'silent' }),
    ).rejects.toBeInstanceOf(LapIndexOutOfRangeError);
    expect((await readdir(dir)).sort()).toEqual(['session.ld', 'session.ldx']);
  });

  it('removes the container when its companion cannot be placed', async () => {
    await writeFile(join(dir, 'session.ldx'), markers);
    await mkdir(join(dir, 'out.ldx'));

    await expect(
      extractLapFiles({ source: join(dir, 'session.ld'), output: join(dir, 'out.ld') }, { logLevel: 'silent' }),
    ).rejects.toThrow();
    expect((await readdir(dir)).sort()).toEqual(['out.ldx', 'session.ld', 'session.ldx']);
  });

  it('rejects an output path that is its own companion', async () => {
    await writeFile(join(dir, 'session.ldx'), markers);

    await expect(
      extractLapFiles({ source: join(dir, 'session.ld'), output: join(dir, 'lap.ldx') }, { logLevel: 'silent' }),
    ).rejects.toBeInstanceOf(InvalidOptionsError);
    expect((await readdir(dir)).sort()).toEqual(['session.ld', 'session.ldx']);
  });
});

describe('companionPath', () => {
  it('swaps the extension for .ldx', () => {
    expect(companionPath(join('data', 'session.ld'))).toBe(join('data', 'session.ldx'));
    expect(companionPath('session')).toBe('session.ldx');
  });
});
