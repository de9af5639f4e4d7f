/**
 * @lapcut/core — lap boundaries
 *
 * Beacon markers are cumulative crossing times. Lap i runs from marker i to
 * marker i + 1, so consecutive laps share a boundary and together cover
 * [first marker, last marker] with no gaps.
 */

import {
  EmptyMarkerSetError,
  LapIndexOutOfRangeError,
  MalformedMarkerFileError,
} from './errors';
import type { LapBoundary, LapSelector, Marker } from './types';

export interface LapOptions {
  /**
   * Count the stretch from session start (t = 0) to the first marker as a
   * lap of its own. Has no effect when the first marker is already at 0.
   */
  fromSessionStart?: boolean;
}

/**
 * @throws EmptyMarkerSetError      fewer than two markers
 * @throws MalformedMarkerFileError a timestamp is not finite or not
 *                                  strictly greater than the one before it
 */
export function assertMarkers(markers: readonly Marker[]): void {
  if (markers.length < 2) {
    throw new EmptyMarkerSetError(
      `Found ${markers.length} marker(s); at least two are needed to bound a lap.`,
      { markerCount: markers.length },
    );
  }

  let previous: Marker | undefined;
  for (const [index, marker] of markers.entries()) {
    if (!Number.isFinite(marker.time)) {
      throw new MalformedMarkerFileError(
        `Marker ${index} ('${marker.name}') has non-finite time ${marker.time}.`,
        { index, time: marker.time },
      );
    }
    if (previous !== undefined && marker.time <= previous.time) {
      throw new MalformedMarkerFileError(
        `Marker ${index} ('${marker.name}') at ${marker.time} s does not come after ` +
        `marker ${index - 1} at ${previous.time} s; beacon times must be strictly increasing.`,
        { index, time: marker.time, previousTime: previous.time },
      );
    }
    previous = marker;
  }
}

export function computeLaps(markers: readonly Marker[], options: LapOptions = {}): LapBoundary[] {
  const first  = markers[0];
  const bounds = options.fromSessionStart && first !== undefined && first.time > 0
    ? [{ name: 'session start', time: 0 }, ...markers]
    : markers;

  assertMarkers(bounds);

  const laps: LapBoundary[] = [];
  let start: Marker | undefined;
  for (const marker of bounds) {
    if (start !== undefined) {
      laps.push({
        index:     laps.length,
        startTime: start.time,
        endTime:   marker.time,
        duration:  marker.time - start.time,
      });
    }
    start = marker;
  }
  return laps;
}

/**
 * Pick one lap: by index, or the one with the smallest duration (ties go to
 * the earliest start).
 *
 * @throws EmptyMarkerSetError     when `laps` is empty
 * @throws LapIndexOutOfRangeError when the index is not an integer in
 *                                 [0, laps.length)
 */
export function selectLap(laps: readonly LapBoundary[], selector: LapSelector): LapBoundary {
  if (laps.length === 0) {
    throw new EmptyMarkerSetError('No laps to select from.', { lapCount: 0 });
  }

  if (selector === 'fastest') {
    return laps.reduce((best, lap) =>
      lap.duration < best.duration ||
      (lap.duration === best.duration && lap.startTime < best.startTime)
        ? lap
        : best,
    );
  }

  const lap = Number.isInteger(selector) ? laps[selector] : undefined;
  if (lap === undefined) {
    throw new LapIndexOutOfRangeError(
      `Lap ${selector} does not exist; the session has ${laps.length} lap(s) ` +
      `(indices 0..${laps.length - 1}).`,
      { requested: selector, lapCount: laps.length },
    );
  }
  return lap;
}

/** Lap time as M:SS.mmm, e.g. 103.521 → "1:43.521". */
export function formatLapTime(seconds: number): string {
  const totalMs = Math.round(seconds * 1000);
  const minutes = Math.floor(totalMs / 60_000);
  const rest    = (totalMs - minutes * 60_000) / 1000;
  return `${minutes}:${rest.toFixed(3).padStart(6, '0')}`;
}
