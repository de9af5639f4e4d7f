/**
 * @lapcut/core — channel slicer
 *
 * Cuts every channel of a container down to one wall-clock window. Channels
 * are sampled at different rates, so each one gets its own index range:
 *
 *   start = floor(startTime × frequency)
 *   end   = floor(endTime   × frequency)      both clamped to [0, sampleCount]
 *
 * A 10 Hz and a 100 Hz channel cut to [10, 22.5) keep samples 100..224 and
 * 1000..2249 respectively.
 */

import { InvalidWindowError } from './errors';
import type { Channel, Container, TimeWindow } from './types';

export interface SampleRange {
  /** Inclusive. */
  readonly start: number;
  /** Exclusive. */
  readonly end:   number;
}

function indexAt(time: number, frequency: number, sampleCount: number): number {
  const index = Math.floor(time * frequency);
  return Math.min(Math.max(index, 0), sampleCount);
}

export function assertWindow(window: TimeWindow): void {
  const { startTime, endTime } = window;
  if (!Number.isFinite(startTime) || !Number.isFinite(endTime) || endTime <= startTime) {
    throw new InvalidWindowError(
      `Time window [${startTime}, ${endTime}) is empty or not finite; ` +
      `endTime must be greater than startTime.`,
      { startTime, endTime },
    );
  }
}

/** Sample indices [start, end) of a channel that fall inside `window`. */
export function sampleRange(
  frequency:   number,
  sampleCount: number,
  window:      TimeWindow,
): SampleRange {
  assertWindow(window);
  return {
    start: indexAt(window.startTime, frequency, sampleCount),
    end:   indexAt(window.endTime,   frequency, sampleCount),
  };
}

function sliceChannel(channel: Channel, window: TimeWindow): Channel {
  const { descriptor, samples } = channel;
  const { start, end } = sampleRange(descriptor.frequency, samples.length, window);
  const sliced = samples.slice(start, end);
  return {
    descriptor: { ...descriptor, sampleCount: sliced.length },
    samples:    sliced,
  };
}

/**
 * A new container holding only the samples inside `window`.
 *
 * Every channel is kept, including those left with zero samples, so the
 * channel list of the output matches the input. Session fields are carried
 * over unchanged. The input container is not modified.
 *
 * @throws InvalidWindowError if endTime <= startTime or a bound is not finite.
 */
export function sliceContainer(container: Container, window: TimeWindow): Container {
  assertWindow(window);

  const channels = container.channels.map(c => sliceChannel(c, window));
  const header   = { ...container.header, recordCount: channels.length };
  return container.event !== undefined
    ? { header, event: container.event, channels }
    : { header, channels };
}
