/**
 * @lapcut/core — container construction and lookup
 */

import { createEvent, createHeader, type EventInit, type HeaderInit } from './header';
import type { Channel, Container } from './types';

export interface ContainerInit {
  header?:  HeaderInit;
  /** Session chain; omitted means the header's event pointer stays 0. */
  event?:   EventInit;
  channels: readonly Channel[];
}

/**
 * Build a container from scratch, e.g. for fixtures or converters.
 * Pointers are left at zero; writeContainer() assigns all of them.
 *
 * Usage:
 *   const container = createContainer({
 *     header: { driver: 'Test Driver', venue: 'Test Circuit' },
 *     event:  { name: 'Practice', venue: { name: 'Test Circuit' } },
 *     channels: [createChannel({ name: 'Throttle Pos', type: 'i16', frequency: 20, samples: [0, 50, 100] })],
 *   });
 */
export function createContainer(init: ContainerInit): Container {
  const header   = { ...createHeader(init.header), recordCount: init.channels.length };
  const channels = [...init.channels];
  return init.event !== undefined
    ? { header, event: createEvent(init.event), channels }
    : { header, channels };
}

/** First channel named `name` (exact match), or undefined. */
export function findChannel(container: Container, name: string): Channel | undefined {
  return container.channels.find(c => c.descriptor.name === name);
}
