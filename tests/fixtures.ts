/**
 * In-process fixtures shared by the test files. Every container is built
 * with createContainer()/createChannel(); nothing is read from disk.
 */

import { createChannel, createContainer } from '../src/index';
import type { Container } from '../src/index';

/** `length` samples whose raw value equals their index. */
export function ramp(length: number): number[] {
  return Array.from({ length }, (_, i) => i);
}

/**
 * A 100-second session:
 *   0  Ground Speed  i16   10 Hz   1000 samples  km/h, 1 decimal
 *   1  Engine RPM    i32  100 Hz  10000 samples
 *   2  Brake Temp    f32    1 Hz      5 samples  (ends at t = 5 s)
 */
export function sessionContainer(withSession = true): Container {
  const channels = [
    createChannel({
      name: 'Ground Speed', shortName: 'Speed', unit: 'km/h',
      type: 'i16', frequency: 10, samples: ramp(1000),
      conversion: { decimals: 1 },
    }),
    createChannel({
      name: 'Engine RPM', shortName: 'RPM', unit: 'rpm',
      type: 'i32', frequency: 100, samples: ramp(10000),
    }),
    createChannel({
      name: 'Brake Temp', unit: 'C',
      type: 'f32', frequency: 1, samples: [310.5, 312.25, 315, 318.75, 320],
    }),
  ];

  return createContainer({
    header: {
      driver:  'Test Driver',
      vehicle: 'Test Car',
      venue:   'Test Circuit',
      date:    '18/10/2026',
      time:    '14:05:09',
    },
    ...(withSession ? {
      event: {
        name:    'Practice',
        session: '1',
        comment: 'dry',
        venue:   { name: 'Test Circuit', vehicle: { id: 'Test Car', weight: 1250, type: 'GT' } },
      },
    } : {}),
    channels,
  });
}

/** A companion file with one Marker per entry of `times`. */
export function markerXml(times: readonly (number | string)[], group = 'MarkerGroup'): Uint8Array {
  const markers = times
    .map((t, i) =>
      `     <Marker Version="100" ClassName="BCN" Name="Manual.${i + 1}" Flags="77" Time="${t}"/>`)
    .join('\n');
  const xml = [
    '<?xml version="1.0"?>',
    '<LDXFile Locale="English_United States.1252" DefaultLocale="C" Version="1.6">',
    ' <Layers>',
    '  <Layer>',
    '   <MarkerBlock>',
    `    <${group} Name="Beacons" Index="3">`,
    markers,
    `    </${group}>`,
    '   </MarkerBlock>',
    '  </Layer>',
    ' </Layers>',
    '</LDXFile>',
  ].join('\n');
  return new TextEncoder().encode(xml);
}
