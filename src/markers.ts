/**
 * @lapcut/core — `.ldx` companion file
 *
 * The companion file is XML. Beacon crossings are `Marker` elements with a
 * cumulative `Time` attribute; session statistics sit in a `Details` block:
 *
 *   <LDXFile>
 *    <Layers>
 *     <Layer>
 *      <MarkerBlock>
 *       <MarkerGroup Name="Beacons" Index="3">
 *        <Marker Version="100" ClassName="BCN" Name="Manual.1" Flags="77" Time="76.456000"/>
 *       </MarkerGroup>
 *      </MarkerBlock>
 *     </Layer>
 *     <Details>
 *      <String Id="Total Laps" Value="3"/>
 *     </Details>
 *    </Layers>
 *   </LDXFile>
 *
 * Markers are collected wherever they appear, in document order, so older
 * files that group them under `Markers` parse the same way.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { resolveMarkerOptions, type MarkerOptions } from './config';
import { InvalidWindowError, MalformedMarkerFileError } from './errors';
import { assertMarkers, formatLapTime } from './laps';
import type { Marker, TimeUnit } from './types';

// ─── Shared codec state ───────────────────────────────────────────────────────

const ATTR = '@_';

/** Key under which preserveOrder output keeps an element's attributes. */
const ATTRIBUTES = ':@';

// preserveOrder keeps sibling elements of different names in document order.
const parser = new XMLParser({
  preserveOrder:       true,
  ignoreAttributes:    false,
  attributeNamePrefix: ATTR,
  parseAttributeValue: false,
  parseTagValue:       false,
});

const builder = new XMLBuilder({
  ignoreAttributes:    false,
  attributeNamePrefix: ATTR,
  format:              true,
  indentBy:            ' ',
  suppressEmptyNode:   true,
});

const utf8Decoder = new TextDecoder();
const utf8Encoder = new TextEncoder();

const MICROS_PER_SECOND = 1_000_000;

const MarkerNodeSchema = z.object({
  '@_Time': z.string().trim().min(1),
  '@_Name': z.string().optional(),
});

const DetailNodeSchema = z.object({
  '@_Id':    z.string(),
  '@_Value': z.string(),
});

// ─── Tree walking ─────────────────────────────────────────────────────────────

interface XmlElement {
  readonly attributes: unknown;
  readonly children:   readonly unknown[];
}

/** Every element named `tag` in a preserveOrder node list, in document order. */
function collectElements(nodes: unknown, tag: string, out: XmlElement[] = []): XmlElement[] {
  if (!Array.isArray(nodes)) return out;
  const list: readonly unknown[] = nodes;

  for (const node of list) {
    if (node === null || typeof node !== 'object') continue;

    const entries: [string, unknown][] = Object.entries(node);
    const attributes = entries.find(([key]) => key === ATTRIBUTES)?.[1] ?? {};
    for (const [key, value] of entries) {
      if (key === ATTRIBUTES) continue;
      const children: readonly unknown[] = Array.isArray(value) ? value : [];
      if (key === tag) out.push({ attributes, children });
      else collectElements(children, tag, out);
    }
  }
  return out;
}

function parseDocument(bytes: Uint8Array): unknown {
  const xml    = utf8Decoder.decode(bytes);
  const result = XMLValidator.validate(xml);
  if (result !== true) {
    throw new MalformedMarkerFileError(
      `Marker file is not well-formed XML: ${result.err.msg} ` +
      `(line ${result.err.line}, column ${result.err.col}).`,
      { line: result.err.line, column: result.err.col, reason: result.err.code },
    );
  }
  const doc: unknown = parser.parse(xml);
  return doc;
}

function toSeconds(value: number, unit: TimeUnit): number {
  return unit === 'microseconds' ? value / MICROS_PER_SECOND : value;
}

function fromSeconds(seconds: number, unit: TimeUnit): number {
  return unit === 'microseconds' ? seconds * MICROS_PER_SECOND : seconds;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

export interface MarkerFile {
  readonly markers: readonly Marker[];
  /** `Details` String Id → Value pairs, e.g. "Total Laps" → "3". */
  readonly details: Readonly<Record<string, string>>;
}

/**
 * Parse a companion file into its markers and detail strings.
 *
 * @throws MalformedMarkerFileError not well-formed XML, a marker without a
 *                                  numeric Time, or times not strictly
 *                                  increasing
 * @throws EmptyMarkerSetError      fewer than two markers
 */
export function parseMarkerFile(bytes: Uint8Array, options?: MarkerOptions): MarkerFile {
  const { timeUnit } = resolveMarkerOptions(options);
  const doc = parseDocument(bytes);

  const markers = collectElements(doc, 'Marker').map((element, index): Marker => {
    const parsed = MarkerNodeSchema.safeParse(element.attributes);
    if (!parsed.success) {
      throw new MalformedMarkerFileError(
        `Marker ${index} has no Time attribute.`,
        { index },
      );
    }
    const raw   = parsed.data['@_Time'];
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new MalformedMarkerFileError(
        `Marker ${index} has Time="${raw}", which is not a number.`,
        { index, time: raw },
      );
    }
    return { name: parsed.data['@_Name'] ?? '', time: toSeconds(value, timeUnit) };
  });

  assertMarkers(markers);

  const details: Record<string, string> = {};
  for (const block of collectElements(doc, 'Details')) {
    for (const entry of collectElements(block.children, 'String')) {
      const parsed = DetailNodeSchema.safeParse(entry.attributes);
      if (parsed.success) {
        details[parsed.data['@_Id']] = parsed.data['@_Value'];
      }
    }
  }

  return { markers, details };
}

/** Ordered beacon markers of a companion file, times in seconds. */
export function parseMarkers(bytes: Uint8Array, options?: MarkerOptions): Marker[] {
  return [...parseMarkerFile(bytes, options).markers];
}

// ─── Writing ──────────────────────────────────────────────────────────────────

function markerNode(ordinal: number, seconds: number, unit: TimeUnit): Record<string, string> {
  return {
    '@_Version':   '100',
    '@_ClassName': 'BCN',
    '@_Name':      `Manual.${ordinal}`,
    '@_Flags':     '77',
    '@_Time':      fromSeconds(seconds, unit).toFixed(6),
  };
}

function detailNode(id: string, value: string): Record<string, string> {
  return { '@_Id': id, '@_Value': value };
}

/**
 * A companion file describing one lap of `duration` seconds: markers at 0
 * and at `duration`, with matching lap statistics.
 *
 * @throws InvalidWindowError if duration is not a finite positive number.
 */
export function writeMarkers(duration: number, options?: MarkerOptions): Uint8Array {
  const { timeUnit } = resolveMarkerOptions(options);

  if (!Number.isFinite(duration) || duration <= 0) {
    throw new InvalidWindowError(
      `Lap duration must be a finite number of seconds greater than 0; got ${duration}.`,
      { startTime: 0, endTime: duration },
    );
  }

  const doc = {
    LDXFile: {
      '@_Locale':        'English_United States.1252',
      '@_DefaultLocale': 'C',
      '@_Version':       '1.6',
      Layers: {
        Layer: {
          MarkerBlock: {
            MarkerGroup: {
              '@_Name':  'Beacons',
              '@_Index': '3',
              Marker: [markerNode(1, 0, timeUnit), markerNode(2, duration, timeUnit)],
            },
          },
          RangeBlock: '',
        },
        Details: {
          String: [
            detailNode('Total Laps',   '1'),
            detailNode('Fastest Time', formatLapTime(duration)),
            detailNode('Fastest Lap',  '1'),
          ],
        },
      },
    },
  };

  const xml = `<?xml version="1.0"?>\n${String(builder.build(doc))}`;
  return utf8Encoder.encode(xml);
}
