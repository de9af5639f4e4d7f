import { describe, it, expect } from 'vitest';
import {
  EmptyMarkerSetError,
  InvalidOptionsError,
  InvalidWindowError,
  MalformedMarkerFileError,
  MarkerOptionsSchema,
  parseMarkerFile,
  parseMarkers,
  writeMarkers,
} from '../src/index';
import { markerXml } from './fixtures';

const encode = (xml: string): Uint8Array => new TextEncoder().encode(xml);
const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

// ─── parseMarkers ─────────────────────────────────────────────────────────────

describe('parseMarkers', () => {
  it('reads markers in document order with times in seconds', () => {
    expect(parseMarkers(markerXml(['0.000000', '10.000000', '22.500000']))).toEqual([
      { name: 'Manual.1', time: 0 },
      { name: 'Manual.2', time: 10 },
      { name: 'Manual.3', time: 22.5 },
    ]);
  });

  it('reads markers grouped under the older Markers element', () => {
    expect(parseMarkers(markerXml([1.5, 80.25], 'Markers')).map(m => m.time)).toEqual([1.5, 80.25]);
  });

  it('converts microsecond times', () => {
    const bytes = markerXml([0, 10_000_000, 22_500_000]);
    expect(parseMarkers(bytes, { timeUnit: 'microseconds' }).map(m => m.time)).toEqual([0, 10, 22.5]);
  });

  it('collects markers from several groups', () => {
    const xml = '<LDXFile><Layers><Layer><MarkerBlock>' +
      '<MarkerGroup Name="Beacons"><Marker Time="1"/></MarkerGroup>' +
      '<MarkerGroup Name="Beacons"><Marker Time="2"/><Marker Time="3"/></MarkerGroup>' +
      '</MarkerBlock></Layer></Layers></LDXFile>';
    expect(parseMarkers(encode(xml))).toEqual([
      { name: '', time: 1 },
      { name: '', time: 2 },
      { name: '', time: 3 },
    ]);
  });

  it('keeps document order across differently named groups', () => {
    const xml = '<LDXFile><Layers><Layer><MarkerBlock>' +
      '<MarkerGroup Name="Beacons"><Marker Time="1"/></MarkerGroup>' +
      '<Markers><Marker Time="2"/></Markers>' +
      '<MarkerGroup Name="Beacons"><Marker Time="3"/></MarkerGroup>' +
      '</MarkerBlock></Layer></Layers></LDXFile>';
    expect(parseMarkers(encode(xml)).map(m => m.time)).toEqual([1, 2, 3]);
  });

  it('rejects markers [5, 3]', () => {
    expect(() => parseMarkers(markerXml([5, 3]))).toThrow(MalformedMarkerFileError);
  });

  it('rejects fewer than two markers', () => {
    expect(() => parseMarkers(markerXml([12.5]))).toThrow(EmptyMarkerSetError);
    expect(() => parseMarkers(markerXml([]))).toThrow(EmptyMarkerSetError);
  });

  it('rejects XML that is not well-formed', () => {
    expect(() => parseMarkers(encode('<LDXFile><Layers></LDXFile>'))).toThrow(MalformedMarkerFileError);
  });

  it('rejects a marker without a Time attribute', () => {
    const xml = '<LDXFile><Markers><Marker Time="1"/><Marker Name="Manual.2"/></Markers></LDXFile>';
    expect(() => parseMarkers(encode(xml))).toThrow('Marker 1 has no Time attribute.');
  });

  it('rejects a non-numeric Time', () => {
    expect(() => parseMarkers(markerXml(['0', 'soon']))).toThrow(MalformedMarkerFileError);
  });

  it('rejects unknown options', () => {
    expect(MarkerOptionsSchema.safeParse({ timeUnit: 'minutes' }).success).toBe(false);
    const options = { timeUnit: 'seconds' as const, strict: true };
    expect(() => parseMarkers(markerXml([0, 1]), options)).toThrow(InvalidOptionsError);
  });
});

// ─── parseMarkerFile ──────────────────────────────────────────────────────────

describe('parseMarkerFile', () => {
  it('returns the Details strings', () => {
    const xml = '<LDXFile><Layers>' +
      '<Layer><MarkerBlock><MarkerGroup><Marker Time="0"/><Marker Time="95.2"/></MarkerGroup></MarkerBlock></Layer>' +
      '<Details><String Id="Total Laps" Value="1"/><String Id="Fastest Time" Value="1:35.200"/></Details>' +
      '</Layers></LDXFile>';
    expect(parseMarkerFile(encode(xml)).details).toEqual({
      'Total Laps':   '1',
      'Fastest Time': '1:35.200',
    });
  });

  it('has empty details when the block is missing', () => {
    expect(parseMarkerFile(markerXml([0, 1])).details).toEqual({});
  });
});

// ─── writeMarkers ─────────────────────────────────────────────────────────────

describe('writeMarkers', () => {
  it('writes a one-lap file that parses back to [0, duration]', () => {
    const file = parseMarkerFile(writeMarkers(12.5));
    expect(file.markers).toEqual([
      { name: 'Manual.1', time: 0 },
      { name: 'Manual.2', time: 12.5 },
    ]);
    expect(file.details).toEqual({
      'Total Laps':   '1',
      'Fastest Time': '0:12.500',
      'Fastest Lap':  '1',
    });
  });

  it('writes times with six decimals', () => {
    const xml = decode(writeMarkers(103.521));
    expect(xml.startsWith('<?xml version="1.0"?>\n')).toBe(true);
    expect(xml).toContain('Time="103.521000"');
    expect(xml).toContain('Time="0.000000"');
  });

  it('writes microsecond times when asked', () => {
    const bytes = writeMarkers(12.5, { timeUnit: 'microseconds' });
    expect(decode(bytes)).toContain('Time="12500000.000000"');
    expect(parseMarkers(bytes, { timeUnit: 'microseconds' }).map(m => m.time)).toEqual([0, 12.5]);
  });

  it('rejects a zero, negative or non-finite duration', () => {
    expect(() => writeMarkers(0)).toThrow(InvalidWindowError);
    expect(() => writeMarkers(-4)).toThrow(InvalidWindowError);
    expect(() => writeMarkers(NaN)).toThrow(InvalidWindowError);
  });
});
