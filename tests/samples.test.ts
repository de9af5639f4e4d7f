import { describe, it, expect } from 'vitest';
import {
  createChannel,
  createContainer,
  decodeHalf,
  physicalValues,
  readContainer,
  resolveSampleType,
  writeContainer,
} from '../src/index';

describe('decodeHalf', () => {
  it('decodes normal, subnormal and special values', () => {
    expect(decodeHalf(0x3c00)).toBe(1);
    expect(decodeHalf(0xc000)).toBe(-2);
    expect(decodeHalf(0x3555)).toBeCloseTo(0.333251953125, 12);
    expect(decodeHalf(0x0001)).toBe(2 ** -24);
    expect(decodeHalf(0x0000)).toBe(0);
    expect(decodeHalf(0x7c00)).toBe(Infinity);
    expect(decodeHalf(0xfc00)).toBe(-Infinity);
    expect(decodeHalf(0x7e00)).toBeNaN();
  });
});

describe('resolveSampleType', () => {
  it('maps every supported (class, width) pair', () => {
    expect([0, 3, 5].map(c => resolveSampleType(c, 2))).toEqual(['i16', 'i16', 'i16']);
    expect([0, 3, 5].map(c => resolveSampleType(c, 4))).toEqual(['i32', 'i32', 'i32']);
    expect(resolveSampleType(7, 2)).toBe('f16');
    expect(resolveSampleType(7, 4)).toBe('f32');
  });

  it('returns undefined for anything else', () => {
    expect(resolveSampleType(1, 2)).toBeUndefined();
    expect(resolveSampleType(3, 8)).toBeUndefined();
    expect(resolveSampleType(7, 1)).toBeUndefined();
  });
});

describe('physicalValues', () => {
  it('applies decimals', () => {
    const channel = createChannel({
      name: 'Ground Speed', type: 'i16', frequency: 10, samples: [100, -250, 1234],
      conversion: { decimals: 1 },
    });
    const values = physicalValues(channel);
    expect(values[0]).toBeCloseTo(10, 12);
    expect(values[1]).toBeCloseTo(-25, 12);
    expect(values[2]).toBeCloseTo(123.4, 12);
  });

  it('applies scale, shift and multiplier in order', () => {
    const channel = createChannel({
      name: 'Oil Pressure', type: 'i32', frequency: 10, samples: [10, 0],
      conversion: { scale: 2, shift: 5, multiplier: 2 },
    });
    expect(Array.from(physicalValues(channel))).toEqual([20, 10]);
  });

  it('reads a scale of 0 as 1', () => {
    const channel = createChannel({
      name: 'Gear', type: 'i16', frequency: 5, samples: [7], conversion: { scale: 0 },
    });
    expect(Array.from(physicalValues(channel))).toEqual([7]);
  });

  it('decodes f16 samples after a round trip', () => {
    const container = createContainer({
      channels: [
        createChannel({ name: 'Steer', type: 'f16', frequency: 20, samples: new Uint16Array([0x3c00, 0xc000]) }),
      ],
    });
    const [steer] = readContainer(writeContainer(container)).channels;
    expect(steer?.descriptor.type).toBe('f16');
    expect(Array.from(steer ? physicalValues(steer) : [])).toEqual([1, -2]);
  });
});

describe('createChannel', () => {
  it('copies the samples it is given', () => {
    const source  = new Int16Array([1, 2, 3]);
    const channel = createChannel({ name: 'Gear', type: 'i16', frequency: 5, samples: source });
    source[0] = 9;
    expect(channel.samples[0]).toBe(1);
    expect(channel.descriptor.sampleCount).toBe(3);
  });

  it('rejects a frequency outside the u16 range or not an integer', () => {
    expect(() => createChannel({ name: 'A', type: 'i16', frequency: 1.5, samples: [] })).toThrow(RangeError);
    expect(() => createChannel({ name: 'A', type: 'i16', frequency: 70000, samples: [] })).toThrow(RangeError);
  });

  it('rejects a typed array of another type', () => {
    expect(() => createChannel({ name: 'A', type: 'i16', frequency: 1, samples: new Int32Array(2) }))
      .toThrow(TypeError);
  });

  it('rejects a name that does not fit its field', () => {
    expect(() => createChannel({ name: 'x'.repeat(33), type: 'i16', frequency: 1, samples: [] }))
      .toThrow(RangeError);
  });
});
