import { describe, it, expect } from 'vitest';
import {
  EmptyMarkerSetError,
  LapIndexOutOfRangeError,
  MalformedMarkerFileError,
  computeLaps,
  formatLapTime,
  selectLap,
} from '../src/index';
import type { Marker } from '../src/index';

function markers(...times: number[]): Marker[] {
  return times.map((time, i) => ({ name: `Manual.${i + 1}`, time }));
}

describe('computeLaps', () => {
  it('markers [0, 10, 22.5] give two laps of 10 and 12.5 s', () => {
    expect(computeLaps(markers(0, 10, 22.5))).toEqual([
      { index: 0, startTime: 0,  endTime: 10,   duration: 10 },
      { index: 1, startTime: 10, endTime: 22.5, duration: 12.5 },
    ]);
  });

  it('laps partition [first, last] with shared boundaries', () => {
    const laps = computeLaps(markers(3.2, 80.7, 158.1, 235.9, 312));

    expect(laps).toHaveLength(4);
    for (let i = 0; i + 1 < laps.length; i++) {
      expect(laps[i]?.endTime).toBe(laps[i + 1]?.startTime);
    }
    expect(laps[0]?.startTime).toBe(3.2);
    expect(laps[3]?.endTime).toBe(312);
    expect(laps.reduce((sum, lap) => sum + lap.duration, 0)).toBeCloseTo(312 - 3.2, 9);
  });

  it('rejects markers that go backwards', () => {
    expect(() => computeLaps(markers(5, 3))).toThrow(MalformedMarkerFileError);
  });

  it('rejects duplicate timestamps', () => {
    expect(() => computeLaps(markers(0, 10, 10))).toThrow(MalformedMarkerFileError);
  });

  it('needs at least two markers', () => {
    expect(() => computeLaps(markers(5))).toThrow(EmptyMarkerSetError);
    expect(() => computeLaps([])).toThrow(EmptyMarkerSetError);
  });

  it('fromSessionStart counts the out-lap from t = 0', () => {
    const laps = computeLaps(markers(12, 100, 190), { fromSessionStart: true });
    expect(laps.map(l => [l.startTime, l.endTime])).toEqual([[0, 12], [12, 100], [100, 190]]);
  });

  it('fromSessionStart does nothing when the first marker is at 0', () => {
    expect(computeLaps(markers(0, 10), { fromSessionStart: true })).toHaveLength(1);
  });

  it('fromSessionStart turns a single marker into one lap', () => {
    expect(computeLaps(markers(42), { fromSessionStart: true })).toEqual([
      { index: 0, startTime: 0, endTime: 42, duration: 42 },
    ]);
  });
});

describe('selectLap', () => {
  const laps = computeLaps(markers(0, 10, 22.5));

  it('selects by index', () => {
    expect(selectLap(laps, 1).startTime).toBe(10);
  });

  it('fastest picks the smallest duration', () => {
    expect(selectLap(laps, 'fastest').index).toBe(0);
    expect(selectLap(computeLaps(markers(0, 10, 20, 25, 35)), 'fastest').index).toBe(2);
  });

  it('fastest breaks ties by earliest start', () => {
    expect(selectLap(computeLaps(markers(0, 10, 20, 30)), 'fastest').index).toBe(0);
  });

  it('fastest is idempotent', () => {
    const once = selectLap(laps, 'fastest');
    expect(selectLap(laps, 'fastest')).toEqual(once);
    expect(selectLap([once], 'fastest')).toEqual(once);
  });

  it('lap 5 of a two-lap session is out of range', () => {
    const err = (() => {
      try {
        selectLap(laps, 5);
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(err).toBeInstanceOf(LapIndexOutOfRangeError);
    expect(err).toMatchObject({ code: 'LAP_INDEX_OUT_OF_RANGE', context: { requested: 5, lapCount: 2 } });
  });

  it('rejects negative and fractional indices', () => {
    expect(() => selectLap(laps, -1)).toThrow(LapIndexOutOfRangeError);
    expect(() => selectLap(laps, 0.5)).toThrow(LapIndexOutOfRangeError);
  });

  it('rejects an empty lap list', () => {
    expect(() => selectLap([], 'fastest')).toThrow(EmptyMarkerSetError);
  });
});

describe('formatLapTime', () => {
  it('formats M:SS.mmm', () => {
    expect(formatLapTime(103.521)).toBe('1:43.521');
    expect(formatLapTime(12.5)).toBe('0:12.500');
    expect(formatLapTime(5.25)).toBe('0:05.250');
    expect(formatLapTime(3600)).toBe('60:00.000');
  });
});
