import { describe, it, expect } from 'vitest';
import { retainedRanges, retainedDurationMs, spliceIntervals } from './interval-splicer';
import type { AudioRangeCopier } from './interval-splicer';

/** Audio modelled as one label per 100 ms slot. */
const slotAudio = (durationMs: number): AudioRangeCopier<number[]> & { copies: [number, number][] } => {
  const copies: [number, number][] = [];
  return {
    copies,
    copyRange(startMs, endMs) {
      copies.push([startMs, endMs]);
      const slots: number[] = [];
      for (let ms = startMs; ms < Math.min(endMs, durationMs); ms += 100) {
        slots.push(ms);
      }
      return slots;
    },
    concat(segments) {
      return segments.flat();
    },
  };
};

describe('retainedRanges', () => {
  it('keeps everything between and around the intervals', () => {
    expect(
      retainedRanges(3000, [
        { startMs: 500, endMs: 1000 },
        { startMs: 2000, endMs: 2500 },
      ])
    ).toEqual([
      { startMs: 0, endMs: 500 },
      { startMs: 1000, endMs: 2000 },
      { startMs: 2500, endMs: 3000 },
    ]);
  });

  it('keeps the whole recording when nothing is removed', () => {
    expect(retainedRanges(1200, [])).toEqual([{ startMs: 0, endMs: 1200 }]);
  });

  it('drops empty ranges at the edges and between abutting intervals', () => {
    expect(
      retainedRanges(1000, [
        { startMs: 0, endMs: 300 },
        { startMs: 300, endMs: 600 },
        { startMs: 800, endMs: 1000 },
      ])
    ).toEqual([{ startMs: 600, endMs: 800 }]);
  });

  it('clamps intervals that run past the end of the recording', () => {
    expect(retainedRanges(1000, [{ startMs: 900, endMs: 1500 }])).toEqual([
      { startMs: 0, endMs: 900 },
    ]);
  });

  it('does not fail on overlapping intervals', () => {
    expect(
      retainedRanges(6000, [
        { startMs: 3000, endMs: 6000 },
        { startMs: 4000, endMs: 5000 },
      ])
    ).toEqual([
      { startMs: 0, endMs: 3000 },
      { startMs: 5000, endMs: 6000 },
    ]);
  });
});

describe('retainedDurationMs', () => {
  it('equals the duration minus the removed time for disjoint intervals', () => {
    const intervals = [
      { startMs: 300, endMs: 900 },
      { startMs: 1900, endMs: 2700 },
    ];

    expect(retainedDurationMs(3000, intervals)).toBe(3000 - 600 - 800);
  });
});

describe('spliceIntervals', () => {
  it('copies retained ranges in order and joins them', () => {
    const audio = slotAudio(1000);

    const result = spliceIntervals(1000, [{ startMs: 200, endMs: 500 }], audio);

    expect(audio.copies).toEqual([
      [0, 200],
      [500, 1000],
    ]);
    expect(result).toEqual([0, 100, 500, 600, 700, 800, 900]);
  });

  it('conserves duration', () => {
    const audio = slotAudio(3000);
    const intervals = [
      { startMs: 300, endMs: 900 },
      { startMs: 1900, endMs: 2700 },
    ];

    const result = spliceIntervals(3000, intervals, audio);

    expect(result.length * 100).toBe(3000 - 600 - 800);
  });

  it('returns an empty join when everything is removed', () => {
    const audio = slotAudio(1000);

    expect(spliceIntervals(1000, [{ startMs: 0, endMs: 1000 }], audio)).toEqual([]);
    expect(audio.copies).toEqual([]);
  });
});
