import { describe, it, expect } from 'vitest';
import {
  buildPausedConcatFilterGraph,
  buildSpliceFilterGraph,
  formatFromPath,
} from './ffmpeg.service';

describe('buildSpliceFilterGraph', () => {
  it('trims around a cut and concatenates what is left', () => {
    const graph = buildSpliceFilterGraph(3000, [{ startMs: 500, endMs: 1000 }]);

    expect(graph).toEqual({
      filters: [
        '[0:a]atrim=start=0.000:end=0.500,asetpts=PTS-STARTPTS[seg0]',
        '[0:a]atrim=start=1.000:end=3.000,asetpts=PTS-STARTPTS[seg1]',
        '[seg0][seg1]concat=n=2:v=0:a=1[out]',
      ],
      outputLabel: 'out',
    });
  });

  it('passes a single retained range straight through', () => {
    const graph = buildSpliceFilterGraph(3000, [{ startMs: 0, endMs: 1000 }]);

    expect(graph?.filters).toEqual([
      '[0:a]atrim=start=1.000:end=3.000,asetpts=PTS-STARTPTS[seg0]',
      '[seg0]anull[out]',
    ]);
  });

  it('returns null when the cuts cover the whole recording', () => {
    expect(buildSpliceFilterGraph(3000, [{ startMs: 0, endMs: 3000 }])).toBeNull();
  });

  it('keeps the whole recording when there is nothing to cut', () => {
    const graph = buildSpliceFilterGraph(1250, []);

    expect(graph?.filters[0]).toBe('[0:a]atrim=start=0.000:end=1.250,asetpts=PTS-STARTPTS[seg0]');
  });
});

describe('buildPausedConcatFilterGraph', () => {
  it('pads every input but the last with silence', () => {
    const graph = buildPausedConcatFilterGraph(2, 1000);

    expect(graph.filters).toEqual([
      '[0:a]aformat=channel_layouts=stereo,aresample=48000,apad=pad_dur=1.000[p0]',
      '[1:a]aformat=channel_layouts=stereo,aresample=48000[p1]',
      '[p0][p1]concat=n=2:v=0:a=1[out]',
    ]);
    expect(graph.outputLabel).toBe('out');
  });

  it('adds no padding when the pause is zero', () => {
    const graph = buildPausedConcatFilterGraph(2, 0);

    expect(graph.filters[0]).toBe('[0:a]aformat=channel_layouts=stereo,aresample=48000[p0]');
  });
});

describe('formatFromPath', () => {
  it('maps known extensions and falls back to mp3', () => {
    expect(formatFromPath('/tmp/a_Cleaned.WAV')).toBe('wav');
    expect(formatFromPath('out.flac')).toBe('flac');
    expect(formatFromPath('out.m4a')).toBe('mp3');
  });
});
