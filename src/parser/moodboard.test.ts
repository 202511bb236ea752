import { describe, it, expect } from 'vitest';
import { UnreadableDocument } from '../errors.js';
import { readMoodboard, segmentMoodboard } from './moodboard.js';
import { brightnessLevel, nameColor, PaletteVisualAnalyzer } from './visual.js';

const analyzer = new PaletteVisualAnalyzer();

describe('segmentMoodboard', () => {
  const board = readMoodboard(JSON.stringify({
    title: 'Night Exteriors',
    pages: [
      {
        caption: 'Harbor at night',
        regions: [
          { label: 'steel', caption: 'wet concrete #rain', image: { ref: 'p1-a.jpg', palette: ['#3a4f6b'], brightness: 40 } },
          {},
        ],
      },
      { regions: [{ image: { ref: 'p2-a.jpg' } }] },
    ],
  }));

  it('turns regions into segments and skips empty ones', async () => {
    const result = await segmentMoodboard('doc_mb', board, analyzer);
    expect(result.title).toBe('Night Exteriors');
    expect(result.regionCount).toBe(4);
    expect(result.segments.map((s) => [s.ordinal, s.modality, s.text, s.page])).toEqual([
      [0, 'text', 'Harbor at night', 1],
      [1, 'mixed', 'steel: wet concrete #rain', 1],
      [2, 'image', '', 2],
    ]);
    expect(result.skipped).toEqual([{ page: 1, span: { start: 2, end: 3 }, reason: 'region has neither text nor image' }]);
  });

  it('covers every region exactly once', async () => {
    const result = await segmentMoodboard('doc_mb', board, analyzer);
    const covered = [...result.segments.map((s) => s.span), ...result.skipped.map((s) => s.span)]
      .sort((a, b) => a.start - b.start);
    expect(covered).toEqual([0, 1, 2, 3].map((i) => ({ start: i, end: i + 1 })));
  });

  it('describes images from palette metadata', async () => {
    const result = await segmentMoodboard('doc_mb', board, analyzer);
    expect(result.segments[1]?.visual).toEqual({
      palette: ['#3a4f6b'],
      colorTerms: ['desaturated blue'],
      brightness: 'low',
      lightingTerms: ['low-key'],
      summary: 'desaturated blue, low brightness, low-key',
    });
    expect(result.segments[1]?.label).toBe('steel');
  });

  it('rejects containers that are not mood boards', () => {
    expect(() => readMoodboard('not json')).toThrow(UnreadableDocument);
    expect(() => readMoodboard('{"pages": "nope"}')).toThrow('invalid layout at pages');
  });
});

describe('color naming', () => {
  it('names hue, lightness and saturation', () => {
    expect(nameColor('#3a4f6b')).toBe('desaturated blue');
    expect(nameColor('#ff0000')).toBe('vivid red');
    expect(nameColor('#101010')).toBe('black');
    expect(nameColor('nope')).toBeNull();
  });

  it('buckets mean grey levels', () => {
    expect(brightnessLevel(40)).toBe('low');
    expect(brightnessLevel(120)).toBe('medium');
    expect(brightnessLevel(200)).toBe('high');
    expect(brightnessLevel(undefined)).toBeNull();
  });
});
