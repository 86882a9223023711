import { describe, it, expect } from 'vitest';
import { splitIntoChunks, splitLongParagraphs } from './chunk-splitter';

describe('splitIntoChunks', () => {
  it('returns short text as a single trimmed piece', () => {
    expect(splitIntoChunks('  Hello there.  ', 750)).toEqual(['Hello there.']);
  });

  it('cuts just after the first sentence end past the limit', () => {
    const text = 'a'.repeat(760) + '.' + 'b'.repeat(139);
    expect(text).toHaveLength(900);

    const pieces = splitIntoChunks(text, 750);

    expect(pieces).toEqual([text.slice(0, 761), text.slice(761)]);
    expect(pieces[0]).toHaveLength(761);
    expect(pieces[1]).toHaveLength(139);
  });

  it('hard-cuts at the limit when no sentence end follows', () => {
    const text = 'x'.repeat(25);

    expect(splitIntoChunks(text, 10)).toEqual(['x'.repeat(10), 'x'.repeat(10), 'x'.repeat(5)]);
  });

  it('treats ! as a sentence end and ignores ? and ,', () => {
    const text = 'Wait, what? Stop! Go on.';

    expect(splitIntoChunks(text, 8)).toEqual(['Wait, what? Stop!', 'Go on.']);
  });

  it('trims whitespace around cut points', () => {
    const text = 'One two. Three four. Five six.';

    expect(splitIntoChunks(text, 5)).toEqual(['One two.', 'Three four.', 'Five six.']);
  });

  it('falls back to a hard cut when the sentence end is beyond the lookahead', () => {
    const text = 'abcdefghij' + 'klmnop.' + 'qrs';

    expect(splitIntoChunks(text, 10)).toEqual(['abcdefghijklmnop.', 'qrs']);
    expect(splitIntoChunks(text, 10, { maxLookahead: 3 })).toEqual(['abcdefghij', 'klmnop.qrs']);
  });

  it('keeps a surrogate pair together on a hard cut', () => {
    expect(splitIntoChunks('ab\u{1F600}cd', 3)).toEqual(['ab', '\u{1F600}c', 'd']);
  });

  it('reconstructs the input when the pieces are joined', () => {
    const text = 'First sentence here. Second one follows! Third closes it all out.';

    const pieces = splitIntoChunks(text, 12);

    expect(pieces.join(' ')).toBe(text);
  });
});

describe('splitLongParagraphs', () => {
  it('splits each paragraph and keeps paragraph order', () => {
    expect(splitLongParagraphs(['Short.', 'Longer one. Goes on.'], 8)).toEqual([
      'Short.',
      'Longer one.',
      'Goes on.',
    ]);
  });
});
