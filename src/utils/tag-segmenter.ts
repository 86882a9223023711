/**
 * Split LLM output into spans attributed to role tags.
 *
 * Recognised tags are `<AI Summary>` and `<SPEAKER n>` (n >= 1), matched
 * case-insensitively, with a space or underscore between the words and an
 * optional separator before the number: `<ai_summary>`, `<Speaker_2>`,
 * `<SPEAKER3>`. Anything else in angle brackets is kept as text.
 */

import type { Tag, TaggedSpan } from '../types/narration.types';

type ScanState = 'OUTSIDE_TAG' | 'INSIDE_TAG_CONTENT';

const isDigits = (value: string): boolean => value.length > 0 && /^[0-9]+$/.test(value);

/** Parse the text between `<` and `>`; null when it is not a known tag. */
export function parseTag(name: string): Tag | null {
  const normalized = name.replace(/_/g, ' ').toUpperCase();

  if (normalized === 'AI SUMMARY') {
    return { kind: 'ai-summary' };
  }

  if (normalized.startsWith('SPEAKER')) {
    let rest = normalized.slice('SPEAKER'.length);
    if (rest.startsWith(' ')) rest = rest.slice(1);
    if (!isDigits(rest)) return null;
    const index = parseInt(rest, 10);
    return index >= 1 ? { kind: 'speaker', index } : null;
  }

  return null;
}

/** Stable identity of a tag: `AI_SUMMARY` or `SPEAKER_<n>`. */
export function tagKey(tag: Tag): string {
  return tag.kind === 'ai-summary' ? 'AI_SUMMARY' : `SPEAKER_${tag.index}`;
}

/** Canonical marker text for a tag. */
export function formatTag(tag: Tag): string {
  return tag.kind === 'ai-summary' ? '<AI Summary>' : `<SPEAKER ${tag.index}>`;
}

/**
 * Scan `text` left to right.
 *
 * OUTSIDE_TAG: characters accumulate into the current span; `<` opens a
 * candidate and moves to INSIDE_TAG_CONTENT.
 * INSIDE_TAG_CONTENT: characters accumulate into the candidate; `>` closes
 * it and, when it names a tag, ends the current span and starts a new one;
 * a further `<` turns the pending candidate into text and opens a new one.
 * A candidate still open at the end of input is text.
 */
export function segmentTaggedText(text: string): TaggedSpan[] {
  const spans: TaggedSpan[] = [];
  let state: ScanState = 'OUTSIDE_TAG';
  let currentTag: Tag | null = null;
  let buffer = '';
  let candidate = '';

  const flush = () => {
    // Leading narration only counts when it says something; tagged spans always do.
    if (currentTag !== null || buffer.trim().length > 0) {
      spans.push({ tag: currentTag, text: buffer });
    }
    buffer = '';
  };

  for (const ch of text) {
    if (state === 'OUTSIDE_TAG') {
      if (ch === '<') {
        state = 'INSIDE_TAG_CONTENT';
        candidate = '';
      } else {
        buffer += ch;
      }
      continue;
    }

    if (ch === '<') {
      buffer += `<${candidate}`;
      candidate = '';
    } else if (ch === '>') {
      const tag = parseTag(candidate);
      if (tag) {
        flush();
        currentTag = tag;
      } else {
        buffer += `<${candidate}>`;
      }
      state = 'OUTSIDE_TAG';
    } else {
      candidate += ch;
    }
  }

  if (state === 'INSIDE_TAG_CONTENT') {
    buffer += `<${candidate}`;
  }
  flush();

  return spans;
}

/** Remove every recognised tag marker from `text`. */
export function stripTags(text: string): string {
  return segmentTaggedText(text)
    .map((span) => span.text)
    .join('');
}
