/**
 * Text helpers for transcripts and summaries
 */

import type { TranscriptTurn } from '@/types/index.js';

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut `text` to at most `maxChars` UTF-16 units.
 *
 * Never splits a surrogate pair. Prefers the last word boundary when it
 * keeps at least half the budget, otherwise cuts hard.
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  if (maxChars <= 0) {
    return '';
  }

  let end = maxChars;
  if (isHighSurrogate(text.charCodeAt(end - 1))) {
    end -= 1;
  }
  const hard = text.slice(0, end);

  if (/\s/.test(text.charAt(end))) {
    return hard.trimEnd();
  }

  const lastSpace = hard.search(/\s\S*$/);
  if (lastSpace >= Math.floor(maxChars / 2)) {
    return hard.slice(0, lastSpace).trimEnd();
  }
  return hard;
}

/**
 * Render turns as `ROLE: content` lines
 */
export function formatTranscript(turns: readonly TranscriptTurn[]): string {
  return turns
    .map((turn) => `${turn.role.toUpperCase()}: ${turn.content}`)
    .join('\n');
}
