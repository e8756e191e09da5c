import type { LivestreamConfidence } from '../matching/types.js';

const LIVESTREAM_KEYWORDS = [
  'hearing', 'meeting', 'briefing', 'markup', 'committee', 'subcommittee', 'live',
  'stream', 'session', 'conference', 'testimony', 'witnesses', 'oversight', 'investigation',
];

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

/**
 * Guess whether a feed entry is a recorded live proceeding.
 * Feeds carry no streaming details, so this only reads the text.
 */
export function livestreamConfidence(title: string, description = ''): LivestreamConfidence {
  const titleLower = title.toLowerCase();
  const descLower = description.toLowerCase();

  const hasKeyword = LIVESTREAM_KEYWORDS.some(kw => titleLower.includes(kw) || descLower.includes(kw));
  if (!hasKeyword) return 'low';

  return MONTHS.some(month => titleLower.includes(month)) ? 'high' : 'medium';
}
