const MONTHS =
  'January|February|March|April|May|June|July|August|September|October|November|December|' +
  'Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sept|Sep|Oct|Nov|Dec';

// "January 5, 2024 ", "Jan. 5 2024 - ", "2024-01-05: ", "1/5/2024 "
const DATE_PREFIX = new RegExp(
  `^(?:(?:${MONTHS})\\.?\\s+\\d{1,2},?\\s+\\d{4}|\\d{4}-\\d{2}-\\d{2}|\\d{1,2}/\\d{1,2}/\\d{2,4})(?:\\s*[:|\\-–—]\\s*|\\s+)`,
  'i',
);

const PARENTHETICAL = /\(([^)]*)\)/;

// Committee names and the shorthand used on committee channels (E&C subcommittees mostly)
const COMMITTEE_BOILERPLATE =
  /(?<![\w&])(?:full committee|subcommittee|committee|o&i|c&t|e&c|cmt|idc)(?![\w&])/gi;

// "Markup" is not stripped: both sides use it for the same proceeding
const PROCEDURAL_WORDS = /\b(?:hearing|meeting|legislative|oversight|business)\b/gi;

const LEADING_PUNCTUATION = /^[\s:;,|\-–—]+/;
const TRAILING_PUNCTUATION = /[\s:;,|\-–—]+$/;

/** Anything this short after stripping carries no usable signal. */
const MIN_SUBSTANTIAL_LENGTH = 5;
const MIN_PARENTHETICAL_WORDS = 3;

function tidy(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(LEADING_PUNCTUATION, '')
    .replace(TRAILING_PUNCTUATION, '');
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function normalizeOnce(title: string): string {
  const undated = title.replace(DATE_PREFIX, '');

  const paren = PARENTHETICAL.exec(undated)?.[1] ?? '';
  const parenContent = wordCount(paren) >= MIN_PARENTHETICAL_WORDS ? tidy(paren) : '';

  const aggressive = tidy(
    undated.replace(COMMITTEE_BOILERPLATE, ' ').replace(PROCEDURAL_WORDS, ' '),
  );

  let result: string;
  if (aggressive.length > MIN_SUBSTANTIAL_LENGTH) {
    result = aggressive;
  } else if (parenContent) {
    result = parenContent;
  } else {
    result = tidy(undated);
  }

  return result.toLowerCase();
}

/**
 * Reduce a committee or YouTube title to the part that identifies the proceeding.
 *
 * Tiered: boilerplate-stripped text if anything substantial survives, else a
 * parenthetical of three or more words, else the whitespace-collapsed title.
 * Runs to a fixpoint so `normalizeTitle(normalizeTitle(x)) === normalizeTitle(x)`.
 * Each pass after the first only removes text, so the loop terminates.
 */
export function normalizeTitle(title: string): string {
  let current = normalizeOnce(title);
  let next = normalizeOnce(current);
  while (next !== current) {
    current = next;
    next = normalizeOnce(current);
  }
  return current;
}
