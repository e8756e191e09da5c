import { daysBetween } from '../../utils/dates.js';
import { normalizeTitle } from './normalizer.js';
import { sequenceRatio } from './similarity.js';
import type { CongressEvent, VideoRecord } from './types.js';

export interface ScoringWeights {
  date: number;
  title: number;
  keyword: number;
  /** Subtracted (not added) when the dates are more than a week apart */
  distantDatePenalty: number;
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  date: 0.4,
  title: 0.45,
  keyword: 0.15,
  distantDatePenalty: 0.5,
};

export interface CandidateScore {
  event: CongressEvent;
  score: number;
  reasons: string[];
  titleSimilarity: number;
  /** Absolute calendar-day distance, null when either side has no date */
  dayDiff: number | null;
}

// Videos usually go up the same day as the live event or a day or two after
const NEAR_DATE_DAYS = 2;
const NEAR_DATE_CREDIT = 0.75;
const WEEK_DAYS = 7;
const WEEK_CREDIT = 0.25;

const COMMITTEE_KEYWORD_CREDIT = 1 / 3;

const PROCEDURAL_KEYWORDS = ['markup', 'hearing', 'oversight', 'meeting', 'roundtable', 'briefing'];

// Subcommittee topics and the shorthand that shows up in video titles
const COMMITTEE_TOPIC_KEYWORDS: Record<string, string[]> = {
  health: ['health', 'hhs', 'fda', 'cdc', 'nih'],
  energy: ['energy', 'ferc', 'nuclear', 'pipeline'],
  oversight: ['oversight', 'investigation', 'investigations'],
  communications: ['communications', 'technology', 'tech', 'ftc'],
  commerce: ['commerce', 'manufacturing', 'trade'],
  environment: ['environment', 'epa', 'climate'],
};

function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${word}\\b`).test(text);
}

function committeeKeyword(videoTitle: string, event: CongressEvent): string | null {
  const committeeText = [event.committeeName, ...event.committees.map(c => c.name)]
    .join(' ')
    .toLowerCase();

  for (const [topic, keywords] of Object.entries(COMMITTEE_TOPIC_KEYWORDS)) {
    if (!committeeText.includes(topic)) continue;
    const hit = keywords.find(kw => containsWord(videoTitle, kw));
    if (hit) return hit;
  }
  return null;
}

/**
 * Score one video against one committee meeting.
 * Reasons are appended in the order the checks run: date, title, keywords.
 */
export function scoreCandidate(
  video: VideoRecord,
  event: CongressEvent,
  weights: ScoringWeights = DEFAULT_WEIGHTS,
): CandidateScore {
  let score = 0;
  const reasons: string[] = [];
  let dayDiff: number | null = null;

  // Date proximity
  if (video.date && event.date) {
    dayDiff = Math.abs(daysBetween(video.date, event.date));
    if (dayDiff === 0) {
      score += weights.date;
      reasons.push(`Exact date match: ${video.date}`);
    } else if (dayDiff <= NEAR_DATE_DAYS) {
      score += weights.date * NEAR_DATE_CREDIT;
      reasons.push(`Date within ${NEAR_DATE_DAYS} days: ${video.date} vs ${event.date}`);
    } else if (dayDiff <= WEEK_DAYS) {
      score += weights.date * WEEK_CREDIT;
      reasons.push(`Date within a week: ${dayDiff} days apart`);
    } else {
      score -= weights.distantDatePenalty;
      reasons.push(`Date mismatch: ${dayDiff} days apart`);
    }
  } else {
    reasons.push('Missing date information');
  }

  // Normalized title similarity
  const videoTitle = normalizeTitle(video.title);
  const eventTitle = normalizeTitle(event.title);
  let titleSimilarity = 0;
  if (videoTitle && eventTitle) {
    titleSimilarity = sequenceRatio(videoTitle, eventTitle);
    score += titleSimilarity * weights.title;
    if (titleSimilarity > 0.8) {
      reasons.push(`High title similarity: ${titleSimilarity.toFixed(2)}`);
    } else if (titleSimilarity > 0.6) {
      reasons.push(`Moderate title similarity: ${titleSimilarity.toFixed(2)}`);
    } else if (titleSimilarity > 0.4) {
      reasons.push(`Low title similarity: ${titleSimilarity.toFixed(2)}`);
    }
  } else {
    reasons.push('Missing title');
  }

  // Procedural keyword shared by both, else a committee-topic keyword
  const rawVideoTitle = video.title.toLowerCase();
  const eventText = `${event.eventType} ${event.title}`.toLowerCase();
  const procedural = PROCEDURAL_KEYWORDS.find(
    kw => rawVideoTitle.includes(kw) && eventText.includes(kw),
  );
  if (procedural) {
    score += weights.keyword;
    reasons.push(`Event type match: ${procedural}`);
  } else {
    const topic = committeeKeyword(rawVideoTitle, event);
    if (topic) {
      score += weights.keyword * COMMITTEE_KEYWORD_CREDIT;
      reasons.push(`Committee keyword match: ${topic}`);
    }
  }

  return { event, score, reasons, titleSimilarity, dayDiff };
}

export interface RankOptions {
  weights?: ScoringWeights;
  /** Minimum title similarity for a same-day event to displace the top score */
  sameDayTitleFloor: number;
}

/**
 * Score and sort candidates, best first.
 *
 * When the top candidate falls on the video's date, the same-day candidate with
 * the best title similarity takes first place if it clears `sameDayTitleFloor`.
 * Committees often hold several proceedings on one day and the date credit
 * cannot tell them apart.
 */
export function rankCandidates(
  video: VideoRecord,
  events: CongressEvent[],
  options: RankOptions,
): CandidateScore[] {
  const ranked = events
    .map(event => scoreCandidate(video, event, options.weights))
    .sort((x, y) => y.score - x.score);

  const top = ranked[0];
  if (!top || !video.date || top.event.date !== video.date) return ranked;

  let bestTitled = top;
  for (const candidate of ranked) {
    if (candidate.event.date === video.date && candidate.titleSimilarity > bestTitled.titleSimilarity) {
      bestTitled = candidate;
    }
  }

  if (bestTitled === top || bestTitled.titleSimilarity <= options.sameDayTitleFloor) {
    return ranked;
  }

  const promoted: CandidateScore = {
    ...bestTitled,
    reasons: [...bestTitled.reasons, 'Preferred over higher-scored candidate on same-day title similarity'],
  };
  return [promoted, ...ranked.filter(c => c !== bestTitled)];
}
