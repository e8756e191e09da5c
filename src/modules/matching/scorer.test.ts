import { describe, expect, it } from 'vitest';
import { rankCandidates, scoreCandidate } from './scorer.js';
import type { CongressEvent, VideoRecord } from './types.js';

function video(overrides: Partial<VideoRecord> = {}): VideoRecord {
  return {
    videoId: 'vid-1',
    title: 'Hearing on Grid Reliability',
    url: 'https://www.youtube.com/watch?v=vid-1',
    date: '2024-03-05',
    dateSource: 'stream',
    ...overrides,
  };
}

function event(overrides: Partial<CongressEvent> = {}): CongressEvent {
  return {
    eventId: 'evt-1',
    congress: 118,
    chamber: 'House',
    title: 'Grid Reliability',
    date: '2024-03-05',
    eventType: 'Hearing',
    status: 'Scheduled',
    committeeName: 'Judiciary Committee',
    committeeCode: 'hsju00',
    committees: [{ name: 'Judiciary Committee', systemCode: 'hsju00' }],
    ...overrides,
  };
}

describe('scoreCandidate', () => {
  it('scores an exact-date markup as a strong match', () => {
    const result = scoreCandidate(
      video({ title: 'Full Committee Markup of H.R. 1234' }),
      event({ title: 'Markup', eventType: 'Markup' }),
    );

    expect(result.score).toBeCloseTo(0.766, 10);
    expect(result.titleSimilarity).toBe(0.48);
    expect(result.dayDiff).toBe(0);
    expect(result.reasons).toEqual([
      'Exact date match: 2024-03-05',
      'Low title similarity: 0.48',
      'Event type match: markup',
    ]);
  });

  it('gives partial date credit and reports the gap', () => {
    const near = scoreCandidate(video(), event({ date: '2024-03-03' }));
    expect(near.reasons[0]).toBe('Date within 2 days: 2024-03-05 vs 2024-03-03');

    const week = scoreCandidate(video(), event({ date: '2024-03-10' }));
    expect(week.reasons[0]).toBe('Date within a week: 5 days apart');

    const far = scoreCandidate(video(), event({ date: '2024-02-01' }));
    expect(far.reasons[0]).toBe('Date mismatch: 33 days apart');
  });

  it('decays monotonically with date distance', () => {
    const scores = ['2024-03-05', '2024-03-06', '2024-03-09', '2024-03-20'].map(
      date => scoreCandidate(video(), event({ date })).score,
    );
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeLessThan(scores[i - 1] ?? Number.POSITIVE_INFINITY);
    }
  });

  it('applies the distant-date penalty below zero', () => {
    const result = scoreCandidate(
      video({ title: 'Roundtable on Rural Broadband', date: '2024-01-10' }),
      event({ title: 'Lower Drug Costs', date: '2023-06-01' }),
    );
    expect(result.dayDiff).toBe(223);
    expect(result.score).toBeCloseTo(-0.38, 10);
    expect(result.reasons).toEqual(['Date mismatch: 223 days apart']);
  });

  it('reports missing dates without failing', () => {
    const result = scoreCandidate(video({ date: null, dateSource: 'none' }), event());
    expect(result.dayDiff).toBeNull();
    expect(result.reasons[0]).toBe('Missing date information');
  });

  it('reports a missing title', () => {
    const result = scoreCandidate(video(), event({ title: '' }));
    expect(result.titleSimilarity).toBe(0);
    expect(result.reasons).toContain('Missing title');
  });

  it('gives a third of the keyword weight for a committee topic keyword', () => {
    const result = scoreCandidate(
      video({ title: 'FERC Commissioners Testify', date: null }),
      event({
        title: 'FERC Commissioners Testify',
        eventType: 'Other',
        committeeName: 'Energy Subcommittee',
        committees: [{ name: 'Energy Subcommittee', systemCode: 'hsif03' }],
      }),
    );
    expect(result.reasons).toEqual([
      'Missing date information',
      'High title similarity: 1.00',
      'Committee keyword match: ferc',
    ]);
    expect(result.score).toBeCloseTo(0.45 + 0.05, 10);
  });

  it('is deterministic', () => {
    const v = video({ title: 'Oversight Hearing on XYZ', date: '2024-06-01' });
    const e = event({ title: 'XYZ Oversight', date: '2024-05-30' });
    expect(scoreCandidate(v, e)).toEqual(scoreCandidate(v, e));
  });
});

describe('rankCandidates', () => {
  it('ranks by combined score, not by date alone', () => {
    const v = video({ title: 'Oversight Hearing on XYZ', date: '2024-06-01' });
    const similar = event({ eventId: 'e1', title: 'XYZ Oversight', date: '2024-05-30' });
    const closer = event({ eventId: 'e2', title: 'Unrelated Markup', eventType: 'Markup', date: '2024-06-02' });

    const ranked = rankCandidates(v, [closer, similar], { sameDayTitleFloor: 0.4 });

    expect(ranked.map(c => c.event.eventId)).toEqual(['e1', 'e2']);
    expect(ranked[0]?.score).toBeCloseTo(0.3 + (6 / 19) * 0.45 + 0.15, 10);
    expect(ranked[1]?.score).toBeCloseTo(0.3 + (4 / 22) * 0.45, 10);
  });

  it('prefers the best-titled same-day candidate over a keyword-boosted one', () => {
    const keywordBoosted = event({ eventId: 'e1', title: 'Grid Security Hearing' });
    const betterTitle = event({ eventId: 'e2', title: 'Grid Reliability Roundtable', eventType: 'Roundtable' });

    const ranked = rankCandidates(video(), [keywordBoosted, betterTitle], { sameDayTitleFloor: 0.4 });

    expect(ranked[0]?.event.eventId).toBe('e2');
    expect(ranked[0]?.score).toBeCloseTo(0.4 + (32 / 46) * 0.45, 10);
    expect(ranked[0]?.reasons.at(-1)).toBe('Preferred over higher-scored candidate on same-day title similarity');
    expect(ranked[1]?.event.eventId).toBe('e1');
  });

  it('keeps the score order when the same-day title is below the floor', () => {
    const keywordBoosted = event({ eventId: 'e1', title: 'Grid Security Hearing' });
    const betterTitle = event({ eventId: 'e2', title: 'Grid Reliability Roundtable', eventType: 'Roundtable' });

    const ranked = rankCandidates(video(), [keywordBoosted, betterTitle], { sameDayTitleFloor: 0.8 });
    expect(ranked.map(c => c.event.eventId)).toEqual(['e1', 'e2']);
  });

  it('returns an empty list for no events', () => {
    expect(rankCandidates(video(), [], { sameDayTitleFloor: 0.4 })).toEqual([]);
  });
});
