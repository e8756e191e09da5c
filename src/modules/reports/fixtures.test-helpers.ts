import type { MatchReport } from '../matching/types.js';

/** Fixture shared by the report writer tests. */
export function sampleReport(): MatchReport {
  return {
    metadata: {
      totalVideos: 2,
      totalEvents: 5,
      matched: 1,
      unmatched: 1,
      matchRate: '50.0%',
      algorithmicMatches: 1,
      adjudicatedMatches: 0,
      thresholds: { high: 0.7, low: 0.4 },
      generatedAt: '2024-07-01T12:00:00.000Z',
    },
    matches: [
      {
        kind: 'matched',
        video: {
          videoId: 'v1',
          title: 'Hearing: "Lower Costs, More Transparency"',
          url: 'https://www.youtube.com/watch?v=v1',
          date: '2024-03-05',
          dateSource: 'stream',
        },
        event: {
          eventId: 'e1',
          congress: 118,
          chamber: 'House',
          title: 'Lower Costs, More Transparency Act',
          date: '2024-03-05',
          eventType: 'Hearing',
          status: 'Scheduled',
          committeeName: 'Health Subcommittee',
          committeeCode: 'hsif14',
          committees: [{ name: 'Health Subcommittee', systemCode: 'hsif14' }],
        },
        score: 0.83,
        reasons: ['Exact date match: 2024-03-05', 'High title similarity: 0.91'],
        titleSimilarity: 0.91,
        method: 'algorithmic',
      },
    ],
    unmatched: [
      {
        kind: 'unmatched',
        video: {
          videoId: 'v2',
          title: 'Budget <briefing>',
          url: 'https://www.youtube.com/watch?v=v2',
          date: null,
          dateSource: 'none',
        },
        bestScore: 0.2,
        bestMatchTitle: 'Budget Hearing',
        bestMatchEventId: 'e4',
        reasons: ['Missing date information'],
        disposition: 'low-confidence',
      },
    ],
  };
}
