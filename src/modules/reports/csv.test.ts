import { describe, expect, it } from 'vitest';
import { toCsv } from './csv.js';
import { sampleReport } from './fixtures.test-helpers.js';

describe('toCsv', () => {
  it('writes matches then unmatched videos', () => {
    const lines = toCsv(sampleReport()).split('\r\n');

    expect(lines).toEqual([
      'YouTube ID,YouTube Title,YouTube Date,YouTube URL,Congress Event ID,Congress Title,Congress Date,Match Score,Method,Match Reasons,Status',
      'v1,"Hearing: ""Lower Costs, More Transparency""",2024-03-05,https://www.youtube.com/watch?v=v1,e1,"Lower Costs, More Transparency Act",2024-03-05,0.83,algorithmic,Exact date match: 2024-03-05 | High title similarity: 0.91,Matched',
      'v2,Budget <briefing>,,https://www.youtube.com/watch?v=v2,,,,0.20,,Missing date information,Unmatched (low-confidence)',
      '',
    ]);
  });

  it('quotes line breaks and doubles embedded quotes', () => {
    const report = sampleReport();
    const [unmatched] = report.unmatched;
    if (!unmatched) throw new Error('fixture has no unmatched entry');
    report.matches = [];
    report.unmatched = [{ ...unmatched, video: { ...unmatched.video, title: 'Budget\nbriefing "FY25"' } }];

    expect(toCsv(report).split('\r\n')[1]).toBe(
      'v2,"Budget\nbriefing ""FY25""",,https://www.youtube.com/watch?v=v2,,,,0.20,,Missing date information,Unmatched (low-confidence)',
    );
  });

  it('writes only the header for an empty report', () => {
    const report = { ...sampleReport(), matches: [], unmatched: [] };
    expect(toCsv(report)).toBe(
      'YouTube ID,YouTube Title,YouTube Date,YouTube URL,Congress Event ID,Congress Title,Congress Date,Match Score,Method,Match Reasons,Status\r\n',
    );
  });
});
