import type { MatchReport, MatchResult, UnmatchedResult } from '../matching/types.js';

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => ESCAPES[ch] ?? ch);
}

type Thresholds = MatchReport['metadata']['thresholds'];

function scoreClass(score: number, thresholds: Thresholds): string {
  if (score >= thresholds.high) return 'score-high';
  if (score >= thresholds.low) return 'score-mid';
  return 'score-low';
}

function matchRow(m: MatchResult, thresholds: Thresholds): string {
  const adjudication = m.adjudication
    ? `<div class="note">${escapeHtml(m.adjudication.confidence)}: ${escapeHtml(m.adjudication.reasoning)}</div>`
    : '';
  return `<tr>
      <td>${escapeHtml(m.video.date ?? '')}</td>
      <td><a href="${escapeHtml(m.video.url)}">${escapeHtml(m.video.title)}</a></td>
      <td>${escapeHtml(m.event.date ?? '')}</td>
      <td>${escapeHtml(m.event.title)}<div class="note">${escapeHtml(m.event.eventId)} · ${escapeHtml(m.event.eventType)}</div></td>
      <td class="${scoreClass(m.score, thresholds)}">${m.score.toFixed(2)}</td>
      <td>${escapeHtml(m.method)}${adjudication}</td>
      <td><ul>${m.reasons.map(r => `<li>${escapeHtml(r)}</li>`).join('')}</ul></td>
    </tr>`;
}

function unmatchedRow(u: UnmatchedResult): string {
  return `<tr>
      <td>${escapeHtml(u.video.date ?? '')}</td>
      <td><a href="${escapeHtml(u.video.url)}">${escapeHtml(u.video.title)}</a></td>
      <td>${escapeHtml(u.bestMatchTitle ?? '')}</td>
      <td>${u.bestScore === null ? '' : u.bestScore.toFixed(2)}</td>
      <td>${escapeHtml(u.disposition)}</td>
      <td><ul>${u.reasons.map(r => `<li>${escapeHtml(r)}</li>`).join('')}</ul></td>
    </tr>`;
}

/** One static page, no external assets. */
export function renderHtmlReport(report: MatchReport, title = 'Committee Video Matches'): string {
  const { metadata } = report;
  return /* html */ `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 2rem; color: #0f172a; background: #f8fafc; }
    h1 { font-family: Georgia, serif; }
    .summary { display: flex; gap: 1.5rem; margin-bottom: 2rem; }
    .stat { background: #fff; border: 1px solid #e2e8f0; border-radius: 6px; padding: 0.75rem 1rem; }
    .stat b { display: block; font-size: 1.4rem; }
    table { border-collapse: collapse; width: 100%; background: #fff; margin-bottom: 2rem; }
    th, td { border-bottom: 1px solid #e2e8f0; padding: 0.5rem; text-align: left; vertical-align: top; font-size: 0.9rem; }
    th { background: #1e293b; color: #f8fafc; }
    ul { margin: 0; padding-left: 1rem; }
    .note { color: #64748b; font-size: 0.8rem; }
    .score-high { color: #15803d; font-weight: 600; }
    .score-mid { color: #b45309; font-weight: 600; }
    .score-low { color: #b91c1c; }
  </style>
</head>
<body>
  <h1>${escapeHtml(title)}</h1>
  <p class="note">Generated ${escapeHtml(metadata.generatedAt)} · thresholds ${metadata.thresholds.high} / ${metadata.thresholds.low}</p>
  <div class="summary">
    <div class="stat"><b>${metadata.totalVideos}</b>videos</div>
    <div class="stat"><b>${metadata.totalEvents}</b>events</div>
    <div class="stat"><b>${metadata.matched}</b>matched (${escapeHtml(metadata.matchRate)})</div>
    <div class="stat"><b>${metadata.algorithmicMatches}</b>algorithmic</div>
    <div class="stat"><b>${metadata.adjudicatedMatches}</b>adjudicated</div>
    <div class="stat"><b>${metadata.unmatched}</b>unmatched</div>
  </div>

  <h2>Matches</h2>
  <table>
    <thead><tr><th>Video date</th><th>Video</th><th>Event date</th><th>Event</th><th>Score</th><th>Method</th><th>Reasons</th></tr></thead>
    <tbody>
    ${report.matches.map(m => matchRow(m, metadata.thresholds)).join('\n    ')}
    </tbody>
  </table>

  <h2>Unmatched</h2>
  <table>
    <thead><tr><th>Video date</th><th>Video</th><th>Best candidate</th><th>Best score</th><th>Disposition</th><th>Reasons</th></tr></thead>
    <tbody>
    ${report.unmatched.map(unmatchedRow).join('\n    ')}
    </tbody>
  </table>
</body>
</html>
`;
}
