import type { CongressEvent, VideoRecord } from '../../matching/types.js';

export const ADJUDICATE_SYSTEM = `You match YouTube videos of congressional committee proceedings with official Congress.gov committee meeting records.

Be precise. Only name an event if you are confident the video and the record describe the same proceeding. When none of the candidates fits, answer with a null event_id.

Respond with valid JSON only. No markdown fences, no explanation outside the JSON object.`;

function describeEvent(event: CongressEvent, position: number): string {
  return [
    `${position}. Event ID: ${event.eventId}`,
    `   Date: ${event.date ?? 'Unknown'}`,
    `   Title: ${event.title || '(untitled)'}`,
    `   Type: ${event.eventType || 'Unknown'}`,
    `   Committee: ${event.committeeName || 'Unknown'}`,
    `   Status: ${event.status || 'Unknown'}`,
  ].join('\n');
}

export function buildAdjudicatePrompt(video: VideoRecord, candidates: CongressEvent[]): string {
  const dateLine = video.date
    ? `${video.date}${video.dateSource === 'relative' ? ' (approximate, derived from "N months ago" text)' : ''}`
    : 'Unknown';

  const parts: string[] = [];
  parts.push('## YouTube Video');
  parts.push(`- Title: ${video.title}`);
  parts.push(`- Date: ${dateLine}`);
  if (video.channelName) parts.push(`- Channel: ${video.channelName}`);
  parts.push('');
  parts.push('## Candidate Congress Events');
  candidates.forEach((event, i) => parts.push(describeEvent(event, i + 1)));
  parts.push('');
  parts.push('## Guidance');
  parts.push('1. Dates should be the same or within a few days; the video is often posted a day or two after the meeting.');
  parts.push('2. Titles should refer to the same proceeding, even if worded differently.');
  parts.push('3. A "Full Committee Markup" video likely matches a Markup event on the same day.');
  parts.push('4. YouTube titles are often more descriptive than Congress.gov titles.');
  parts.push('5. Postponed or canceled meetings rarely have a video.');
  parts.push('');
  parts.push('Respond with this JSON shape:');
  parts.push('{"event_id": "<one Event ID from the list, or null>", "confidence": "high" | "medium" | "low", "reasoning": "<one or two sentences>"}');

  return parts.join('\n');
}
