import { toCalendarDate } from '../../utils/dates.js';
import type { CommitteeRef, CongressEvent } from '../matching/types.js';
import type { MeetingDetail } from './congress-api.js';

/**
 * Map a Congress.gov meeting detail into the canonical event.
 * The first listed committee is treated as the primary one.
 */
export function toCongressEvent(detail: MeetingDetail, congress: number, chamber: string): CongressEvent {
  const committees: CommitteeRef[] = detail.committees
    .filter(c => c.name || c.systemCode)
    .map(c => ({ name: c.name ?? '', systemCode: c.systemCode ?? '' }));
  const primary = committees[0];

  return {
    eventId: detail.eventId,
    congress: detail.congress ?? congress,
    chamber: detail.chamber ?? chamber,
    title: detail.title?.trim() ?? '',
    date: toCalendarDate(detail.date),
    eventType: detail.type ?? '',
    status: detail.meetingStatus ?? '',
    committeeName: primary?.name ?? '',
    committeeCode: primary?.systemCode ?? '',
    committees,
  };
}

/** Keep events attributed to any of the given committee system codes (case-insensitive). */
export function filterByCommittee(events: CongressEvent[], systemCodes: string[]): CongressEvent[] {
  const wanted = new Set(systemCodes.map(code => code.toLowerCase()));

  return events.filter(event => {
    const codes = event.committees.length > 0
      ? event.committees.map(c => c.systemCode)
      : [event.committeeCode];
    return codes.some(code => wanted.has(code.toLowerCase()));
  });
}
