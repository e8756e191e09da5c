import { describe, expect, it } from 'vitest';
import type { CongressEvent } from '../matching/types.js';
import { filterByCommittee, toCongressEvent } from './events.js';

describe('toCongressEvent', () => {
  it('maps a detail into the canonical event', () => {
    const event = toCongressEvent(
      {
        eventId: '115538',
        date: '2024-03-05T14:00:00Z',
        title: ' Markup of H.R. 1234 ',
        type: 'Markup',
        meetingStatus: 'Scheduled',
        committees: [
          { name: 'Health Subcommittee', systemCode: 'hsif14', chamber: 'House' },
          { name: 'Energy and Commerce Committee', systemCode: 'hsif00', chamber: 'House' },
        ],
      },
      118,
      'House',
    );

    expect(event).toEqual({
      eventId: '115538',
      congress: 118,
      chamber: 'House',
      title: 'Markup of H.R. 1234',
      date: '2024-03-05',
      eventType: 'Markup',
      status: 'Scheduled',
      committeeName: 'Health Subcommittee',
      committeeCode: 'hsif14',
      committees: [
        { name: 'Health Subcommittee', systemCode: 'hsif14' },
        { name: 'Energy and Commerce Committee', systemCode: 'hsif00' },
      ],
    });
  });

  it('tolerates missing fields', () => {
    const event = toCongressEvent({ eventId: '9', date: null, title: null, committees: [] }, 117, 'Senate');
    expect(event).toMatchObject({ title: '', date: null, eventType: '', committeeName: '', congress: 117 });
  });
});

describe('filterByCommittee', () => {
  const base: CongressEvent = {
    eventId: '1',
    congress: 118,
    chamber: 'House',
    title: '',
    date: null,
    eventType: '',
    status: '',
    committeeName: '',
    committeeCode: '',
    committees: [],
  };

  it('keeps events whose committees intersect the codes', () => {
    const events: CongressEvent[] = [
      { ...base, eventId: 'joint', committees: [{ name: 'A', systemCode: 'hsju00' }, { name: 'B', systemCode: 'HSIF14' }] },
      { ...base, eventId: 'other', committees: [{ name: 'C', systemCode: 'hsba00' }] },
      { ...base, eventId: 'flat', committeeCode: 'hsif00' },
    ];
    expect(filterByCommittee(events, ['hsif00', 'hsif14']).map(e => e.eventId)).toEqual(['joint', 'flat']);
  });
});
