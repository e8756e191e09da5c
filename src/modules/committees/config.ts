import fs from 'node:fs';
import { z } from 'zod';
import type { ChannelRef } from '../youtube/rss-feed.js';

const CommitteeSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  chamber: z.enum(['House', 'Senate', 'Joint']),
  active: z.boolean().default(true),
  /** Congress.gov system code → display name */
  systemCodes: z.record(z.string()),
  youtubeChannels: z
    .array(z.object({ channelId: z.string().min(1), channelName: z.string() }))
    .default([]),
});

export type Committee = z.infer<typeof CommitteeSchema>;

const CommitteesFileSchema = z.object({ committees: z.array(CommitteeSchema) });

export function loadCommittees(filePath: string): Committee[] {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return CommitteesFileSchema.parse(raw).committees;
}

/**
 * Committees selected by `id`, or every active one when no id is given.
 * Throws on an unknown id.
 */
export function selectCommittees(committees: Committee[], id?: string): Committee[] {
  if (!id) return committees.filter(c => c.active);
  const found = committees.find(c => c.id === id);
  if (!found) {
    throw new Error(`Unknown committee "${id}". Known: ${committees.map(c => c.id).join(', ')}`);
  }
  return [found];
}

export function committeeChannels(committee: Committee): ChannelRef[] {
  return committee.youtubeChannels.map(ch => ({ ...ch, committeeId: committee.id }));
}

export function committeeCodes(committee: Committee): string[] {
  return Object.keys(committee.systemCodes);
}
