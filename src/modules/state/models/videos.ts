import type Database from 'better-sqlite3';
import { z } from 'zod';
import { LivestreamConfidenceSchema, type VideoRecord } from '../../matching/types.js';

const VideoRowSchema = z.object({
  video_id: z.string(),
  title: z.string(),
  url: z.string(),
  date: z.string().nullable(),
  date_source: z.enum(['stream', 'published', 'relative', 'none']),
  channel_id: z.string().nullable(),
  channel_name: z.string().nullable(),
  committee_id: z.string().nullable(),
  livestream_confidence: LivestreamConfidenceSchema.nullable(),
});

type VideoRow = z.infer<typeof VideoRowSchema>;

function fromRow(row: VideoRow): VideoRecord {
  const video: VideoRecord = {
    videoId: row.video_id,
    title: row.title,
    url: row.url,
    date: row.date,
    dateSource: row.date_source,
  };
  if (row.channel_id) video.channelId = row.channel_id;
  if (row.channel_name) video.channelName = row.channel_name;
  if (row.committee_id) video.committeeId = row.committee_id;
  if (row.livestream_confidence) video.livestreamConfidence = row.livestream_confidence;
  return video;
}

// Higher wins when the same video arrives from two sources
const DATE_SOURCE_RANK = "CASE %s WHEN 'stream' THEN 3 WHEN 'published' THEN 2 WHEN 'relative' THEN 1 ELSE 0 END";

export interface VideoStats {
  total: number;
  bySource: Array<{ source: string; count: number }>;
  byCommittee: Array<{ committee: string; count: number }>;
}

export function createVideoModel(db: Database.Database) {
  // A better-sourced date already on file is never replaced by a vaguer one
  const upsertStmt = db.prepare(`
    INSERT INTO videos (video_id, title, url, date, date_source, channel_id, channel_name, committee_id, livestream_confidence)
    VALUES (@video_id, @title, @url, @date, @date_source, @channel_id, @channel_name, @committee_id, @livestream_confidence)
    ON CONFLICT(video_id) DO UPDATE SET
      title = excluded.title,
      url = excluded.url,
      date = CASE WHEN ${DATE_SOURCE_RANK.replace('%s', 'excluded.date_source')} >= ${DATE_SOURCE_RANK.replace('%s', 'videos.date_source')}
                  THEN excluded.date ELSE videos.date END,
      date_source = CASE WHEN ${DATE_SOURCE_RANK.replace('%s', 'excluded.date_source')} >= ${DATE_SOURCE_RANK.replace('%s', 'videos.date_source')}
                  THEN excluded.date_source ELSE videos.date_source END,
      channel_id = COALESCE(excluded.channel_id, videos.channel_id),
      channel_name = COALESCE(excluded.channel_name, videos.channel_name),
      committee_id = COALESCE(excluded.committee_id, videos.committee_id),
      livestream_confidence = COALESCE(excluded.livestream_confidence, videos.livestream_confidence),
      last_seen = datetime('now')
  `);

  const upsertMany = db.transaction((videos: VideoRecord[]) => {
    for (const v of videos) {
      upsertStmt.run({
        video_id: v.videoId,
        title: v.title,
        url: v.url,
        date: v.date,
        date_source: v.dateSource,
        channel_id: v.channelId ?? null,
        channel_name: v.channelName ?? null,
        committee_id: v.committeeId ?? null,
        livestream_confidence: v.livestreamConfidence ?? null,
      });
    }
    return videos.length;
  });

  const readRows = (rows: unknown[]): VideoRecord[] =>
    rows.map(row => fromRow(VideoRowSchema.parse(row)));

  return {
    upsert(videos: VideoRecord[]): number {
      return upsertMany(videos);
    },

    getById(videoId: string): VideoRecord | undefined {
      const row: unknown = db.prepare('SELECT * FROM videos WHERE video_id = ?').get(videoId);
      return row === undefined ? undefined : fromRow(VideoRowSchema.parse(row));
    },

    listAll(committeeId?: string): VideoRecord[] {
      if (committeeId) {
        return readRows(db.prepare('SELECT * FROM videos WHERE committee_id = ? ORDER BY video_id').all(committeeId));
      }
      return readRows(db.prepare('SELECT * FROM videos ORDER BY video_id').all());
    },

    count(): number {
      const row = z.object({ n: z.number() }).parse(db.prepare('SELECT COUNT(*) AS n FROM videos').get());
      return row.n;
    },

    getStats(): VideoStats {
      const total = this.count();
      const bySource = z
        .array(z.object({ source: z.string(), count: z.number() }))
        .parse(
          db.prepare('SELECT date_source AS source, COUNT(*) AS count FROM videos GROUP BY date_source ORDER BY count DESC, source').all(),
        );
      const byCommittee = z
        .array(z.object({ committee: z.string(), count: z.number() }))
        .parse(
          db.prepare(`
            SELECT COALESCE(committee_id, 'unassigned') AS committee, COUNT(*) AS count
            FROM videos GROUP BY committee ORDER BY count DESC, committee
          `).all(),
        );
      return { total, bySource, byCommittee };
    },
  };
}

export type VideoModel = ReturnType<typeof createVideoModel>;
