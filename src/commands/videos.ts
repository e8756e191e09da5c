import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import fs from 'node:fs';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { createVideoModel } from '../modules/state/models/videos.js';
import { committeeChannels, loadCommittees, selectCommittees } from '../modules/committees/config.js';
import { fetchChannelFeed } from '../modules/youtube/rss-feed.js';
import { YouTubeApi } from '../modules/youtube/data-api.js';
import { adaptAll, adaptVideoRecord } from '../modules/ingest/legacy.js';
import type { VideoRecord } from '../modules/matching/types.js';
import { parsePositiveInt } from './options.js';

export function registerVideosCommand(program: Command): void {
  const videos = program
    .command('videos')
    .description('Committee YouTube videos');

  // ─── fetch ────────────────────────────────────────────────────────────
  videos
    .command('fetch')
    .description('Fetch committee channel uploads from the RSS feed or the YouTube Data API')
    .option('--committee <id>', 'Committee id from committees.json (default: all active)')
    .option('--source <source>', 'rss or api', 'rss')
    .option('--max <n>', 'Max uploads per channel (api only)', '500')
    .action(async (opts: { committee?: string; source: string; max: string }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      if (opts.source !== 'rss' && opts.source !== 'api') {
        console.error(chalk.red(`Error: unknown source "${opts.source}" (rss or api)`));
        process.exit(1);
      }
      const maxUploads = parsePositiveInt(opts.max);
      if (maxUploads === null) {
        console.error(chalk.red(`Error: --max must be a positive integer, got "${opts.max}"`));
        process.exit(1);
      }
      if (opts.source === 'api' && !config.youtubeApiKey) {
        console.error(chalk.red('Error: YOUTUBE_API_KEY is required for --source api'));
        process.exit(1);
      }

      const committees = selectCommittees(loadCommittees(config.committeesPath), opts.committee);
      const model = createVideoModel(getDb(config.dbPath));
      const api = opts.source === 'api' ? new YouTubeApi(config.youtubeApiKey) : null;
      let total = 0;

      for (const committee of committees) {
        for (const channel of committeeChannels(committee)) {
          const spinner = ora(`${channel.channelName}: fetching via ${opts.source}...`).start();
          let found: VideoRecord[];
          try {
            found = api
              ? await api.fetchChannelVideos(channel, maxUploads)
              : await fetchChannelFeed(channel);
          } catch (err) {
            spinner.fail(`${channel.channelName}: ${err instanceof Error ? err.message : String(err)}`);
            continue;
          }
          total += model.upsert(found);
          spinner.succeed(`${channel.channelName}: ${found.length} videos`);
        }
      }

      console.log(chalk.green(`\n  Stored ${total} videos (${model.count()} in database)\n`));
    });

  // ─── import ───────────────────────────────────────────────────────────
  videos
    .command('import <file>')
    .description('Import videos from an earlier scraper JSON file')
    .option('--committee <id>', 'Assign the imported videos to this committee')
    .action(async (file: string, opts: { committee?: string }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      if (opts.committee) {
        selectCommittees(loadCommittees(config.committeesPath), opts.committee);
      }

      const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      const now = new Date();
      const { records, skipped } = adaptAll(raw, item => adaptVideoRecord(item, now));
      const assigned = opts.committee
        ? records.map(v => ({ ...v, committeeId: v.committeeId ?? opts.committee }))
        : records;

      const stored = createVideoModel(getDb(config.dbPath)).upsert(assigned);
      const approximate = records.filter(v => v.dateSource === 'relative').length;
      const undated = records.filter(v => v.date === null).length;

      console.log(chalk.green(`\n  Imported ${stored} videos`));
      if (approximate > 0) console.log(chalk.yellow(`  ${approximate} with approximate dates`));
      if (undated > 0) console.log(chalk.yellow(`  ${undated} without a date`));
      if (skipped > 0) console.log(chalk.yellow(`  ${skipped} records skipped (no video ID)`));
      console.log('');
    });

  // ─── stats ────────────────────────────────────────────────────────────
  videos
    .command('stats')
    .description('Summarize stored videos')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const stats = createVideoModel(getDb(config.dbPath)).getStats();

      if (opts.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log(chalk.bold('\n  Videos'));
      console.log(`  Total:         ${chalk.cyan(String(stats.total))}`);
      console.log(chalk.bold('\n  Date Source'));
      for (const { source, count } of stats.bySource) {
        console.log(`  ${chalk.dim(String(count).padStart(5))} ${source}`);
      }
      console.log(chalk.bold('\n  By Committee'));
      for (const { committee, count } of stats.byCommittee) {
        console.log(`  ${chalk.dim(String(count).padStart(5))} ${committee}`);
      }
      console.log('');
    });
}
