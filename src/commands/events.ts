import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import fs from 'node:fs';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { createEventModel } from '../modules/state/models/events.js';
import { createProgressModel } from '../modules/state/models/progress.js';
import { CongressApi } from '../modules/congress/congress-api.js';
import { fetchAllMeetings, MeetingCheckpointSchema } from '../modules/congress/fetch-meetings.js';
import { filterByCommittee } from '../modules/congress/events.js';
import { adaptAll, adaptCongressEvent } from '../modules/ingest/legacy.js';
import { committeeCodes, loadCommittees, selectCommittees } from '../modules/committees/config.js';
import { parseCongresses, parsePositiveInt } from './options.js';

export function registerEventsCommand(program: Command): void {
  const events = program
    .command('events')
    .description('Congress.gov committee meetings');

  // ─── fetch ────────────────────────────────────────────────────────────
  events
    .command('fetch')
    .description('Fetch committee meetings from Congress.gov (resumes from the last checkpoint)')
    .option('--congress <list>', 'Congress numbers, e.g. 118,119 or 113-119', '118,119')
    .option('--chamber <chamber>', 'house, senate or nochamber', 'house')
    .option('--max-pages <n>', 'Stop after this many listing pages')
    .action(async (opts: { congress: string; chamber: string; maxPages?: string }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      if (!config.congressApiKey) {
        console.error(chalk.red('Error: CONGRESS_API_KEY is required. Set it in .env'));
        process.exit(1);
      }

      const congresses = parseCongresses(opts.congress);
      if (congresses.length === 0) {
        console.error(chalk.red(`Error: no congress numbers in "${opts.congress}"`));
        process.exit(1);
      }

      let maxPages: number | undefined;
      if (opts.maxPages !== undefined) {
        const parsed = parsePositiveInt(opts.maxPages);
        if (parsed === null) {
          console.error(chalk.red(`Error: --max-pages must be a positive integer, got "${opts.maxPages}"`));
          process.exit(1);
        }
        maxPages = parsed;
      }

      const db = getDb(config.dbPath);
      const eventModel = createEventModel(db);
      const api = new CongressApi(config.congressApiKey, { delayMs: config.requestDelayMs });

      console.log(chalk.bold('\n  Congress.gov Committee Meetings'));
      console.log(chalk.dim('  ═'.repeat(25)));

      const spinner = ora(`Fetching ${opts.chamber} meetings for congress ${congresses.join(', ')}...`).start();
      const result = await fetchAllMeetings({
        congresses,
        chamber: opts.chamber,
        api,
        events: eventModel,
        progress: createProgressModel(db, MeetingCheckpointSchema),
        maxPages,
        onPage: ({ congress, offset, stored }) => {
          spinner.text = `Congress ${congress}: ${offset} listed, ${stored} stored`;
        },
      });

      if (result.incomplete.length > 0) {
        spinner.warn(`Stored ${result.stored} meetings; congress ${result.incomplete.join(', ')} ended early`);
      } else {
        spinner.succeed(`Stored ${result.stored} meetings`);
      }

      console.log(`  Pages:         ${chalk.cyan(String(result.pages))}`);
      console.log(`  Already known: ${chalk.dim(String(result.skipped))}`);
      console.log(`  Failed:        ${result.failed > 0 ? chalk.red(String(result.failed)) : chalk.dim('0')}`);
      console.log(`  In database:   ${chalk.cyan(String(eventModel.count()))}`);
      console.log('');
    });

  // ─── import ───────────────────────────────────────────────────────────
  events
    .command('import <file>')
    .description('Import meetings from a JSON dump (bare array or { meetings: [...] })')
    .option('--committee <id>', 'Keep only meetings of this committee')
    .action(async (file: string, opts: { committee?: string }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
      const { records, skipped } = adaptAll(raw, adaptCongressEvent);

      let kept = records;
      if (opts.committee) {
        const [committee] = selectCommittees(loadCommittees(config.committeesPath), opts.committee);
        if (committee) kept = filterByCommittee(records, committeeCodes(committee));
      }

      const db = getDb(config.dbPath);
      const stored = createEventModel(db).upsert(kept);

      console.log(chalk.green(`\n  Imported ${stored} meetings`));
      if (records.length !== kept.length) {
        console.log(chalk.dim(`  ${records.length - kept.length} belonged to other committees`));
      }
      if (skipped > 0) console.log(chalk.yellow(`  ${skipped} records skipped (no event ID)`));
      console.log('');
    });

  // ─── stats ────────────────────────────────────────────────────────────
  events
    .command('stats')
    .description('Summarize stored meetings')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const stats = createEventModel(getDb(config.dbPath)).getStats();

      if (opts.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log(chalk.bold('\n  Committee Meetings'));
      console.log(`  Total:         ${chalk.cyan(String(stats.total))}`);
      console.log(`  Undated:       ${chalk.yellow(String(stats.undated))}`);
      console.log(`  Range:         ${chalk.dim(`${stats.earliest ?? '-'} → ${stats.latest ?? '-'}`)}`);
      if (stats.byType.length > 0) {
        console.log(chalk.bold('\n  By Type'));
        for (const { type, count } of stats.byType) {
          console.log(`  ${chalk.dim(String(count).padStart(5))} ${type}`);
        }
      }
      console.log('');
    });
}
