import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { createEventModel } from '../modules/state/models/events.js';
import { createVideoModel } from '../modules/state/models/videos.js';
import { createMatchRunModel } from '../modules/state/models/match-runs.js';
import { createProgressModel } from '../modules/state/models/progress.js';
import { checkpointKey, MeetingCheckpointSchema } from '../modules/congress/fetch-meetings.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('State snapshot: stored meetings and videos, pending checkpoints, recent match runs')
    .option('--chamber <chamber>', 'Chamber whose fetch checkpoint to show', 'house')
    .option('--json', 'Output as JSON')
    .action(async (opts: { chamber: string; json?: boolean }) => {
      const config = loadConfig();
      createLogger(config.logLevel);
      const db = getDb(config.dbPath);

      const events = createEventModel(db).getStats();
      const videos = createVideoModel(db).getStats();
      const checkpoint = createProgressModel(db, MeetingCheckpointSchema).load(checkpointKey(opts.chamber));
      const runs = createMatchRunModel(db).getRecent(5);

      if (opts.json) {
        console.log(JSON.stringify({ events, videos, checkpoint, runs }, null, 2));
        return;
      }

      console.log(chalk.bold('\n  Committee Video Matcher Status'));
      console.log(chalk.dim('  ═'.repeat(25)));

      console.log(chalk.bold('\n  Data'));
      console.log(`  Meetings:      ${chalk.cyan(String(events.total))} ${chalk.dim(`(${events.earliest ?? '-'} → ${events.latest ?? '-'})`)}`);
      console.log(`  Videos:        ${chalk.cyan(String(videos.total))}`);
      const approximate = videos.bySource.find(s => s.source === 'relative')?.count ?? 0;
      if (approximate > 0) console.log(`  Approx dates:  ${chalk.yellow(String(approximate))}`);

      console.log(chalk.bold('\n  Meeting Fetch'));
      if (checkpoint) {
        const current = checkpoint.current ? `congress ${checkpoint.current.congress} at offset ${checkpoint.current.offset}` : 'between congresses';
        console.log(`  ${chalk.yellow('In progress')}: ${current}; done: ${checkpoint.completed.join(', ') || 'none'}`);
      } else {
        console.log(chalk.dim('  No pending checkpoint'));
      }

      console.log(chalk.bold('\n  Recent Match Runs'));
      if (runs.length === 0) {
        console.log(chalk.dim('  None yet'));
      }
      for (const run of runs) {
        const rate = run.total_videos > 0 ? ((run.matched / run.total_videos) * 100).toFixed(1) : '0.0';
        console.log(
          `  ${chalk.dim(run.created_at)} ${chalk.cyan(`${run.matched}/${run.total_videos}`)} (${rate}%) ` +
          `${chalk.dim(`${run.algorithmic} algo, ${run.adjudicated} adjudicated, ${run.committee_id ?? 'all'}`)}`,
        );
        if (run.report_path) console.log(chalk.dim(`    ${run.report_path}`));
      }
      console.log('');
    });
}
