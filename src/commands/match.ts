import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'node:path';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { modelDisplayName } from '../utils/pricing.js';
import { getDb } from '../modules/state/db.js';
import { createEventModel } from '../modules/state/models/events.js';
import { createVideoModel } from '../modules/state/models/videos.js';
import { createMatchRunModel } from '../modules/state/models/match-runs.js';
import { committeeCodes, loadCommittees, selectCommittees } from '../modules/committees/config.js';
import { filterByCommittee } from '../modules/congress/events.js';
import { ClaudeClient } from '../modules/claude/client.js';
import { ClaudeAdjudicator } from '../modules/claude/adjudicator.js';
import { matchVideos } from '../modules/matching/matcher.js';
import { reportFileName, writeReport } from '../modules/reports/json.js';

function parseScore(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = parseFloat(value);
  return Number.isFinite(n) ? n : fallback;
}

export function registerMatchCommand(program: Command): void {
  program
    .command('match')
    .description('Match stored videos to stored committee meetings and write a JSON report')
    .option('--committee <id>', 'Limit to one committee (its videos and its meetings)')
    .option('--no-adjudicate', 'Never call Claude; ambiguous videos stay unmatched')
    .option('--high <score>', 'Accept threshold')
    .option('--low <score>', 'Referral threshold')
    .option('--output <file>', 'Report path (default: outputs/matches-<committee>-<timestamp>.json)')
    .option('--json', 'Print the report metadata as JSON')
    .action(async (opts: {
      committee?: string;
      adjudicate: boolean;
      high?: string;
      low?: string;
      output?: string;
      json?: boolean;
    }) => {
      const config = loadConfig();
      createLogger(config.logLevel);

      const thresholds = {
        high: parseScore(opts.high, config.thresholds.high),
        low: parseScore(opts.low, config.thresholds.low),
      };
      if (thresholds.low > thresholds.high) {
        console.error(chalk.red(`Error: low threshold ${thresholds.low} exceeds high threshold ${thresholds.high}`));
        process.exit(1);
      }

      const db = getDb(config.dbPath);
      let events = createEventModel(db).listAll();
      const videos = createVideoModel(db).listAll(opts.committee);

      if (opts.committee) {
        const [committee] = selectCommittees(loadCommittees(config.committeesPath), opts.committee);
        if (committee) events = filterByCommittee(events, committeeCodes(committee));
      }

      if (videos.length === 0) {
        console.error(chalk.yellow('No videos stored. Run `hearing-match videos fetch` or `videos import` first.'));
        process.exit(1);
      }

      let adjudicator: ClaudeAdjudicator | null = null;
      if (opts.adjudicate && config.anthropicApiKey) {
        adjudicator = new ClaudeAdjudicator(
          new ClaudeClient({ apiKey: config.anthropicApiKey, model: config.adjudicatorModel }),
        );
      } else if (opts.adjudicate) {
        console.log(chalk.dim('  ANTHROPIC_API_KEY not set: ambiguous videos will stay unmatched'));
      }

      console.log(chalk.bold('\n  Committee Video Matching'));
      console.log(chalk.dim('  ═'.repeat(25)));
      console.log(`  Videos:        ${chalk.cyan(String(videos.length))}`);
      console.log(`  Meetings:      ${chalk.cyan(String(events.length))}`);
      console.log(`  Thresholds:    ${chalk.dim(`accept ≥ ${thresholds.high}, refer ≥ ${thresholds.low}`)}`);
      if (adjudicator) console.log(`  Adjudicator:   ${chalk.dim(modelDisplayName(config.adjudicatorModel))}`);

      const spinner = ora('Matching...').start();
      const report = await matchVideos(videos, events, {
        thresholds,
        sameDayTitleFloor: config.sameDayTitleFloor,
        adjudicator,
        onProgress: (done, total) => {
          spinner.text = `Matching ${done}/${total}...`;
        },
      });
      spinner.succeed(`Matched ${report.metadata.matched} of ${report.metadata.totalVideos} videos`);

      const reportPath = opts.output ?? path.join(config.outputDir, reportFileName(opts.committee));
      writeReport(reportPath, report);

      const usage = adjudicator?.usage;
      createMatchRunModel(db).record(report, {
        committeeId: opts.committee,
        reportPath,
        costCents: usage?.costCents ?? 0,
      });

      if (opts.json) {
        console.log(JSON.stringify({ reportPath, ...report.metadata, adjudication: usage ?? null }, null, 2));
        return;
      }

      const { metadata } = report;
      console.log(`  Match rate:    ${chalk.green(metadata.matchRate)}`);
      console.log(`  Algorithmic:   ${chalk.cyan(String(metadata.algorithmicMatches))}`);
      console.log(`  Adjudicated:   ${chalk.cyan(String(metadata.adjudicatedMatches))}`);
      console.log(`  Unmatched:     ${chalk.yellow(String(metadata.unmatched))}`);
      if (usage && usage.calls > 0) {
        console.log(`  Claude calls:  ${chalk.dim(`${usage.calls} (${usage.failures} failed), $${(usage.costCents / 100).toFixed(4)}`)}`);
      }
      console.log(chalk.dim(`\n  Report: ${reportPath}\n`));
    });
}
