import type { Command } from 'commander';
import chalk from 'chalk';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, type Config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { getDb } from '../modules/state/db.js';
import { createMatchRunModel } from '../modules/state/models/match-runs.js';
import { readReport } from '../modules/reports/json.js';
import { toCsv } from '../modules/reports/csv.js';
import { renderHtmlReport } from '../modules/reports/html.js';
import type { MatchReport } from '../modules/matching/types.js';

/** Explicit path, else the report of the most recent match run. */
function resolveReportPath(config: Config, explicit: string | undefined): string | null {
  if (explicit) return explicit;
  const [latest] = createMatchRunModel(getDb(config.dbPath)).getRecent(1);
  return latest?.report_path ?? null;
}

function swapExtension(file: string, ext: string): string {
  return path.join(path.dirname(file), `${path.basename(file, path.extname(file))}${ext}`);
}

export function registerExportCommand(program: Command): void {
  const exporter = program
    .command('export')
    .description('Export a match report');

  const formats = [
    { name: 'csv', ext: '.csv', render: toCsv, description: 'Spreadsheet with one row per video' },
    { name: 'html', ext: '.html', render: (r: MatchReport) => renderHtmlReport(r), description: 'Static HTML viewer' },
  ];

  for (const format of formats) {
    exporter
      .command(`${format.name} [report]`)
      .description(`${format.description} (default: latest match run)`)
      .option('--out <file>', 'Output path (default: next to the report)')
      .action(async (report: string | undefined, opts: { out?: string }) => {
        const config = loadConfig();
        createLogger(config.logLevel);

        const reportPath = resolveReportPath(config, report);
        if (!reportPath) {
          console.error(chalk.red('Error: no report given and no match runs recorded. Run `hearing-match match` first.'));
          process.exit(1);
        }

        const out = opts.out ?? swapExtension(reportPath, format.ext);
        fs.writeFileSync(out, format.render(readReport(reportPath)), 'utf-8');
        console.log(chalk.green(`\n  Wrote ${out}\n`));
      });
  }
}
