import { Command } from 'commander';
import { registerEventsCommand } from './commands/events.js';
import { registerVideosCommand } from './commands/videos.js';
import { registerMatchCommand } from './commands/match.js';
import { registerExportCommand } from './commands/export.js';
import { registerStatusCommand } from './commands/status.js';
import { closeDb } from './modules/state/db.js';

const program = new Command();

program
  .name('hearing-match')
  .description('Match committee YouTube videos to Congress.gov committee meetings')
  .version('0.1.0')
  .hook('postAction', () => {
    closeDb();
  });

registerEventsCommand(program);
registerVideosCommand(program);
registerMatchCommand(program);
registerExportCommand(program);
registerStatusCommand(program);

export function run(): void {
  program.parseAsync().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}

// Direct execution (when run via tsx, not via bin entry point)
const isBinEntry = process.argv[1]?.endsWith('hearing-match.mjs');
if (!isBinEntry) {
  run();
}
