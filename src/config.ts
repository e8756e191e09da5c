import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Project root is one level up from both src/ and dist/
const PROJECT_ROOT = path.resolve(__dirname, '..');

export interface MatchThresholds {
  /** Score at or above which the top candidate is accepted without review */
  high: number;
  /** Score at or above which an ambiguous candidate is referred to the adjudicator */
  low: number;
}

export interface Config {
  // API keys
  congressApiKey: string;
  youtubeApiKey: string;
  anthropicApiKey: string;

  // Adjudication
  adjudicatorModel: string;

  // Paths
  dataDir: string;
  dbPath: string;
  outputDir: string;
  committeesPath: string;

  // Matching
  thresholds: MatchThresholds;
  sameDayTitleFloor: number;

  // Courtesy throttle between external calls
  requestDelayMs: number;

  // Logging
  logLevel: string;
}

function loadEnvFile(): void {
  const envPath = path.resolve(PROJECT_ROOT, '.env');
  let envText: string;
  try {
    envText = fs.readFileSync(envPath, 'utf-8');
  } catch {
    return; // .env is optional
  }

  for (const line of envText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim();
      if (!process.env[key]) process.env[key] = val;
    }
  }
}

function loadRcFile(): Record<string, unknown> {
  const rcPath = path.resolve(PROJECT_ROOT, '.hearingmatchrc.json');
  let raw: string;
  try {
    raw = fs.readFileSync(rcPath, 'utf-8');
  } catch {
    return {};
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${rcPath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function loadConfig(overrides: Partial<Config> = {}): Config {
  loadEnvFile();
  const rc = loadRcFile();

  const str = (key: string, fallback = ''): string => {
    const fromEnv = process.env[key];
    if (fromEnv) return fromEnv;
    const fromRc = rc[key];
    return typeof fromRc === 'string' ? fromRc : fallback;
  };

  const num = (key: string, fallback: number): number => {
    const value = Number(str(key));
    return str(key) !== '' && Number.isFinite(value) ? value : fallback;
  };

  const dataDir = overrides.dataDir ?? path.resolve(PROJECT_ROOT, 'data');

  return {
    congressApiKey: overrides.congressApiKey ?? str('CONGRESS_API_KEY'),
    youtubeApiKey: overrides.youtubeApiKey ?? str('YOUTUBE_API_KEY'),
    anthropicApiKey: overrides.anthropicApiKey ?? str('ANTHROPIC_API_KEY'),
    adjudicatorModel: overrides.adjudicatorModel ?? str('ADJUDICATOR_MODEL', 'claude-haiku-4-5-20251001'),

    dataDir,
    dbPath: overrides.dbPath ?? path.resolve(dataDir, 'hearing-match.db'),
    outputDir: overrides.outputDir ?? path.resolve(PROJECT_ROOT, 'outputs'),
    committeesPath: overrides.committeesPath ?? path.resolve(dataDir, 'committees.json'),

    thresholds: overrides.thresholds ?? {
      high: num('MATCH_HIGH_THRESHOLD', 0.7),
      low: num('MATCH_LOW_THRESHOLD', 0.4),
    },
    sameDayTitleFloor: overrides.sameDayTitleFloor ?? num('SAME_DAY_TITLE_FLOOR', 0.4),

    requestDelayMs: overrides.requestDelayMs ?? num('REQUEST_DELAY_MS', 350),

    logLevel: overrides.logLevel ?? str('LOG_LEVEL', 'info'),
  };
}
