import { config } from './config.js';

export interface CliOptions {
  mode: 'once' | 'scheduler';
  /** Per-site record limit, 0 for unlimited */
  limit: number;
  schedule: string;
  runNow: boolean;
  /** Only crawl sites whose URL contains one of these */
  sites: string[];
}

/**
 * Flags take either `--name=value` or `--name value`
 */
export function parseArgs(argv: string[]): CliOptions {
  const value = (name: string): string | undefined => {
    const prefix = `--${name}=`;
    const arg = argv.find((a) => a.startsWith(prefix));
    if (arg) {
      return arg.slice(prefix.length);
    }
    const index = argv.indexOf(`--${name}`);
    const next = index >= 0 ? argv[index + 1] : undefined;
    return next && !next.startsWith('--') ? next : undefined;
  };

  const limit = parseInt(value('limit') ?? '0', 10);

  return {
    mode: value('mode') === 'scheduler' ? 'scheduler' : 'once',
    limit: Number.isFinite(limit) && limit > 0 ? limit : 0,
    schedule: value('schedule') || config.scheduler.schedule,
    runNow: argv.includes('--run-now'),
    sites: (value('sites') ?? '')
      .split(',')
      .map((site) => site.trim().toLowerCase())
      .filter((site) => site.length > 0),
  };
}
