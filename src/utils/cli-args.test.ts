import { describe, it, expect, vi } from 'vitest';
import { parseArgs } from './cli-args.js';

vi.mock('./config.js', () => ({
  config: {
    scheduler: { schedule: '0 3 * * *', timezone: 'Africa/Cairo' },
  },
}));

describe('parseArgs', () => {
  it('should default to a single unlimited run over every site', () => {
    expect(parseArgs([])).toEqual({
      mode: 'once',
      limit: 0,
      schedule: '0 3 * * *',
      runNow: false,
      sites: [],
    });
  });

  it('should read flags in both forms', () => {
    const options = parseArgs(['--limit=25', '--mode', 'scheduler', '--schedule', '0 */6 * * *', '--run-now']);

    expect(options.limit).toBe(25);
    expect(options.mode).toBe('scheduler');
    expect(options.schedule).toBe('0 */6 * * *');
    expect(options.runNow).toBe(true);
  });

  it('should treat a non-positive or unreadable limit as unlimited', () => {
    expect(parseArgs(['--limit=-5']).limit).toBe(0);
    expect(parseArgs(['--limit=many']).limit).toBe(0);
  });

  it('should split the site filter on commas', () => {
    expect(parseArgs(['--sites= Shop-One.test, ,gear.test']).sites).toEqual(['shop-one.test', 'gear.test']);
  });

  it('should not take the next flag as a value', () => {
    expect(parseArgs(['--limit', '--run-now']).limit).toBe(0);
  });
});
