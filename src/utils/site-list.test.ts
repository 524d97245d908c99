import { describe, it, expect, vi } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { loadSiteList, parseSiteList } from './site-list.js';

vi.mock('./logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('parseSiteList', () => {
  it('should skip comments and blank lines, strip bullets and add a scheme', () => {
    const text = [
      '# storefronts',
      '',
      'https://a.test',
      '- b.test',
      '• c.test/shop',
      '  * http://d.test  ',
      '-',
    ].join('\n');

    expect(parseSiteList(text)).toEqual(['https://a.test', 'https://b.test', 'https://c.test/shop', 'http://d.test']);
  });

  it('should handle Windows line endings', () => {
    expect(parseSiteList('a.test\r\nb.test\r\n')).toEqual(['https://a.test', 'https://b.test']);
  });
});

describe('loadSiteList', () => {
  it('should return an empty list for a missing file', () => {
    expect(loadSiteList(path.join(os.tmpdir(), 'no-such-dir', 'sites.txt'))).toEqual([]);
  });
});
