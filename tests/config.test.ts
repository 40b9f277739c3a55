import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { ValidationError } from '../src/shared/errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ PORT: 3000, DATA_DIRS: ['data', '/mnt/data'], REFRESH_INTERVAL_MS: 0 });
  });

  it('splits and trims data directories', () => {
    const config = loadConfig({ PORT: '8080', DATA_DIRS: ' ./a , ,b ', REFRESH_INTERVAL_MS: '60000' });

    expect(config).toEqual({ PORT: 8080, DATA_DIRS: ['./a', 'b'], REFRESH_INTERVAL_MS: 60000 });
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ValidationError);
  });

  it('rejects an empty directory list', () => {
    expect(() => loadConfig({ DATA_DIRS: ', ,' })).toThrow(/DATA_DIRS/);
  });
});
