import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { ValidationError } from '@branchlens/shared';
import { buildAnalyticsConfig } from '../config';

describe('buildAnalyticsConfig', () => {
  it('defaults to ./data and info logging', () => {
    const dataDir = path.join(process.cwd(), 'data');
    expect(buildAnalyticsConfig({})).toEqual({
      dataDir,
      processedDir: path.join(dataDir, 'processed'),
      externalDir: path.join(dataDir, 'external'),
      logLevel: 'info',
    });
  });

  it('resolves a relative data directory against the working directory', () => {
    const config = buildAnalyticsConfig({ BRANCHLENS_DATA_DIR: 'snapshots', LOG_LEVEL: 'debug' });
    expect(config.dataDir).toBe(path.resolve('snapshots'));
    expect(config.processedDir).toBe(path.join(path.resolve('snapshots'), 'processed'));
    expect(config.logLevel).toBe('debug');
  });

  it('rejects an unknown log level', () => {
    expect(() => buildAnalyticsConfig({ LOG_LEVEL: 'verbose' })).toThrow(ValidationError);
  });
});
