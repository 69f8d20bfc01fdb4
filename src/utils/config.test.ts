import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, resolveConfigPath, ruleSetFromConfig } from './config';
import { InvalidConfigurationError } from '../pricing/errors';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pricewise-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const path = join(dir, 'pricewise.json');
    writeFileSync(path, content);
    return path;
  }

  it('falls back to defaults when no file exists', async () => {
    const config = await loadConfig(join(dir, 'missing.json'), {});

    expect(config).toEqual({
      pricing: { ladder: 'platinum' },
      data: { files: [], percentScale: 'auto' },
      report: { color: true },
    });
    expect(ruleSetFromConfig(config).returnThreshold).toBe(8.1);
  });

  it('merges the file with environment overrides and substitutions', async () => {
    const path = writeConfig(JSON.stringify({
      pricing: { ladder: 'simple', liquidationDays: 150 },
      data: { files: ['${DATA_DIR}/pricing.csv'] },
    }));

    const config = await loadConfig(path, {
      DATA_DIR: '/srv/data',
      PRICEWISE_RETURN_THRESHOLD: '9',
    });

    expect(config.pricing).toEqual({ ladder: 'simple', liquidationDays: 150, returnThreshold: 9 });
    expect(config.data.files).toEqual(['/srv/data/pricing.csv']);

    const rules = ruleSetFromConfig(config);
    expect(rules.ladder).toBe('simple');
    expect(rules.returnThreshold).toBe(9);
    expect(rules.refundTaxThreshold).toBe(9);
    expect(rules.liquidationDays).toBe(150);
  });

  it('splits PRICEWISE_DATA_FILES on commas', async () => {
    const config = await loadConfig(join(dir, 'missing.json'), {
      PRICEWISE_DATA_FILES: 'a.csv, b.csv,',
      PRICEWISE_LADDER: 'simple',
    });

    expect(config.data.files).toEqual(['a.csv', 'b.csv']);
    expect(config.pricing.ladder).toBe('simple');
  });

  it('reads the percentage scale from the file or PRICEWISE_PERCENT_SCALE', async () => {
    const path = writeConfig(JSON.stringify({ data: { percentScale: 'fraction' } }));
    expect((await loadConfig(path, {})).data.percentScale).toBe('fraction');

    const config = await loadConfig(path, { PRICEWISE_PERCENT_SCALE: 'percent' });
    expect(config.data.percentScale).toBe('percent');
  });

  it('rejects an unknown percentage scale', async () => {
    await expect(
      loadConfig(join(dir, 'missing.json'), { PRICEWISE_PERCENT_SCALE: 'basis-points' }),
    ).rejects.toThrow(InvalidConfigurationError);
  });

  it('rejects an unknown ladder', async () => {
    await expect(
      loadConfig(join(dir, 'missing.json'), { PRICEWISE_LADDER: 'gold' }),
    ).rejects.toThrow(InvalidConfigurationError);
  });

  it('rejects a non-numeric threshold', async () => {
    await expect(
      loadConfig(join(dir, 'missing.json'), { PRICEWISE_LIQUIDATION_DAYS: 'soon' }),
    ).rejects.toThrow(InvalidConfigurationError);
  });

  it('rejects a malformed config file', async () => {
    const path = writeConfig('{ not json');
    await expect(loadConfig(path, {})).rejects.toThrow(InvalidConfigurationError);
  });

  it('rejects thresholds the rule set cannot use', async () => {
    const path = writeConfig(JSON.stringify({ pricing: { liquidationDays: -5 } }));
    const config = await loadConfig(path, {});
    expect(() => ruleSetFromConfig(config)).toThrow(InvalidConfigurationError);
  });
});

describe('resolveConfigPath', () => {
  it('honours PRICEWISE_CONFIG_PATH', () => {
    expect(resolveConfigPath({ PRICEWISE_CONFIG_PATH: '/etc/pricewise.json' })).toBe('/etc/pricewise.json');
  });

  it('defaults to pricewise.json in the state dir', () => {
    expect(resolveConfigPath({ PRICEWISE_STATE_DIR: '/var/lib/pricewise' })).toBe('/var/lib/pricewise/pricewise.json');
  });
});
