import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { getThresholds, loadConfig, resolveEnvVars, toProtocolRegistry } from '../src/config/index.js';
import { ConfigurationError } from '../src/core/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'protocol-monitor-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeYaml(content: string): string {
    const file = path.join(dir, 'config.yaml');
    writeFileSync(file, content);
    return file;
  }

  it('falls back to defaults without a config file', () => {
    const config = loadConfig(path.join(dir, 'missing.yaml'), {});

    expect(config.thresholds).toEqual({ tvlDrop24hPercent: 20, apyMinPercent: 2, utilizationMaxPercent: 95 });
    expect(config.alerts.deduplicationWindowMs).toBe(3_600_000);
    expect(config.notifications.channel).toBe('none');
    expect(config.pipeline.intervalMs).toBe(900_000);
    expect(config.api.port).toBe(8000);
    expect(Object.keys(config.protocols)).toEqual(['aave-v3', 'compound-v3']);
  });

  it('reads thresholds and protocols from YAML', () => {
    const file = writeYaml(`
thresholds:
  tvlDrop24hPercent: 15
protocols:
  lido:
    name: Lido
    defillamaSlug: lido
    type: yield
`);

    const config = loadConfig(file, {});

    expect(getThresholds(config)).toEqual({ tvlDrop24hPercent: 15, apyMinPercent: 2, utilizationMaxPercent: 95 });
    expect(toProtocolRegistry(config)).toEqual({
      lido: { id: 'lido', name: 'Lido', defillamaSlug: 'lido', type: 'yield', chain: 'ethereum' },
    });
  });

  it('resolves placeholders from the environment', () => {
    const file = writeYaml(`
notifications:
  channel: slack
  slackWebhookUrl: \${TEST_WEBHOOK}
`);

    const config = loadConfig(file, { TEST_WEBHOOK: 'https://hooks.example.com/services/test' });

    expect(config.notifications.slackWebhookUrl).toBe('https://hooks.example.com/services/test');
  });

  it('lets environment variables override the file', () => {
    const file = writeYaml(`
api:
  port: 8000
storage:
  databasePath: ./data/file.db
`);

    const config = loadConfig(file, { API_PORT: '9100', DATABASE_PATH: ':memory:', LOG_LEVEL: 'debug' });

    expect(config.api.port).toBe(9100);
    expect(config.storage.databasePath).toBe(':memory:');
    expect(config.app.logLevel).toBe('debug');
  });

  it('throws ConfigurationError when a channel lacks credentials', () => {
    const file = writeYaml(`
notifications:
  channel: slack
  slackWebhookUrl: \${UNSET_WEBHOOK}
`);

    expect(() => loadConfig(file, {})).toThrow(ConfigurationError);
  });

  it('lists every validation issue', () => {
    const file = writeYaml(`
thresholds:
  tvlDrop24hPercent: -1
pipeline:
  intervalMs: 10
`);

    try {
      loadConfig(file, {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.details?.['issues'] : undefined).toEqual([
        'thresholds.tvlDrop24hPercent: Number must be greater than 0',
        'pipeline.intervalMs: Number must be greater than or equal to 60000',
      ]);
    }
  });
});

describe('resolveEnvVars', () => {
  it('substitutes nested placeholders and blanks unknown ones', () => {
    expect(
      resolveEnvVars({ a: '${X}-suffix', b: ['${Y}'], c: 3, d: { e: '${MISSING}' } }, { X: 'x', Y: 'y' })
    ).toEqual({ a: 'x-suffix', b: ['y'], c: 3, d: { e: '' } });
  });
});
