import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import YAML from 'yaml';
import { isOrchestratorError } from '@venuepilot/shared';
import { buildInstanceTargets, loadConfig, loadWatchlist, peekConfig, saveWatchlist } from './index';

const BASE_CONFIG = {
  telegram: {
    token: 'test-token',
    chat_id: '-1001234',
    topic_id: 7,
    admins: [11, '22'],
    require_arm: true,
    arm_ttl_minutes: 15
  },
  freqtrade: {
    long: { base_url: 'http://127.0.0.1:8080/', user: 'ft', pass: 'test-secret' },
    short: { base_url: 'http://127.0.0.1:8081', user: 'ft', pass: 'test-secret' }
  },
  defaults: { stake: 100, delay_ms: 250 }
};

describe('config loading', () => {
  let dir: string;

  const write = (name: string, doc: unknown): string => {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, typeof doc === 'string' ? doc : YAML.stringify(doc));
    return filePath;
  };

  const captureError = (fn: () => unknown): unknown => {
    try {
      fn();
    } catch (err) {
      return err;
    }
    return undefined;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'venuepilot-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('parses the document and fills defaults', () => {
    const config = loadConfig({ forceReload: true, configPath: write('config.yml', BASE_CONFIG), env: {} });

    expect(config.telegram.chat_id).toBe(-1001234);
    expect(config.telegram.admins).toEqual([11, 22]);
    expect(config.telegram.arm_mode).toBe('single_shot');
    expect(config.defaults).toEqual({
      stake: 100,
      delay_ms: 250,
      poll_timeout_sec: 60,
      poll_interval_sec: 2,
      request_timeout_ms: 10_000
    });
    expect(config.external_status).toMatchObject({ enabled: false, threshold: 400, reversal: 500, interval_sec: 30 });
    expect(config.server).toEqual({ enabled: true, host: '127.0.0.1', port: 4090 });
    expect(peekConfig()).toBe(config);
  });

  it('applies environment overrides', () => {
    const config = loadConfig({
      forceReload: true,
      configPath: write('config.yml', BASE_CONFIG),
      env: { FT_SHORT_URL: 'http://10.0.0.2:8081', TELEGRAM_ADMINS: '5, 6', REQUIRE_ARM: 'false', SERVER_PORT: '9000' }
    });
    expect(config.freqtrade.short.base_url).toBe('http://10.0.0.2:8081');
    expect(config.telegram.admins).toEqual([5, 6]);
    expect(config.telegram.require_arm).toBe(false);
    expect(config.server.port).toBe(9000);
  });

  it('accepts a silent log level from the environment', () => {
    const config = loadConfig({ forceReload: true, configPath: write('config.yml', BASE_CONFIG), env: { LOG_LEVEL: 'silent' } });
    expect(config.logging.level).toBe('silent');
  });

  it('raises ConfigInvalid for a missing file', () => {
    const err = captureError(() => loadConfig({ forceReload: true, configPath: path.join(dir, 'absent.yml'), env: {} }));
    expect(isOrchestratorError(err, 'ConfigInvalid')).toBe(true);
  });

  it('raises ConfigInvalid with the failing fields', () => {
    const broken = { ...BASE_CONFIG, defaults: { stake: -1 } };
    const err = captureError(() => loadConfig({ forceReload: true, configPath: write('config.yml', broken), env: {} }));
    expect(isOrchestratorError(err, 'ConfigInvalid')).toBe(true);
    expect(isOrchestratorError(err) && err.detail?.issues).toEqual(['defaults.stake: Number must be greater than 0']);
  });

  it('raises ConfigInvalid for a document that is not a mapping', () => {
    const err = captureError(() => loadConfig({ forceReload: true, configPath: write('config.yml', '- just\n- a list\n'), env: {} }));
    expect(isOrchestratorError(err) && err.message).toMatch(/must be a mapping/);
  });

  it('builds frozen instance targets with trimmed urls', () => {
    const config = loadConfig({ forceReload: true, configPath: write('config.yml', BASE_CONFIG), env: {} });
    const targets = buildInstanceTargets(config);
    expect(targets.long).toEqual({
      name: 'long',
      baseUrl: 'http://127.0.0.1:8080',
      credentials: { username: 'ft', password: 'test-secret' }
    });
    expect(Object.isFrozen(targets.short)).toBe(true);
  });
});

describe('watchlist', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'venuepilot-watchlist-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('normalizes and de-duplicates the basket', () => {
    const filePath = path.join(dir, 'watchlist.yml');
    fs.writeFileSync(filePath, 'basket:\n  - sol/usdt:usdt\n  - SOL/USDT:USDT\n  - doge/usdt:usdt\n');
    expect(loadWatchlist(filePath)).toEqual(['SOL/USDT:USDT', 'DOGE/USDT:USDT']);
  });

  it('rejects a malformed pair', () => {
    const filePath = path.join(dir, 'watchlist.yml');
    fs.writeFileSync(filePath, 'basket:\n  - BTC/USDT\n');
    expect(() => loadWatchlist(filePath)).toThrow('has a malformed pair: BTC/USDT');
  });

  it('round-trips through saveWatchlist', async () => {
    const filePath = path.join(dir, 'nested', 'watchlist.yml');
    await saveWatchlist(['ETH/USDT:USDT'], filePath);
    expect(loadWatchlist(filePath)).toEqual(['ETH/USDT:USDT']);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(['watchlist.yml']);
  });
});
