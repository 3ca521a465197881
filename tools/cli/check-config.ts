#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { buildInstanceTargets, loadConfig, loadWatchlist, resolveWatchlistPath } from '@venuepilot/config';
import { isOrchestratorError } from '@venuepilot/shared';

const argv = yargs(hideBin(process.argv))
  .scriptName('check-config')
  .option('config', { type: 'string', describe: 'path to config.yml' })
  .option('watchlist', { type: 'string', describe: 'path to watchlist.yml' })
  .strict()
  .parseSync();

function fail(msg: string): never {
  console.error('[check-config] ' + msg);
  process.exit(1);
}

function main(): void {
  try {
    const cfg = loadConfig({ forceReload: true, configPath: argv.config });
    const basket = loadWatchlist(argv.watchlist ?? resolveWatchlistPath());
    const targets = buildInstanceTargets(cfg);
    console.log(`chat ${cfg.telegram.chat_id}${cfg.telegram.topic_id === undefined ? '' : ` topic ${cfg.telegram.topic_id}`}`);
    console.log(`admins ${cfg.telegram.admins.join(', ')}`);
    console.log(`arm ${cfg.telegram.require_arm ? `${cfg.telegram.arm_mode}, ${cfg.telegram.arm_ttl_minutes}m` : 'not required'}`);
    for (const target of Object.values(targets)) {
      console.log(`${target.name} ${target.baseUrl} as ${target.credentials.username}`);
    }
    console.log(`stake ${cfg.defaults.stake}, delay ${cfg.defaults.delay_ms}ms`);
    console.log(`basket ${basket.length > 0 ? basket.join(', ') : 'empty'}`);
    console.log(`auto ${cfg.external_status.url ? cfg.external_status.url : 'not configured'}`);
    console.log('boot ok');
  } catch (err) {
    if (isOrchestratorError(err, 'ConfigInvalid')) {
      fail(err.message);
    }
    throw err;
  }
}

main();
