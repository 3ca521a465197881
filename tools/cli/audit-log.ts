#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { openStore } from '@venuepilot/persistence';

const argv = yargs(hideBin(process.argv))
  .scriptName('audit-log')
  .option('db', { type: 'string', default: process.env.SQLITE_DB_PATH ?? './data/venuepilot.db' })
  .option('limit', { type: 'number', default: 20 })
  .option('json', { type: 'boolean', default: false })
  .strict()
  .parseSync();

const store = openStore(argv.db);
try {
  const records = store.listAudit(argv.limit);
  for (const record of records.reverse()) {
    if (argv.json) {
      console.log(JSON.stringify(record));
      continue;
    }
    const actor = record.actor ?? '-';
    console.log(`${new Date(record.ts).toISOString()} ${record.kind} by ${actor}: ${record.outcome}`);
  }
} finally {
  store.close();
}
