// Hash table example
//
// Stores an entry, asserts metadata about it twice (the second assertion
// replaces the first), and lists the entry's metadata.
//
// Usage:
//   tsx examples/metadata.ts
//
// Environment variables:
//   HASH_TABLE_CONFIG  (optional) -- Config file (default: config/config.example.json)

import { fileURLToPath } from 'node:url';

import { Entry, EntryMeta, createHashTable, createLogger, loadConfig } from '../src/index.js';

const EXAMPLE_CONFIG_PATH = fileURLToPath(
  new URL('../config/config.example.json', import.meta.url)
);

async function main(): Promise<void> {
  const config = loadConfig(process.env.HASH_TABLE_CONFIG ?? EXAMPLE_CONFIG_PATH);
  const logger = createLogger(config.logging);
  const table = await createHashTable(config.storage, logger);

  const entry = new Entry('note', 'remember the milk');
  await table.putEntry(entry);
  logger.info({ address: entry.address() }, 'Entry stored');

  await table.assertMeta(new EntryMeta('agentA', entry.address(), 'color', 'red'));
  await table.assertMeta(new EntryMeta('agentA', entry.address(), 'priority', 'high'));
  await table.assertMeta(new EntryMeta('agentB', entry.address(), 'color', 'blue'));

  for (const meta of await table.metasFromEntry(entry)) {
    logger.info(
      { attribute: meta.attribute(), value: meta.value(), source: meta.source() },
      'Metadata'
    );
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
