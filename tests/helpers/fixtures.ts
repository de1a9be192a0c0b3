import { Entry } from '@/entry/entry.js';
import { EntryMeta } from '@/entry/entry-meta.js';

// Addresses below were computed independently (sha2-256 multihash, base58btc)

export const TEST_SOURCE = 'test node id';
export const TEST_ATTRIBUTE = 'meta-attribute';
export const TEST_VALUE = 'meta value';

export const TEST_ENTRY_CONTENT = '{"entry_type":"testEntryType","value":"test entry content"}';
export const TEST_ENTRY_ADDRESS = 'QmQJXSCtCC9jSmkYRAT12MqxFVZ6mheySxEhQMmYyvxcBC';
/** Address of testMeta(): hash of TEST_ENTRY_ADDRESS + TEST_ATTRIBUTE */
export const TEST_META_ADDRESS = 'Qmdmm9rTfAQX8MqX8Git3U1tnu2rpjsj8LfCZReopsUesv';

export function testEntry(): Entry {
  return new Entry('testEntryType', 'test entry content');
}

export function testEntryB(): Entry {
  return new Entry('testEntryType', 'another test entry content');
}

export function testMetaFor(entry: Entry, attribute: string, value: string): EntryMeta {
  return new EntryMeta(TEST_SOURCE, entry.address(), attribute, value);
}

export function testMeta(): EntryMeta {
  return testMetaFor(testEntry(), TEST_ATTRIBUTE, TEST_VALUE);
}

/** Same entry as testMeta(), different attribute */
export function testMetaB(): EntryMeta {
  return testMetaFor(testEntry(), 'another-attribute', 'another value');
}
