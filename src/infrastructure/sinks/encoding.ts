import { stringify } from 'lossless-json';
import type { FlatRecord } from '../../domain/index.js';

/**
 * Wire shape of a record. Keys are listed explicitly so the output always
 * carries all seven fields, in this order, with `null` for absent metadata.
 * The type key is `type`, not the `type_` older collectd receivers wrote.
 */
function toWire(record: FlatRecord): FlatRecord {
  return {
    time: record.time,
    host: record.host,
    plugin: record.plugin,
    plugin_instance: record.plugin_instance,
    type: record.type,
    type_instance: record.type_instance,
    value: record.value,
  };
}

function encode(value: unknown): string {
  const text = stringify(value);
  if (text === undefined) throw new TypeError('Record has no JSON representation');
  return text;
}

/** Newline-delimited JSON: one object per record, in batch order. */
export function encodeLines(batch: readonly FlatRecord[]): string {
  let out = '';
  for (const record of batch) {
    out += `${encode(toWire(record))}\n`;
  }
  return out;
}

/** The whole batch as one JSON array. */
export function encodeDatagram(batch: readonly FlatRecord[]): Buffer {
  return Buffer.from(encode(batch.map(toWire)), 'utf-8');
}
