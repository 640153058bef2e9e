import type { Logger } from 'pino';
import type { Sink } from '../../domain/index.js';
import type { OutputConfig } from '../config/index.js';
import { DiskSink } from './disk-sink.js';
import { UdpSink } from './udp-sink.js';

/** Picks the sink variant once, from configuration. */
export function createSink(output: OutputConfig, log: Logger): Sink {
  switch (output.mode) {
    case 'disk':
      return new DiskSink(output.file, log.child({ sink: 'disk' }));
    case 'udp':
      return new UdpSink(output.host, output.port, log.child({ sink: 'udp' }));
  }
}
