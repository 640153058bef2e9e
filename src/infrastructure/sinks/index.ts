export { DiskSink } from './disk-sink.js';
export { UdpSink } from './udp-sink.js';
export { createSink } from './sink-factory.js';
export { encodeLines, encodeDatagram } from './encoding.js';
