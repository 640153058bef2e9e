import { createSocket } from 'node:dgram';
import type { Socket } from 'node:dgram';
import { lookup } from 'node:dns/promises';
import type { LookupAddress } from 'node:dns';
import type { Logger } from 'pino';
import { SinkIOError } from '../../domain/index.js';
import type { FlatRecord, Sink } from '../../domain/index.js';
import { encodeDatagram } from './encoding.js';

/**
 * Sends each batch as a single UDP datagram holding a JSON array.
 *
 * The socket binds an ephemeral local port once and is connected to the
 * target, so `flush()` is a plain `send()`. Batches are never split: one
 * larger than the path allows fails with EMSGSIZE or is dropped on the way.
 * A host with both address families is reached over IPv4.
 */
export class UdpSink implements Sink {
  readonly kind = 'udp';
  private socket: Socket | null = null;

  constructor(
    private readonly host: string,
    private readonly port: number,
    private readonly log: Logger,
  ) {}

  async open(): Promise<void> {
    if (this.socket) return;

    const target = `${this.host}:${this.port}`;

    const { address, family } = await resolveTarget(this.host).catch((err: unknown) => {
      throw new SinkIOError(`Failed to resolve UDP target ${target}`, { cause: err });
    });

    const socket = createSocket(family === 6 ? 'udp6' : 'udp4');

    try {
      await bind(socket);
      await connect(socket, this.port, address);
    } catch (err: unknown) {
      socket.close();
      throw new SinkIOError(`Failed to open UDP socket to ${target}`, { cause: err });
    }

    // Send failures arrive through the send callback; this catches the rest.
    socket.on('error', (err: Error) => {
      this.log.error({ err, target }, 'UDP socket error');
    });

    this.socket = socket;
    this.log.info({ target, local: socket.address() }, 'UDP sink connected');
  }

  flush(batch: readonly FlatRecord[]): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new SinkIOError('UDP sink is not open'));
    }
    if (batch.length === 0) return Promise.resolve();

    const payload = encodeDatagram(batch);

    return new Promise<void>((resolve, reject) => {
      socket.send(payload, (err: Error | null) => {
        if (err) {
          reject(new SinkIOError(
            `Failed to send batch of ${batch.length} records (${payload.length} bytes)`,
            { cause: err },
          ));
          return;
        }
        this.log.debug({ count: batch.length, bytes: payload.length }, 'Sent batch via UDP');
        resolve();
      });
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return Promise.resolve();
    this.socket = null;

    return new Promise<void>((resolve) => {
      socket.close(() => {
        this.log.info({ target: `${this.host}:${this.port}` }, 'UDP sink closed');
        resolve();
      });
    });
  }
}

async function resolveTarget(host: string): Promise<LookupAddress> {
  const addresses = await lookup(host, { all: true });
  const chosen = addresses.find((entry) => entry.family === 4) ?? addresses[0];
  if (!chosen) throw new Error(`No address found for ${host}`);
  return chosen;
}

function bind(socket: Socket): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.once('error', reject);
    socket.bind(0, () => {
      socket.off('error', reject);
      resolve();
    });
  });
}

function connect(socket: Socket, port: number, address: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.once('error', reject);
    socket.connect(port, address, (err?: Error) => {
      socket.off('error', reject);
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
