import dgram from 'node:dgram';
import { isIPv6 } from 'node:net';
import { OversizedMessageError, TransportError } from '../errors.js';
import { MAX_PACKET_SIZE, MAX_SIZE, splitIntoChunks } from './chunks.js';
import type { OversizedPolicy, SendOutcome } from '../types.js';

/** The part of `dgram.Socket` the client relies on. */
export interface DatagramSocket {
  send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null) => void): void;
  close(): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SocketFactory = (host: string) => DatagramSocket;

export const createUdpSocket: SocketFactory = (host) => {
  const socket = dgram.createSocket(isIPv6(host) ? 'udp6' : 'udp4');
  // a log shipper must not keep the process alive on its own
  socket.unref();
  return socket;
};

export interface GraylogOptions {
  host: string;   // collector host
  port: number;   // collector UDP port
  oversizedPolicy?: OversizedPolicy;
  socketFactory?: SocketFactory;
  onError?: (err: TransportError) => void;
}

/**
 * GELF 1.1 UDP client owning exactly one socket. Payloads above
 * MAX_PACKET_SIZE go out as a chunk sequence, one datagram at a time, so two
 * messages never interleave on the socket as long as callers await `send`.
 */
export class GraylogClient {
  private socket: DatagramSocket | null;
  private readonly options: GraylogOptions;
  // writes awaiting their send callback; close() rejects them, dgram never calls back
  private readonly pending = new Set<(err: Error) => void>();

  constructor(opts: GraylogOptions) {
    this.options = opts;
    const factory = opts.socketFactory ?? createUdpSocket;
    let socket: DatagramSocket;
    try {
      socket = factory(opts.host);
    } catch (err) {
      throw new TransportError(`unable to open UDP socket for ${opts.host}:${opts.port}`, { cause: err });
    }
    socket.on('error', (err) => {
      if (this.socket !== socket) return;
      this.close();
      this.options.onError?.(new TransportError(`UDP socket error: ${err.message}`, { cause: err }));
    });
    this.socket = socket;
  }

  get closed(): boolean {
    return this.socket === null;
  }

  close() {
    if (!this.socket) return;
    const socket = this.socket;
    this.socket = null;
    socket.close();
    const { host, port } = this.options;
    for (const abort of this.pending) abort(new TransportError(`UDP socket for ${host}:${port} is closed`));
    this.pending.clear();
  }

  /** Send one compressed payload. Transport failures reject with TransportError and are not retried. */
  async send(payload: Buffer): Promise<SendOutcome> {
    if (payload.length === 0) return 'skipped';
    if (payload.length > MAX_SIZE) {
      if (this.options.oversizedPolicy === 'error') throw new OversizedMessageError(payload.length, MAX_SIZE);
      return 'dropped';
    }
    if (payload.length <= MAX_PACKET_SIZE) {
      await this.write(payload);
      return 'single';
    }
    for (const frame of splitIntoChunks(payload)) {
      await this.write(frame);
    }
    return 'chunked';
  }

  private write(datagram: Buffer): Promise<void> {
    const { socket } = this;
    const { host, port } = this.options;
    if (!socket) return Promise.reject(new TransportError(`UDP socket for ${host}:${port} is closed`));
    return new Promise((resolve, reject) => {
      const abort = (err: Error) => reject(err);
      this.pending.add(abort);
      const settle = (err: Error | null) => {
        if (!this.pending.delete(abort)) return;
        if (err) reject(new TransportError(`UDP send to ${host}:${port} failed: ${err.message}`, { cause: err }));
        else resolve();
      };
      try {
        socket.send(datagram, port, host, settle);
      } catch (err) {
        this.pending.delete(abort);
        reject(new TransportError(`UDP send to ${host}:${port} failed`, { cause: err }));
      }
    });
  }
}
