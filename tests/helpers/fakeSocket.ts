import type { DatagramSocket, SocketFactory } from '../../src/logging/graylog.js';

export interface SentDatagram {
  data: Buffer;
  port: number;
  address: string;
}

/**
 * In-process stand-in for a UDP socket: records datagrams, answers callbacks
 * on a microtask. Like dgram, a closed socket never calls back, neither for
 * sends still waiting nor for later ones.
 */
export class FakeSocket implements DatagramSocket {
  readonly sent: SentDatagram[] = [];
  /** Sends attempted after close(). */
  readonly sentWhileClosed: SentDatagram[] = [];
  closed = false;
  /** When set, every send calls back with this error. */
  failWith: Error | null = null;
  /** When set, callbacks wait for release() instead of firing on a microtask. */
  hold = false;
  private held: (() => void)[] = [];
  private errorListeners: ((err: Error) => void)[] = [];

  send(msg: Uint8Array, port: number, address: string, callback: (error: Error | null) => void) {
    const datagram = { data: Buffer.from(msg), port, address };
    if (this.closed) {
      this.sentWhileClosed.push(datagram);
      return;
    }
    const failure = this.failWith;
    if (!failure) this.sent.push(datagram);
    const answer = () => {
      if (!this.closed) callback(failure);
    };
    if (this.hold) this.held.push(answer);
    else queueMicrotask(answer);
  }

  /** Number of sends waiting for release(). */
  get waiting(): number {
    return this.held.length;
  }

  release() {
    const held = this.held;
    this.held = [];
    for (const answer of held) answer();
  }

  close() {
    this.closed = true;
    this.held = [];
  }

  on(_event: 'error', listener: (err: Error) => void) {
    this.errorListeners.push(listener);
    return this;
  }

  emitError(err: Error) {
    for (const listener of this.errorListeners) listener(err);
  }
}

/** Factory handing out a fresh FakeSocket per call, all kept in `sockets`. */
export function fakeSocketFactory(): SocketFactory & { sockets: FakeSocket[]; hosts: string[] } {
  const sockets: FakeSocket[] = [];
  const hosts: string[] = [];
  const factory = (host: string) => {
    const socket = new FakeSocket();
    sockets.push(socket);
    hosts.push(host);
    return socket;
  };
  return Object.assign(factory, { sockets, hosts });
}

/** Every datagram sent through any socket of the factory, in socket order. */
export function allDatagrams(factory: { sockets: FakeSocket[] }): SentDatagram[] {
  return factory.sockets.flatMap((s) => s.sent);
}

/** Collects diagnostics output lines. */
export class MemoryWriter {
  readonly chunks: string[] = [];
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
  json(): Record<string, unknown>[] {
    return this.chunks.map((c) => JSON.parse(c));
  }
}
