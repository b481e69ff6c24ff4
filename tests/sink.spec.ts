import { describe, it, expect, vi } from 'vitest';
import { EnvConfigProvider } from '../src/config/envProvider.js';
import { Diagnostics } from '../src/diagnostics.js';
import { DirectSink } from '../src/direct.js';
import { OversizedMessageError } from '../src/errors.js';
import { parseChunk } from '../src/logging/chunks.js';
import { createDirectSink, createGelfSink } from '../src/instance.js';
import type { EventTimestamp, FormattedEvent, GelfSinkOptions, Metadata, Severity } from '../src/types.js';
import { MemoryWriter, allDatagrams, fakeSocketFactory } from './helpers/fakeSocket.js';
import { TS_SECONDS, decodeDatagram, logEvent, quietDiagnostics } from './helpers/events.js';

const base: GelfSinkOptions = { host: '127.0.0.1', port: 12201, application: 'my_app', hostname: 'test-host', poolSize: 1 };

async function sinkWith(extra: Partial<GelfSinkOptions> = {}) {
  const socketFactory = fakeSocketFactory();
  const sink = await createGelfSink({ options: { ...base, ...extra }, socketFactory, diagnostics: quietDiagnostics() });
  return { sink, socketFactory };
}

async function deliver(extra: Partial<GelfSinkOptions>, ...events: ReturnType<typeof logEvent>[]) {
  const { sink, socketFactory } = await sinkWith(extra);
  for (const event of events) sink.submit(event);
  await sink.flush();
  sink.close();
  return allDatagrams(socketFactory);
}

describe('GELF sink end to end', () => {
  it('sends a gzipped GELF document', async () => {
    const [datagram] = await deliver({}, logEvent('test'));
    expect(datagram.port).toBe(12201);
    expect(datagram.address).toBe('127.0.0.1');
    expect(decodeDatagram(datagram.data)).toEqual({
      short_message: 'test',
      full_message: 'test',
      version: '1.1',
      host: 'test-host',
      level: 6,
      timestamp: TS_SECONDS,
      _application: 'my_app'
    });
  });

  it('truncates the short message', async () => {
    const message = 'm'.repeat(140);
    const [datagram] = await deliver({}, logEvent(message));
    const doc = decodeDatagram(datagram.data);
    expect(doc.short_message).toBe('m'.repeat(80));
    expect(doc.full_message).toBe(message);
  });

  it('sends nothing for an empty formatted message', async () => {
    expect(await deliver({ format: '' }, logEvent('test'))).toHaveLength(0);
  });

  it('sends only the configured metadata', async () => {
    const [datagram] = await deliver(
      { metadata: ['this'] },
      logEvent('test', { metadata: [['this', 'that'], ['user', 'u-1']] })
    );
    const doc = decodeDatagram(datagram.data);
    expect(doc._this).toBe('that');
    expect(doc).not.toHaveProperty('_user');
  });

  it('adds static tags', async () => {
    const [datagram] = await deliver({ tags: { region: 'eu-west', tier: 'gold' } }, logEvent('test'));
    expect(decodeDatagram(datagram.data)).toMatchObject({ _region: 'eu-west', _tier: 'gold' });
  });

  it('accepts the port as a string', async () => {
    const [datagram] = await deliver({ port: '12300' }, logEvent('test'));
    expect(datagram.port).toBe(12300);
  });

  it('uses zlib when asked', async () => {
    const [datagram] = await deliver({ compression: 'zlib' }, logEvent('test'));
    expect(decodeDatagram(datagram.data, 'zlib').full_message).toBe('test');
  });

  it('runs a formatter referenced by module and name', async () => {
    const formatters = {
      tagged: (level: Severity, message: string, ts: EventTimestamp, md: Metadata): FormattedEvent =>
        [level, `[svc] ${message}`, ts, md]
    };
    const [datagram] = await deliver({ format: { module: formatters, function: 'tagged' } }, logEvent('test'));
    expect(decodeDatagram(datagram.data).full_message).toBe('[svc] test');
  });

  it('ignores a formatter that does not take four arguments', async () => {
    const formatters = { broken: (message: string) => message };
    const [datagram] = await deliver({ format: { module: formatters, function: 'broken' } }, logEvent('test'));
    expect(decodeDatagram(datagram.data).full_message).toBe('test');
  });

  it('reassembles a chunked message', async () => {
    const message = 'c'.repeat(20_000);
    const datagrams = await deliver({ compression: 'none' }, logEvent(message));
    const frames = datagrams.map((d) => parseChunk(d.data));
    expect(frames.map((f) => f?.sequence)).toEqual([0, 1, 2]);
    const joined = Buffer.concat(frames.map((f) => f?.payload ?? Buffer.alloc(0)));
    expect(decodeDatagram(joined, 'none').full_message).toBe(message);
  });

  it('silently ignores an oversized message', async () => {
    expect(await deliver({ compression: 'none' }, logEvent('o'.repeat(1_100_000)))).toHaveLength(0);
  });

  it('loads its options from a provider', async () => {
    const socketFactory = fakeSocketFactory();
    const sink = await createGelfSink({
      configProvider: new EnvConfigProvider({
        GELF_HOST: '10.0.0.5',
        GELF_POOL_SIZE: '2',
        GELF_DIAG_STDERR_ENABLED: 'false'
      }),
      socketFactory
    });
    expect(sink.size).toBe(2);
    expect(socketFactory.hosts).toEqual(['10.0.0.5', '10.0.0.5']);
    sink.close();
  });
});

describe('DirectSink', () => {
  function direct(extra: Partial<GelfSinkOptions> = {}, diagnostics: Diagnostics = quietDiagnostics()) {
    const socketFactory = fakeSocketFactory();
    const sink = new DirectSink({ ...base, compression: 'none', ...extra }, { socketFactory, diagnostics });
    return { sink, socketFactory };
  }

  it('reports the outcome of each send', async () => {
    const { sink, socketFactory } = direct({ level: 'info' });
    expect(await sink.send(logEvent('hello'))).toBe('single');
    expect(await sink.send(logEvent('noise', { level: 'debug' }))).toBe('filtered');
    expect(await sink.send(logEvent('c'.repeat(9000)))).toBe('chunked');
    expect(socketFactory.sockets[0].sent).toHaveLength(3);
  });

  it('propagates an oversized payload under the error policy', async () => {
    const { sink } = direct({ oversized: 'error' });
    await expect(sink.send(logEvent('o'.repeat(1_100_000)))).rejects.toBeInstanceOf(OversizedMessageError);
  });

  it('logs failures from submit', async () => {
    const writer = new MemoryWriter();
    const { sink, socketFactory } = direct({}, new Diagnostics({}, writer));
    socketFactory.sockets[0].failWith = new Error('EPERM');

    sink.submit(logEvent('refused'));
    await sink.flush();

    expect(writer.json()).toEqual([
      expect.objectContaining({
        level: 'warn',
        msg: 'GELF event failed',
        name: 'TransportError',
        error: 'UDP send to 127.0.0.1:12201 failed: EPERM'
      })
    ]);
  });

  it('reopens its socket after a socket error', async () => {
    const { sink, socketFactory } = direct();
    socketFactory.sockets[0].emitError(new Error('ECONNREFUSED'));
    expect(await sink.send(logEvent('again'))).toBe('single');
    expect(socketFactory.sockets).toHaveLength(2);
    expect(socketFactory.sockets[1].sent).toHaveLength(1);
  });

  it('is built by createDirectSink', async () => {
    const socketFactory = fakeSocketFactory();
    const sink = await createDirectSink({ options: base, socketFactory, diagnostics: quietDiagnostics() });
    expect(await sink.send(logEvent('direct'))).toBe('single');
    expect(decodeDatagram(socketFactory.sockets[0].sent[0].data).full_message).toBe('direct');
    sink.close();
  });

  it('settles a send in flight when reconfigured', async () => {
    const writer = new MemoryWriter();
    const { sink, socketFactory } = direct({}, new Diagnostics({}, writer));
    socketFactory.sockets[0].hold = true;

    sink.submit(logEvent('in flight'));
    sink.reconfigure({ ...base, compression: 'none', port: 12300 });
    await sink.flush();

    expect(writer.json()).toEqual([
      expect.objectContaining({ msg: 'GELF event failed', error: 'UDP socket for 127.0.0.1:12201 is closed' })
    ]);
    expect(await sink.send(logEvent('after'))).toBe('single');
    expect(socketFactory.sockets[1].sent[0].port).toBe(12300);
  });

  it('reconnects with a new configuration', async () => {
    const { sink, socketFactory } = direct();
    sink.reconfigure({ ...base, compression: 'none', port: 12300 });
    await sink.send(logEvent('moved'));
    expect(socketFactory.sockets[0].closed).toBe(true);
    expect(socketFactory.sockets[1].sent[0].port).toBe(12300);
  });
});

describe('submit', () => {
  it('never throws into the caller', async () => {
    const { sink, socketFactory } = await sinkWith();
    socketFactory.sockets[0].failWith = new Error('EACCES');
    const failed = vi.fn();
    sink.on('failed', failed);
    expect(() => sink.submit(logEvent('x'))).not.toThrow();
    await sink.flush();
    expect(failed).toHaveBeenCalledTimes(1);
    sink.close();
  });
});
