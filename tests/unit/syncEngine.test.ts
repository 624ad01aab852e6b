import { describe, it, expect, beforeEach } from 'vitest';
import { SyncEngine, type SyncEngineOptions } from '../../src/services/syncEngine.js';
import { HealthTracker } from '../../src/services/healthTracker.js';
import {
  SinkRejectedError,
  SinkUnavailableError,
  SourceNotFoundError,
  SourceUnavailableError,
} from '../../src/core/errors.js';
import { __enableTestLogCollector } from '../../src/utils/logging.js';
import { FakeSecretSink, FakeSecretSource, bytes, deferred } from '../utils/fakes.js';

const sourceRef = { projectId: 'test-project', secretName: 'app-secrets', version: 'latest' };
const target = { namespace: 'test-ns', secretName: 'app-secrets' };

function makeEngine(
  source: FakeSecretSource,
  sink: FakeSecretSink,
  overrides: Partial<SyncEngineOptions> = {},
) {
  const health = new HealthTracker();
  const engine = new SyncEngine({
    source,
    sink,
    health,
    sourceRef,
    target,
    stepTimeoutMs: 1000,
    ...overrides,
  });
  return { engine, health };
}

describe('SyncEngine', () => {
  let logs: string[];

  beforeEach(() => {
    logs = __enableTestLogCollector('info');
  });

  it('applies the source payload to the sink and records success', async () => {
    const source = FakeSecretSource.json({ API_KEY: 'x' });
    const sink = new FakeSecretSink();
    const { engine, health } = makeEngine(source, sink);

    const result = await engine.runOnce('api');

    expect(result.outcome).toBe('success');
    expect(result.trigger).toBe('api');
    expect(result.keyCount).toBe(1);
    expect(source.calls).toEqual([sourceRef]);
    expect(sink.calls).toEqual([{ namespace: 'test-ns', secretName: 'app-secrets', data: { API_KEY: 'x' } }]);
    const snapshot = health.report();
    expect(snapshot.lastSync?.outcome).toBe('success');
    expect(snapshot.source).toEqual({ ready: true, detail: 'fake source' });
    expect(snapshot.sink).toEqual({ ready: true, detail: 'fake sink' });
  });

  it('replaces the whole key set on every cycle', async () => {
    const source = new FakeSecretSource(bytes('{"A":"1","B":"2"}'), bytes('{"B":"3","C":"4"}'));
    const sink = new FakeSecretSink();
    const { engine } = makeEngine(source, sink);

    await engine.runOnce('schedule');
    expect(sink.get('test-ns', 'app-secrets')).toEqual({ A: '1', B: '2' });
    await engine.runOnce('schedule');
    expect(sink.get('test-ns', 'app-secrets')).toEqual({ B: '3', C: '4' });
  });

  it('normalizes keys and resolves collisions with the later key', async () => {
    const source = new FakeSecretSource(bytes('{"STONKİ_TEST":"a","a b":"1","a_b":"2"}'));
    const sink = new FakeSecretSink();
    const { engine } = makeEngine(source, sink);

    const result = await engine.runOnce('schedule');

    expect(result.outcome).toBe('success');
    expect(result.keyCount).toBe(2);
    expect(sink.get('test-ns', 'app-secrets')).toEqual({ STONKI_TEST: 'a', a_b: '2' });
    expect(logs.some((l) => JSON.parse(l).msg === 'secret key collision')).toBe(true);
  });

  it('shares one in-flight cycle between concurrent callers', async () => {
    const gate = deferred<Uint8Array>();
    const source = new FakeSecretSource(gate.promise);
    const sink = new FakeSecretSink();
    const { engine } = makeEngine(source, sink);

    const first = engine.runOnce('schedule');
    const second = engine.runOnce('api');
    gate.resolve(bytes('{"API_KEY":"x"}'));
    const [a, b] = await Promise.all([first, second]);

    expect(a).toBe(b);
    expect(a.trigger).toBe('schedule');
    expect(source.calls).toHaveLength(1);
    expect(sink.calls).toHaveLength(1);
  });

  it('runs a fresh cycle once the previous one has settled', async () => {
    const source = FakeSecretSource.json({ API_KEY: 'x' });
    const sink = new FakeSecretSink();
    const { engine } = makeEngine(source, sink);

    await engine.runOnce('api');
    await engine.runOnce('api');

    expect(source.calls).toHaveLength(2);
    expect(sink.calls).toHaveLength(2);
  });

  it('rejects overlapping calls under the reject policy without touching health', async () => {
    const gate = deferred<Uint8Array>();
    const source = new FakeSecretSource(gate.promise);
    const sink = new FakeSecretSink();
    const { engine, health } = makeEngine(source, sink, { concurrency: 'reject' });

    const first = engine.runOnce('schedule');
    const rejected = await engine.runOnce('api');
    expect(rejected.outcome).toBe('failure');
    expect(rejected.error?.code).toBe('ALREADY_IN_PROGRESS');
    expect(health.report().lastSync).toBeNull();

    gate.resolve(bytes('{"API_KEY":"x"}'));
    expect((await first).outcome).toBe('success');
    expect(source.calls).toHaveLength(1);
    expect(health.report().lastSync?.outcome).toBe('success');
  });

  it('times out a hung fetch and releases the guard', async () => {
    const hung = new Promise<Uint8Array>(() => undefined);
    const source = new FakeSecretSource(hung, bytes('{"API_KEY":"x"}'));
    const sink = new FakeSecretSink();
    const { engine, health } = makeEngine(source, sink, { stepTimeoutMs: 20 });

    const failed = await engine.runOnce('schedule');
    expect(failed.outcome).toBe('failure');
    expect(failed.error).toEqual({ code: 'SOURCE_UNAVAILABLE', message: 'fetch timed out after 20ms' });
    expect(health.report().source).toEqual({ ready: false, detail: 'fetch timed out after 20ms' });
    expect(sink.calls).toHaveLength(0);

    const recovered = await engine.runOnce('schedule');
    expect(recovered.outcome).toBe('success');
    expect(source.calls).toHaveLength(2);
    expect(health.report().source.ready).toBe(true);
  });

  it('times out a hung apply as a sink failure', async () => {
    const source = FakeSecretSource.json({ API_KEY: 'x' });
    const sink = new FakeSecretSink();
    sink.holdNext(new Promise<void>(() => undefined));
    const { engine } = makeEngine(source, sink, { stepTimeoutMs: 20 });

    const result = await engine.runOnce('schedule');
    expect(result.error).toEqual({ code: 'SINK_UNAVAILABLE', message: 'apply timed out after 20ms' });
  });

  it.each([
    [new SourceUnavailableError('network down'), 'SOURCE_UNAVAILABLE'],
    [new SourceNotFoundError('secret version missing'), 'SOURCE_NOT_FOUND'],
  ])('reports source failures (%s)', async (error, code) => {
    const source = new FakeSecretSource(error);
    const sink = new FakeSecretSink();
    const { engine, health } = makeEngine(source, sink);

    const result = await engine.runOnce('schedule');
    expect(result.error).toEqual({ code, message: error.message });
    expect(health.report().lastSync?.error?.code).toBe(code);
    expect(health.report().source.ready).toBe(false);
    expect(sink.calls).toHaveLength(0);
  });

  it('wraps unexpected source errors as unavailable', async () => {
    const source = new FakeSecretSource(new Error('socket hang up'));
    const { engine } = makeEngine(source, new FakeSecretSink());

    const result = await engine.runOnce('schedule');
    expect(result.error).toEqual({ code: 'SOURCE_UNAVAILABLE', message: 'fetch failed: socket hang up' });
  });

  it('treats a source that throws synchronously as unavailable', async () => {
    const sink = new FakeSecretSink();
    const { engine, health } = makeEngine(new FakeSecretSource(), sink, {
      source: {
        fetch: (): Promise<Uint8Array> => {
          throw new Error('client closed');
        },
        describe: () => 'closed source',
      },
    });

    const result = await engine.runOnce('schedule');
    expect(result.error).toEqual({ code: 'SOURCE_UNAVAILABLE', message: 'fetch failed: client closed' });
    expect(health.report().source).toEqual({ ready: false, detail: 'fetch failed: client closed' });
    expect(sink.calls).toHaveLength(0);
  });

  it('reports parse failures without calling the sink', async () => {
    const source = new FakeSecretSource(bytes('{"PORT":8080}'));
    const sink = new FakeSecretSink();
    const { engine, health } = makeEngine(source, sink);

    const result = await engine.runOnce('schedule');
    expect(result.error?.code).toBe('PARSE_ERROR');
    expect(sink.calls).toHaveLength(0);
    // fetch worked, so the source stays ready
    expect(health.report().source.ready).toBe(true);
  });

  it.each([
    [new SinkUnavailableError('kubernetes replace failed'), 'SINK_UNAVAILABLE'],
    [new SinkRejectedError('kubernetes rejected create'), 'SINK_REJECTED'],
  ])('reports sink failures (%s)', async (error, code) => {
    const source = FakeSecretSource.json({ API_KEY: 'x' });
    const sink = new FakeSecretSink();
    sink.failNext(error);
    const { engine, health } = makeEngine(source, sink);

    const result = await engine.runOnce('schedule');
    expect(result.error).toEqual({ code, message: error.message });
    expect(health.report().sink).toEqual({ ready: false, detail: error.message });
  });

  it('never logs secret values', async () => {
    const source = FakeSecretSource.json({ 'şablon': 'super-secret-value' });
    const { engine } = makeEngine(source, new FakeSecretSink());

    await engine.runOnce('schedule');
    expect(logs.length).toBeGreaterThan(0);
    expect(logs.join('')).not.toContain('super-secret-value');
  });
});
