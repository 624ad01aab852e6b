import { describe, it, expect, afterEach } from 'vitest';
import { buildService } from '../../src/app.js';
import { loadConfig, type AppConfig } from '../../src/config/index.js';
import { FakeSecretSink, FakeSecretSource, bytes, deferred } from '../utils/fakes.js';

type BuiltService = Awaited<ReturnType<typeof buildService>>;

function testConfig(overrides: Partial<AppConfig['api']> = {}): AppConfig {
  const cfg = loadConfig('nonexistent-config.json');
  return { ...cfg, api: { ...cfg.api, ...overrides } };
}

describe('sync over HTTP', () => {
  let service: BuiltService | null = null;

  afterEach(async () => {
    service?.scheduler.stop();
    await service?.server.close();
    service = null;
  });

  it('syncs end to end and reflects the outcome on /api/health', async () => {
    const source = FakeSecretSource.json({ API_KEY: 'x' });
    const sink = new FakeSecretSink();
    service = await buildService(testConfig({ token: 'test-secret' }), { source, sink });

    const res = await service.server.inject({
      method: 'POST',
      url: '/api/sync',
      headers: { authorization: 'Bearer test-secret' },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().status).toBe('success');
    expect(sink.get('test-ns', 'app-secrets')).toEqual({ API_KEY: 'x' });
    expect(source.calls).toEqual([{ projectId: 'test-project', secretName: 'app-secrets', version: 'latest' }]);

    const health = await service.server.inject({ method: 'GET', url: '/api/health' });
    const body = health.json();
    expect(body.status).toBe('healthy');
    expect(body.lastSync.outcome).toBe('success');
    expect(body.lastSync.trigger).toBe('api');
    expect(body.lastSync.keyCount).toBe(1);
    expect(body.checks.gcp).toEqual({ ready: true, detail: 'fake source' });
    expect(body.checks.kubernetes).toEqual({ ready: true, detail: 'fake sink' });
  });

  it('reports a failed cycle as degraded health', async () => {
    const source = new FakeSecretSource(bytes('["not","an","object"]'));
    const sink = new FakeSecretSink();
    service = await buildService(testConfig(), { source, sink });

    const res = await service.server.inject({ method: 'POST', url: '/api/sync' });
    expect(res.json()).toMatchObject({
      status: 'failure',
      code: 'PARSE_ERROR',
      message: 'Sync failed: top-level value must be a JSON object',
    });
    expect(sink.calls).toHaveLength(0);

    const health = (await service.server.inject({ method: 'GET', url: '/api/health' })).json();
    expect(health.status).toBe('degraded');
    expect(health.lastSync.error.code).toBe('PARSE_ERROR');
  });

  it('collapses concurrent triggers into one fetch and apply', async () => {
    const gate = deferred<Uint8Array>();
    const source = new FakeSecretSource(gate.promise);
    const sink = new FakeSecretSink();
    service = await buildService(testConfig(), { source, sink });
    const server = service.server;
    await server.ready();

    const first = server.inject({ method: 'POST', url: '/api/sync' });
    const second = server.inject({ method: 'POST', url: '/api/sync' });
    // let both requests reach the engine before the fetch completes
    await new Promise((r) => setTimeout(r, 50));
    gate.resolve(bytes('{"API_KEY":"x"}'));
    const [a, b] = await Promise.all([first, second]);

    expect(a.json().status).toBe('success');
    expect(b.json().status).toBe('success');
    expect(source.calls).toHaveLength(1);
    expect(sink.calls).toHaveLength(1);
  });

  it('shares the guard between the scheduler and on-demand triggers', async () => {
    const gate = deferred<Uint8Array>();
    const source = new FakeSecretSource(gate.promise, bytes('{"API_KEY":"y"}'));
    const sink = new FakeSecretSink();
    service = await buildService(testConfig(), { source, sink });

    await service.server.ready();
    service.scheduler.start();
    const triggered = service.server.inject({ method: 'POST', url: '/api/sync' });
    await new Promise((r) => setTimeout(r, 50));
    gate.resolve(bytes('{"API_KEY":"x"}'));
    const res = await triggered;

    expect(res.json().status).toBe('success');
    expect(source.calls).toHaveLength(1);
    expect(sink.get('test-ns', 'app-secrets')).toEqual({ API_KEY: 'x' });
    expect(service.scheduler.info().nextDelayMs).toBe(300_000);
  });
});
