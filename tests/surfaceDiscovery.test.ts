import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SurfaceDiscovery, buildCatalog } from '../src/agents/surfaceDiscovery';
import { DiscoveryError, ModelNotFoundError } from '../src/core/errors';
import { HttpGateway } from '../src/middleware/httpGateway';
import {
  FakeSession,
  SIGN_ACTION_ID,
  StubTransport,
  UPLOAD_ACTION_ID,
  bundle,
  captureLogs,
  landingPage,
  surfaceRoute,
  testConfig,
  type StubRoute,
} from './helpers';

function discoveryFor(route: StubRoute = surfaceRoute()) {
  const clock = { now: 1_000_000 };
  const stub = new StubTransport(route);
  const config = testConfig();
  const gateway = new HttpGateway({ config, credentials: new FakeSession(), transport: stub.transport });
  const discovery = new SurfaceDiscovery({ gateway, config, now: () => clock.now });
  return { discovery, stub, clock, ttl: config.discoveryTtlMs };
}

describe('SurfaceDiscovery', () => {
  const logs = captureLogs();
  after(() => logs.restore());

  it('builds the catalog from the landing page', async () => {
    const { discovery } = discoveryFor();
    const catalog = await discovery.listModels();

    assert.deepEqual(
      catalog.models.map((m) => m.displayName),
      ['gemini-3-pro', 'claude-test', 'imagen-test'],
    );
    assert.equal(catalog.defaultModel, 'claude-test');
    assert.equal(catalog.fetchedAt, 1_000_000);
  });

  it('resolves logical and raw action names', async () => {
    const { discovery } = discoveryFor();
    assert.equal(await discovery.resolveAction('generate-upload-url'), UPLOAD_ACTION_ID);
    assert.equal(await discovery.resolveAction('get-signed-url'), SIGN_ACTION_ID);
    assert.equal(await discovery.resolveAction('getSignedUrl'), SIGN_ACTION_ID);
  });

  it('fetches the site once for repeated lookups within the staleness window', async () => {
    const { discovery, stub, clock, ttl } = discoveryFor();

    await discovery.resolveAction('generate-upload-url');
    clock.now += ttl - 1;
    await discovery.resolveAction('generate-upload-url');

    assert.equal(stub.to('/?mode=direct').length, 1);
    assert.equal(stub.requests.length, 2);
  });

  it('refreshes once the staleness window has passed', async () => {
    const { discovery, stub, clock, ttl } = discoveryFor();

    await discovery.listModels();
    clock.now += ttl;
    const catalog = await discovery.listModels();

    assert.equal(stub.to('/?mode=direct').length, 2);
    assert.equal(catalog.fetchedAt, 1_000_000 + ttl);
  });

  it('shares one refresh between concurrent callers', async () => {
    const { discovery, stub } = discoveryFor();

    await Promise.all([discovery.listModels(), discovery.listModels(), discovery.resolveAction('get-signed-url')]);

    assert.equal(stub.to('/?mode=direct').length, 1);
  });

  it('refreshes on a forced listing and after invalidate()', async () => {
    const { discovery, stub } = discoveryFor();

    await discovery.listModels();
    await discovery.listModels(true);
    discovery.invalidate();
    await discovery.listModels();

    assert.equal(stub.to('/?mode=direct').length, 3);
  });

  it('refreshes once on an unknown action, then fails', async () => {
    const { discovery, stub } = discoveryFor();

    await assert.rejects(discovery.resolveAction('delete-everything'), (err: unknown) => {
      assert.ok(err instanceof DiscoveryError);
      assert.equal(err.message, 'Server action "delete-everything" not found in any bundle');
      return true;
    });
    assert.equal(stub.to('/?mode=direct').length, 2);
  });

  it('fails with DiscoveryError when the model payload is missing', async () => {
    const { discovery } = discoveryFor(surfaceRoute({ models: null }));
    await assert.rejects(discovery.listModels(), DiscoveryError);
  });

  it('falls back to later bundles when a chunk is unavailable', async () => {
    const { discovery, stub } = discoveryFor((request) => {
      if (request.url.endsWith('/main.js')) {
        return { chunks: [bundle({ generateUploadUrl: UPLOAD_ACTION_ID, getSignedUrl: SIGN_ACTION_ID })] };
      }
      if (request.url.includes('/_next/')) {
        return { status: 404, chunks: ['not found'] };
      }
      return { chunks: [landingPage()] };
    });

    assert.equal(await discovery.resolveAction('generate-upload-url'), UPLOAD_ACTION_ID);
    assert.deepEqual(
      stub.requests.map((r) => r.url.replace('https://arena.test', '')),
      [
        '/?mode=direct',
        '/_next/static/chunks/evaluation.js',
        '/_next/static/chunks/shared.js',
        '/_next/static/chunks/main.js',
      ],
    );
  });

  describe('resolveModel', () => {
    it('finds models by display name or id', async () => {
      const { discovery } = discoveryFor();
      assert.equal((await discovery.resolveModel('gemini-3-pro')).id, 'id-gemini');
      assert.equal((await discovery.resolveModel('id-imagen')).displayName, 'imagen-test');
    });

    it('uses the default model for an empty name', async () => {
      const { discovery } = discoveryFor();
      assert.equal((await discovery.resolveModel('')).displayName, 'claude-test');
    });

    it('rejects unknown models', async () => {
      const { discovery } = discoveryFor();
      await assert.rejects(discovery.resolveModel('gpt-none'), ModelNotFoundError);
    });
  });

  it('de-duplicates models by id and falls back to any model for the default', () => {
    const image = { id: 'i', displayName: 'zeta-image', outputsText: false, outputsImages: true, acceptsImages: false };
    const catalog = buildCatalog([image, { ...image, displayName: 'dupe' }], 5);
    assert.deepEqual(
      catalog.models.map((m) => m.displayName),
      ['zeta-image'],
    );
    assert.equal(catalog.defaultModel, 'zeta-image');
  });
});
