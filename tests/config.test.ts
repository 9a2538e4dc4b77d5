import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_BLOCK_PAGE_SIGNATURES, loadClientConfig } from '../src/core/types';

describe('loadClientConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadClientConfig({});

    assert.equal(config.origin, 'https://lmarena.ai');
    assert.equal(config.bootPath, '/?mode=direct');
    assert.equal(config.imagePath, '/?chat-modality=image');
    assert.equal(config.authCookieName, 'arena-auth-prod');
    assert.deepEqual(config.blockPageSignatures, DEFAULT_BLOCK_PAGE_SIGNATURES);
    assert.equal(config.chatTimeoutMs, 300_000);
    assert.equal(config.tokenTimeoutMs, 60_000);
    assert.equal(config.discoveryTtlMs, 3_600_000);
    assert.equal(config.uploadCache, true);
    assert.deepEqual(config.browser, {
      executablePath: undefined,
      userDataDir: undefined,
      profileDirectory: undefined,
      headless: false,
      incognito: false,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadClientConfig({
      ARENA_ORIGIN: 'https://arena.test//',
      ARENA_TIMEOUT_MS: '1500',
      ARENA_LOCK_WAIT_MS: '250',
      ARENA_BLOCK_SIGNATURES: 'access denied | edge says no |',
      ARENA_UPLOAD_CACHE: 'off',
      ARENA_HEADLESS: 'YES',
      ARENA_BROWSER_PROFILE: 'Profile 2',
    });

    assert.equal(config.origin, 'https://arena.test');
    assert.equal(config.chatTimeoutMs, 1500);
    assert.equal(config.lockWaitTimeoutMs, 250);
    assert.deepEqual(config.blockPageSignatures, ['access denied', 'edge says no']);
    assert.equal(config.uploadCache, false);
    assert.equal(config.browser.headless, true);
    assert.equal(config.browser.profileDirectory, 'Profile 2');
  });

  it('treats blank flags and paths as unset', () => {
    const config = loadClientConfig({ ARENA_HEADLESS: ' ', ARENA_BROWSER_EXECUTABLE_PATH: '' });
    assert.equal(config.browser.headless, false);
    assert.equal(config.browser.executablePath, undefined);
  });
});
