import { after, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Uploader } from '../src/agents/uploader';
import { UploadError } from '../src/core/errors';
import type { Attachment } from '../src/core/types';
import { HttpGateway } from '../src/middleware/httpGateway';
import {
  FakeSession,
  ORIGIN,
  SIGN_ACTION_ID,
  StubTransport,
  UPLOAD_ACTION_ID,
  bodyText,
  captureLogs,
  testConfig,
  type StubReply,
  type StubRoute,
} from './helpers';

const ACTION_URL = `${ORIGIN}/?chat-modality=image`;
const STORAGE_URL = 'https://storage.test/put/1';
const SIGNED_URL = 'https://cdn.test/uploads/k1.png?sig=1';

const cat: Attachment = { filename: 'cat.png', mimeType: 'image/png', data: new Uint8Array([1, 2, 3]) };

interface Overrides {
  slot?: StubReply;
  transfer?: StubReply;
  sign?: StubReply;
}

function uploadRoute(overrides: Overrides = {}): StubRoute {
  return (request) => {
    if (request.url === STORAGE_URL) {
      return overrides.transfer ?? {};
    }
    if (request.headers['next-action'] === UPLOAD_ACTION_ID) {
      return (
        overrides.slot ?? {
          chunks: [
            '0:["$@1",["build",null]]\n',
            `1:${JSON.stringify({ success: true, data: { uploadUrl: STORAGE_URL, key: 'uploads/k1.png' } })}\n`,
          ],
        }
      );
    }
    if (request.headers['next-action'] === SIGN_ACTION_ID) {
      return overrides.sign ?? { chunks: [`1:${JSON.stringify({ success: true, data: { url: SIGNED_URL } })}\n`] };
    }
    return { status: 404, chunks: ['unexpected'] };
  };
}

function uploaderFor(route: StubRoute, uploadCache = true) {
  const stub = new StubTransport(route);
  const config = testConfig({ uploadCache });
  const gateway = new HttpGateway({ config, credentials: new FakeSession(), transport: stub.transport });
  const discovery = {
    resolveAction: async (name: string) => (name === 'generate-upload-url' ? UPLOAD_ACTION_ID : SIGN_ACTION_ID),
  };
  return { uploader: new Uploader({ gateway, discovery, config }), stub };
}

describe('Uploader', () => {
  const logs = captureLogs();
  after(() => logs.restore());

  it('runs slot, transfer and sign and returns the descriptor', async () => {
    const { uploader, stub } = uploaderFor(uploadRoute());
    const descriptor = await uploader.upload(cat);

    assert.deepEqual(descriptor, { name: 'uploads/k1.png', contentType: 'image/png', url: SIGNED_URL });

    const [slot, transfer, sign] = stub.requests;
    assert.equal(slot.url, ACTION_URL);
    assert.equal(slot.method, 'POST');
    assert.equal(bodyText(slot), '["cat.png","image/png"]');
    assert.equal(slot.headers['accept'], 'text/x-component');
    assert.equal(slot.headers['content-type'], 'text/plain;charset=UTF-8');
    assert.equal(slot.headers['referer'], ACTION_URL);

    assert.equal(transfer.method, 'PUT');
    assert.equal(transfer.headers['content-type'], 'image/png');
    assert.equal(transfer.headers['cookie'], undefined);
    assert.deepEqual(transfer.body, new Uint8Array([1, 2, 3]));

    assert.equal(bodyText(sign), '["uploads/k1.png"]');
    assert.equal(stub.requests.length, 3);
  });

  it('reuses the descriptor for identical bytes', async () => {
    const { uploader, stub } = uploaderFor(uploadRoute());
    const first = await uploader.upload(cat);
    const second = await uploader.upload({ ...cat, filename: 'copy.png' });

    assert.equal(second, first);
    assert.equal(stub.requests.length, 3);
  });

  it('uploads again when the cache is off', async () => {
    const { uploader, stub } = uploaderFor(uploadRoute(), false);
    await uploader.uploadAll([cat, cat]);
    assert.equal(stub.requests.length, 6);
  });

  it('tags a rejected slot request with the slot phase', async () => {
    const { uploader, stub } = uploaderFor(
      uploadRoute({ slot: { chunks: ['1:{"success":false,"error":"quota"}\n'] } }),
    );
    await assert.rejects(uploader.upload(cat), (err: unknown) => {
      assert.ok(err instanceof UploadError);
      assert.equal(err.phase, 'slot');
      return true;
    });
    assert.equal(stub.requests.length, 1);
  });

  it('tags a failed transfer with the transfer phase and never signs', async () => {
    const { uploader, stub } = uploaderFor(uploadRoute({ transfer: { status: 500, chunks: ['storage down'] } }));
    await assert.rejects(uploader.upload(cat), (err: unknown) => {
      assert.ok(err instanceof UploadError);
      assert.equal(err.phase, 'transfer');
      return true;
    });
    assert.equal(stub.to(ACTION_URL).length, 1);
  });

  it('tags a sign response without a result line with the sign phase', async () => {
    const { uploader } = uploaderFor(uploadRoute({ sign: { chunks: ['0:["$@1"]\n'] } }));
    await assert.rejects(uploader.upload(cat), (err: unknown) => {
      assert.ok(err instanceof UploadError);
      assert.equal(err.phase, 'sign');
      assert.equal(err.message, 'Upload failed during sign: get-signed-url response has no result line');
      return true;
    });
  });

  it('stops at the first failing attachment', async () => {
    const { uploader, stub } = uploaderFor(uploadRoute({ transfer: { status: 403, chunks: ['denied'] } }));
    const dog: Attachment = { filename: 'dog.png', mimeType: 'image/png', data: new Uint8Array([9]) };
    await assert.rejects(uploader.uploadAll([cat, dog]), UploadError);
    assert.equal(stub.requests.length, 2);
  });
});
