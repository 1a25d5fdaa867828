import test from 'node:test';
import assert from 'node:assert/strict';
import { UpstreamError } from '../src/core/errors';
import { parseLogLevel, serializeError } from '../src/core/log';

test('parseLogLevel reads levels and silent aliases', () => {
  assert.equal(parseLogLevel(' DEBUG '), 'debug');
  assert.equal(parseLogLevel('warn'), 'warn');
  assert.equal(parseLogLevel('silent'), null);
  assert.equal(parseLogLevel('off'), null);
  assert.equal(parseLogLevel(undefined), 'info');
  assert.equal(parseLogLevel('verbose'), 'info');
});

test('serializeError names the failed collaborator and the cause', () => {
  const err = new UpstreamError('embedding', 'embedding failed', { cause: new Error('connection refused') });
  const out = serializeError(err);
  assert.ok(out);
  assert.equal(out.name, 'UpstreamError');
  assert.equal(out.message, 'embedding failed');
  assert.equal(out.service, 'embedding');
  assert.equal(out.cause, 'connection refused');
  assert.equal(serializeError(undefined), undefined);
  assert.deepEqual(serializeError('plain'), { message: 'plain' });
});
