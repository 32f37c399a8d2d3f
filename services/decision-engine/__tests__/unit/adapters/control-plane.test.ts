/**
 * Control Plane Client Unit Tests
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { RecordingLogger } from '@regionguard/core';
import { DryRunControlPlane, HttpControlPlaneClient } from '../../../src/adapters/control-plane';
import type { FetchFn } from '../../../src/types';

describe('HttpControlPlaneClient', () => {
  let fetchFn: jest.Mock<FetchFn>;
  let logger: RecordingLogger;

  beforeEach(() => {
    fetchFn = jest.fn<FetchFn>().mockImplementation(async () => new Response(null, { status: 204 }));
    logger = new RecordingLogger();
  });

  function createClient(apiToken?: string): HttpControlPlaneClient {
    return new HttpControlPlaneClient({ baseUrl: 'https://cp.example.com/v1/', apiToken, fetchFn, logger });
  }

  it('posts DNS record updates with a bearer token', async () => {
    const result = await createClient('test-secret').updateRecord('example.com', 'www', 'web.eu-west-1.example.com');

    expect(result).toEqual({ ok: true });
    expect(fetchFn).toHaveBeenCalledWith('https://cp.example.com/v1/dns/records', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
      body: JSON.stringify({ zone: 'example.com', name: 'www', target: 'web.eu-west-1.example.com' }),
      signal: expect.any(AbortSignal),
    });
  });

  it('posts CDN origin switches and capacity changes without auth when no token is set', async () => {
    const client = createClient();

    await client.updateOrigin('dist-1', 'origin-eu-west-1.example.com');
    await client.adjustCapacity('web-eu-west-1', 2);

    expect(fetchFn.mock.calls).toEqual([
      [
        'https://cp.example.com/v1/cdn/origins',
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ distributionId: 'dist-1', origin: 'origin-eu-west-1.example.com' }),
          signal: expect.any(AbortSignal),
        },
      ],
      [
        'https://cp.example.com/v1/scaling/capacity',
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ target: 'web-eu-west-1', delta: 2 }),
          signal: expect.any(AbortSignal),
        },
      ],
    ]);
  });

  it('returns a failed result with the status and body for a rejected change', async () => {
    fetchFn.mockImplementation(async () => new Response('record is locked', { status: 409 }));

    const result = await createClient().updateRecord('example.com', 'www', 'web.eu-west-1.example.com');

    expect(result).toEqual({ ok: false, message: 'HTTP 409: record is locked' });
    expect(logger.getWarnings()[0]?.meta).toEqual({ path: '/dns/records', status: 409 });
  });

  it('rejects when the gateway cannot be reached', async () => {
    fetchFn.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(createClient().adjustCapacity('web-eu-west-1', 2)).rejects.toThrow('ECONNREFUSED');
  });

  it('aborts a request the gateway does not answer within the timeout', async () => {
    fetchFn.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );
    const client = new HttpControlPlaneClient({ baseUrl: 'https://cp.example.com', timeoutMs: 20, fetchFn, logger });

    await expect(client.updateRecord('example.com', 'www', 'web.eu-west-1.example.com')).rejects.toThrow(
      'Control plane request to /dns/records timed out after 20ms'
    );
  });
});

describe('DryRunControlPlane', () => {
  it('logs every change and reports success', async () => {
    const logger = new RecordingLogger();
    const plane = new DryRunControlPlane(logger);

    const results = [
      await plane.updateRecord('example.com', 'www', 'web.eu-west-1.example.com'),
      await plane.updateOrigin('dist-1', 'origin-eu-west-1.example.com'),
      await plane.adjustCapacity('web-eu-west-1', 2),
    ];

    expect(results).toEqual([{ ok: true }, { ok: true }, { ok: true }]);
    expect(logger.getLogs('info').map(entry => entry.msg)).toEqual([
      'Dry run: DNS record update',
      'Dry run: CDN origin switch',
      'Dry run: capacity adjustment',
    ]);
  });
});
