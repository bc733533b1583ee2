import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { loadRoutingConfig, parseRoutingConfig } from '../../src/config/routing-config.js';

function buildRawConfig(overrides: Record<string, unknown> = {}) {
  return {
    mq: { max_retries: 5 },
    notifications: [
      {
        event_type: 'registration',
        queue_name: 'user_events',
        http_method: 'POST',
        http_url: 'https://crm.example.com/api/users',
        headers: { Authorization: 'Bearer test-token' },
        body: { id: '{$.event.user_id}', n: 5 },
        ...overrides,
      },
    ],
  };
}

describe('routing config', () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = undefined;
    }
  });

  it('maps file keys onto routing rules', () => {
    const config = parseRoutingConfig(buildRawConfig());

    expect(config).toEqual({
      mq: { maxRetries: 5 },
      notifications: [
        {
          eventType: 'registration',
          queueName: 'user_events',
          method: 'POST',
          url: 'https://crm.example.com/api/users',
          headers: { Authorization: 'Bearer test-token' },
          bodyTemplate: { id: '{$.event.user_id}', n: 5 },
        },
      ],
    });
  });

  it('defaults max retries to 16 when unset or zero', () => {
    const unset = parseRoutingConfig({ notifications: buildRawConfig().notifications });
    const zero = parseRoutingConfig({ ...buildRawConfig(), mq: { max_retries: 0 } });

    expect(unset.mq.maxRetries).toBe(16);
    expect(zero.mq.maxRetries).toBe(16);
  });

  it('normalizes the http method and defaults headers', () => {
    const config = parseRoutingConfig(buildRawConfig({ http_method: 'patch', headers: undefined }));

    expect(config.notifications[0]?.method).toBe('PATCH');
    expect(config.notifications[0]?.headers).toEqual({});
  });

  it('leaves the body template out when the rule has no body', () => {
    const config = parseRoutingConfig(buildRawConfig({ body: undefined }));

    expect(config.notifications[0]).not.toHaveProperty('bodyTemplate');
  });

  it('rejects unsupported http methods', () => {
    expect(() => parseRoutingConfig(buildRawConfig({ http_method: 'FETCH' }))).toThrow(
      /notifications\.0\.http_method/,
    );
  });

  it('rejects relative and malformed urls', () => {
    expect(() => parseRoutingConfig(buildRawConfig({ http_url: '/api/users' }))).toThrow(
      'notifications.0.http_url: must be an absolute http(s) URL',
    );
    expect(() => parseRoutingConfig(buildRawConfig({ http_url: 'not a url' }))).toThrow(
      'notifications.0.http_url: must be an absolute http(s) URL',
    );
  });

  it('rejects two rules for the same event type', () => {
    const raw = buildRawConfig();
    const duplicate = { ...raw.notifications[0], queue_name: 'other_events' };

    expect(() => parseRoutingConfig({ ...raw, notifications: [...raw.notifications, duplicate] })).toThrow(
      "notifications.1.event_type: duplicate rule for event type 'registration'",
    );
  });

  it('rejects an empty notification list and negative retries', () => {
    expect(() => parseRoutingConfig({ mq: {}, notifications: [] })).toThrow(
      'notifications: no notifications configured',
    );
    expect(() => parseRoutingConfig({ ...buildRawConfig(), mq: { max_retries: -1 } })).toThrow(
      /mq\.max_retries/,
    );
  });

  it('loads and validates a config file', async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'relay-config-'));
    const path = join(tempDir, 'config.json');
    await writeFile(path, JSON.stringify(buildRawConfig()), 'utf8');

    const config = await loadRoutingConfig(path);

    expect(config.notifications).toHaveLength(1);
    expect(config.mq.maxRetries).toBe(5);
  });

  it('reports unreadable and non-JSON config files', async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'relay-config-'));
    const path = join(tempDir, 'config.json');
    await writeFile(path, '{ not json', 'utf8');

    await expect(loadRoutingConfig(join(tempDir, 'missing.json'))).rejects.toThrow(
      /^Failed to read routing configuration from/,
    );
    await expect(loadRoutingConfig(path)).rejects.toThrow(/is not valid JSON\.$/);
  });
});
