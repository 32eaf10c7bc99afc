import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createApp } from '../app.js';
import { parseExternalId, parseInstant } from './devices.js';
import { createTestContext, TestContext } from '../test-helpers.js';
import { listen, RunningServer } from '../test-server.js';

const API_KEY = 'test-api-key';

describe('parseExternalId', () => {
  it('accepts negative channel ids', () => {
    expect(parseExternalId('-1001')).toBe(-1001);
    expect(parseExternalId(42)).toBe(42);
  });

  it('rejects anything else', () => {
    expect(parseExternalId('12abc')).toBeNull();
    expect(parseExternalId(1.5)).toBeNull();
    expect(parseExternalId(undefined)).toBeNull();
  });
});

describe('parseInstant', () => {
  it('accepts epoch milliseconds and ISO strings', () => {
    expect(parseInstant('1710061200000')).toBe(1710061200000);
    expect(parseInstant('2024-03-10T09:00:00Z')).toBe(Date.UTC(2024, 2, 10, 9));
  });

  it('rejects garbage', () => {
    expect(parseInstant('yesterday')).toBeNull();
    expect(parseInstant('')).toBeNull();
  });
});

describe('/api/devices', () => {
  let t: TestContext;
  let server: RunningServer;

  function api(path: string, init: RequestInit = {}): Promise<Response> {
    return fetch(`${server.baseUrl}/api/devices${path}`, {
      ...init,
      headers: { 'Content-Type': 'application/json', 'x-api-key': API_KEY },
    });
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    t = createTestContext();
    server = await listen(createApp(t.ctx, API_KEY));
  });

  afterEach(async () => {
    await server.close();
  });

  async function createChannel(): Promise<void> {
    const res = await api('', {
      method: 'POST',
      body: JSON.stringify({ id: -1001, owner_id: 42, secret_key: 'test-secret' }),
    });
    expect(res.status).toBe(201);
  }

  it('requires the API key', async () => {
    const res = await fetch(`${server.baseUrl}/api/devices/1`);

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ success: false, error: 'Unauthorized' });
  });

  it('accepts the API key as a query parameter', async () => {
    await createChannel();
    const res = await fetch(`${server.baseUrl}/api/devices/-1001?key=${API_KEY}`);
    expect(res.status).toBe(200);
  });

  it('creates a device and returns its ping url', async () => {
    const res = await api('', {
      method: 'POST',
      body: JSON.stringify({ id: -1001, owner_id: 42, secret_key: 'test-secret' }),
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      success: true,
      data: { id: -1001, secret_key: 'test-secret', ping_url: '/channelPing?channel_key=test-secret' },
    });
  });

  it('validates the create request', async () => {
    const res = await api('', { method: 'POST', body: JSON.stringify({ id: 'abc', owner_id: 42 }) });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'id and owner_id must be integers' });
  });

  it('refuses to create the same device twice', async () => {
    await createChannel();
    const res = await api('', { method: 'POST', body: JSON.stringify({ id: -1001, owner_id: 42 }) });

    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ success: false, error: 'Device -1001 is already configured' });
  });

  it('returns the current state', async () => {
    await createChannel();
    const res = await api('/-1001');

    expect(await res.json()).toEqual({
      success: true,
      data: { state: 'UNKNOWN', lastSeen: null, lastChange: null },
    });
  });

  it('answers 404 for an unknown device and 400 for a malformed id', async () => {
    const missing = await api('/5');
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ success: false, error: 'Device 5 not found' });

    const malformed = await api('/abc');
    expect(malformed.status).toBe(400);
  });

  it('returns null stats for a device never heard from', async () => {
    await createChannel();
    const res = await api('/-1001/stats?as_of=2024-03-10T09:00:00Z');

    expect(await res.json()).toEqual({ success: true, data: null });
  });

  it('rejects a malformed as_of', async () => {
    await createChannel();
    const res = await api('/-1001/stats?as_of=soon');

    expect(res.status).toBe(400);
  });

  it('returns daily stats after heartbeats', async () => {
    await createChannel();
    await fetch(`${server.baseUrl}/channelPing?channel_key=test-secret`);

    const res = await api('/-1001/stats');
    const body = await res.json();

    expect(body).toMatchObject({ success: true, data: { outages: 0 } });
  });

  it('rotates and replaces keys', async () => {
    await createChannel();

    const rotated = await api('/-1001/key', { method: 'POST' });
    expect(rotated.status).toBe(200);
    expect(await t.storage.findByKey('test-secret')).toBeNull();

    const replaced = await api('/-1001/key', { method: 'PUT', body: JSON.stringify({ secret_key: 'chosen-secret' }) });
    expect(await replaced.json()).toEqual({ success: true });

    const key = await api('/-1001/key');
    expect(await key.json()).toEqual({ success: true, data: { secret_key: 'chosen-secret' } });
  });

  it('updates settings', async () => {
    await createChannel();

    expect((await api('/-1001/timezone', { method: 'PUT', body: JSON.stringify({ timezone: 'Europe/Kyiv' }) })).status).toBe(200);
    expect((await api('/-1001/paused', { method: 'PUT', body: JSON.stringify({ paused: true }) })).status).toBe(200);
    expect((await api('/-1001/owner', { method: 'PUT', body: JSON.stringify({ owner_id: 7 }) })).status).toBe(200);

    expect(await t.storage.findById(-1001)).toMatchObject({ timezone: 'Europe/Kyiv', paused: true, ownerId: 7 });
  });

  it('rejects an unknown timezone', async () => {
    await createChannel();
    const res = await api('/-1001/timezone', { method: 'PUT', body: JSON.stringify({ timezone: 'Mars/Olympus' }) });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Unknown timezone: Mars/Olympus' });
  });

  it("lists an owner's devices as text", async () => {
    await createChannel();
    const res = await api('?owner=42&format=text');

    expect(await res.text()).toBe('📊 Ваші канали (1 всього)\n\n⚠️ Немає даних (1):\n  -1001 (UTC)\n');
  });

  it('exports history as csv', async () => {
    await createChannel();
    const res = await api('/-1001/export?format=csv');

    expect(res.headers.get('content-type')).toMatch(/^text\/csv/);
    expect(res.headers.get('content-disposition')).toBe('attachment; filename="device--1001-history.csv"');
    expect(await res.text()).toBe('state,start,end,duration_seconds\n');
  });

  it('deletes a device', async () => {
    await createChannel();

    expect((await api('/-1001', { method: 'DELETE' })).status).toBe(200);
    expect((await api('/-1001', { method: 'DELETE' })).status).toBe(404);
  });
});
