import { describe, it, expect, vi, beforeEach } from 'vitest';
import { processHeartbeat } from './heartbeat.js';
import { rotateKey } from './devices.js';
import { expireDevice } from './scanner.js';
import { CommitResult, DeviceMutation } from '../store/types.js';
import { Device, DeviceId } from '../types/index.js';
import { StorageError } from '../types/errors.js';
import { MemoryStorage } from '../store/memory.js';
import { addDevice, createTestContext, HOUR, MINUTE, TestContext } from '../test-helpers.js';

const MIDNIGHT = Date.UTC(2024, 2, 10);
const T0 = MIDNIGHT + 9 * HOUR;

class FailingStorage extends MemoryStorage {
  failCommits = false;

  async commit(
    id: DeviceId,
    decide: (current: Device) => DeviceMutation | null
  ): Promise<CommitResult | null> {
    if (this.failCommits) {
      throw new StorageError('database unavailable');
    }
    return super.commit(id, decide);
  }
}

describe('processHeartbeat', () => {
  let t: TestContext;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    t = createTestContext();
    await addDevice(t.storage, 1, 'test-secret');
    await addDevice(t.storage, 2, 'other-secret');
  });

  it('rejects an unknown key without touching any device', async () => {
    const result = await processHeartbeat(t.ctx, 'not-a-key', T0);

    expect(result).toEqual({ status: 'rejected', reason: 'invalid_key' });
    expect(await t.storage.all(1)).toEqual([]);
    expect(await t.storage.all(2)).toEqual([]);
    expect((await t.storage.findById(1))?.lastSeen).toBeNull();
    expect(t.notifier.notices).toEqual([]);
  });

  it('rejects an empty key', async () => {
    expect(await processHeartbeat(t.ctx, '', T0)).toEqual({ status: 'rejected', reason: 'invalid_key' });
  });

  it('switches a new device ON with no prior duration', async () => {
    const result = await processHeartbeat(t.ctx, 'test-secret', T0);

    expect(result).toEqual({ status: 'accepted', deviceId: 1, transitioned: true });
    expect(await t.storage.findById(1)).toMatchObject({ state: 'ON', lastSeen: T0, lastChange: T0 });
    expect(await t.storage.all(1)).toEqual([{ deviceId: 1, state: 'ON', timestamp: T0 }]);

    expect(t.notifier.notices).toEqual([
      {
        deviceId: 1,
        direction: 'recovered',
        at: T0,
        timezone: 'UTC',
        elapsedSincePriorChangeMs: null,
        dailyStats: { uptimeMs: 0, downtimeMs: 9 * HOUR, outages: 0, windowStart: MIDNIGHT, asOf: T0 },
      },
    ]);
  });

  it('only refreshes last_seen while already ON', async () => {
    await processHeartbeat(t.ctx, 'test-secret', T0);
    const result = await processHeartbeat(t.ctx, 'test-secret', T0 + MINUTE);

    expect(result).toEqual({ status: 'accepted', deviceId: 1, transitioned: false });
    expect(await t.storage.findById(1)).toMatchObject({ state: 'ON', lastSeen: T0 + MINUTE, lastChange: T0 });
    expect(await t.storage.all(1)).toHaveLength(1);
    expect(t.notifier.notices).toHaveLength(1);
  });

  it('never moves last_seen backwards', async () => {
    await processHeartbeat(t.ctx, 'test-secret', T0 + MINUTE);
    await processHeartbeat(t.ctx, 'test-secret', T0);

    expect((await t.storage.findById(1))?.lastSeen).toBe(T0 + MINUTE);
  });

  it('reports how long the power was out when it comes back', async () => {
    await processHeartbeat(t.ctx, 'test-secret', T0 - HOUR);
    await expireDevice(t.ctx, 1, T0 - 50 * MINUTE);

    const result = await processHeartbeat(t.ctx, 'test-secret', T0);

    expect(result).toEqual({ status: 'accepted', deviceId: 1, transitioned: true });
    const recovered = t.notifier.notices[t.notifier.notices.length - 1];
    expect(recovered.direction).toBe('recovered');
    expect(recovered.elapsedSincePriorChangeMs).toBe(HOUR - 1);
  });

  it('lets exactly one of two concurrent heartbeats record the transition', async () => {
    const results = await Promise.all([
      processHeartbeat(t.ctx, 'test-secret', T0),
      processHeartbeat(t.ctx, 'test-secret', T0 + 1),
    ]);

    const transitioned = results.filter((r) => r.status === 'accepted' && r.transitioned);
    expect(transitioned).toHaveLength(1);
    expect(await t.storage.all(1)).toHaveLength(1);
    expect((await t.storage.findById(1))?.lastSeen).toBe(T0 + 1);
  });

  it('stops accepting a key once it has been rotated', async () => {
    await rotateKey(t.ctx, 1);

    expect(await processHeartbeat(t.ctx, 'test-secret', T0)).toEqual({
      status: 'rejected',
      reason: 'invalid_key',
    });
    expect((await t.storage.findById(1))?.state).toBe('UNKNOWN');
  });

  it('keeps the transition when the notification fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    t.notifier.failWith = new Error('channel down');

    const result = await processHeartbeat(t.ctx, 'test-secret', T0);

    expect(result).toEqual({ status: 'accepted', deviceId: 1, transitioned: true });
    expect((await t.storage.findById(1))?.state).toBe('ON');
    expect(await t.storage.all(1)).toHaveLength(1);

    await vi.waitFor(() => expect(errorSpy).toHaveBeenCalled());
  });

  it('commits nothing when the store fails', async () => {
    const storage = new FailingStorage();
    const failing = createTestContext({ storage });
    await addDevice(storage, 1, 'test-secret');
    storage.failCommits = true;

    await expect(processHeartbeat(failing.ctx, 'test-secret', T0)).rejects.toBeInstanceOf(StorageError);

    expect(await storage.findById(1)).toMatchObject({ state: 'UNKNOWN', lastSeen: null });
    expect(await storage.all(1)).toEqual([]);
    expect(failing.notifier.notices).toEqual([]);
    expect(failing.ctx.locks.isLocked(1)).toBe(false);
  });
});
