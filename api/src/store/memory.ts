import {
  Device,
  DeviceId,
  DeviceSettingsPatch,
  HistoryEvent,
  NewDevice,
  OwnerId,
} from '../types/index.js';
import { DeviceExistsError, DuplicateKeyError } from '../types/errors.js';
import { applyMutation } from './mutation.js';
import { CommitResult, DeviceMutation, DeviceStore, HistoryLog, MonitorStorage } from './types.js';

/**
 * In-process store. Each commit runs without awaiting between the read and
 * the write, so the row update and the history append land together.
 */
export class MemoryStorage implements MonitorStorage, DeviceStore, HistoryLog {
  private readonly rows = new Map<DeviceId, Device>();
  private readonly events = new Map<DeviceId, HistoryEvent[]>();

  get devices(): DeviceStore {
    return this;
  }

  get history(): HistoryLog {
    return this;
  }

  async findById(id: DeviceId): Promise<Device | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async findByKey(secretKey: string): Promise<Device | null> {
    for (const row of this.rows.values()) {
      if (row.secretKey === secretKey) {
        return { ...row };
      }
    }
    return null;
  }

  async findByOwner(ownerId: OwnerId): Promise<Device[]> {
    return this.sorted().filter((d) => d.ownerId === ownerId);
  }

  async findAll(): Promise<Device[]> {
    return this.sorted();
  }

  async findExpired(cutoff: number): Promise<Device[]> {
    return this.sorted().filter(
      (d) => d.state === 'ON' && !d.paused && d.lastSeen !== null && d.lastSeen < cutoff
    );
  }

  async insert(device: NewDevice): Promise<Device> {
    if (this.rows.has(device.id)) {
      throw new DeviceExistsError(device.id);
    }
    this.assertKeyFree(device.secretKey, device.id);

    const row: Device = {
      ...device,
      paused: false,
      state: 'UNKNOWN',
      lastSeen: null,
      lastChange: null,
    };
    this.rows.set(row.id, row);
    this.events.set(row.id, []);
    return { ...row };
  }

  async updateSettings(id: DeviceId, patch: DeviceSettingsPatch): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row) {
      return false;
    }
    if (patch.secretKey !== undefined) {
      this.assertKeyFree(patch.secretKey, id);
    }
    this.rows.set(id, { ...row, ...patch });
    return true;
  }

  async remove(id: DeviceId): Promise<boolean> {
    this.events.delete(id);
    return this.rows.delete(id);
  }

  async commit(
    id: DeviceId,
    decide: (current: Device) => DeviceMutation | null
  ): Promise<CommitResult | null> {
    const row = this.rows.get(id);
    if (!row) {
      return null;
    }

    const before = { ...row };
    const mutation = decide({ ...row });
    if (!mutation) {
      return { before, after: { ...row }, event: null };
    }

    const { after, event } = applyMutation(before, mutation);
    this.rows.set(id, after);
    if (event) {
      this.log(id).push(event);
    }
    return { before, after: { ...after }, event: event ? { ...event } : null };
  }

  async between(deviceId: DeviceId, from: number, until: number): Promise<HistoryEvent[]> {
    return this.log(deviceId)
      .filter((e) => e.timestamp >= from && e.timestamp <= until)
      .map((e) => ({ ...e }));
  }

  async lastBefore(deviceId: DeviceId, before: number): Promise<HistoryEvent | null> {
    const earlier = this.log(deviceId).filter((e) => e.timestamp < before);
    const last = earlier[earlier.length - 1];
    return last ? { ...last } : null;
  }

  async firstAfter(deviceId: DeviceId, after: number): Promise<HistoryEvent | null> {
    const next = this.log(deviceId).find((e) => e.timestamp > after);
    return next ? { ...next } : null;
  }

  async recent(deviceId: DeviceId, limit: number): Promise<HistoryEvent[]> {
    return this.log(deviceId)
      .slice(-limit)
      .reverse()
      .map((e) => ({ ...e }));
  }

  async all(deviceId: DeviceId): Promise<HistoryEvent[]> {
    return this.log(deviceId).map((e) => ({ ...e }));
  }

  private log(deviceId: DeviceId): HistoryEvent[] {
    let list = this.events.get(deviceId);
    if (!list) {
      list = [];
      if (this.rows.has(deviceId)) {
        this.events.set(deviceId, list);
      }
    }
    return list;
  }

  private sorted(): Device[] {
    return [...this.rows.values()].sort((a, b) => a.id - b.id).map((d) => ({ ...d }));
  }

  private assertKeyFree(secretKey: string, ownId: DeviceId): void {
    for (const row of this.rows.values()) {
      if (row.secretKey === secretKey && row.id !== ownId) {
        throw new DuplicateKeyError();
      }
    }
  }
}
