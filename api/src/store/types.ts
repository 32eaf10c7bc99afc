import {
  Device,
  DeviceId,
  DeviceSettingsPatch,
  HistoryEvent,
  NewDevice,
  OwnerId,
  TransitionState,
} from '../types/index.js';

/**
 * Liveness write decided against the locked, freshly read device row
 */
export interface DeviceMutation {
  lastSeen?: number;
  transition?: { state: TransitionState; at: number };
}

export interface CommitResult {
  before: Device;
  after: Device;
  event: HistoryEvent | null;
}

/**
 * Device records. `commit` is the only path that writes state,
 * last_seen and last_change, and it appends the matching history
 * event in the same transaction.
 */
export interface DeviceStore {
  findById(id: DeviceId): Promise<Device | null>;
  findByKey(secretKey: string): Promise<Device | null>;
  findByOwner(ownerId: OwnerId): Promise<Device[]>;
  findAll(): Promise<Device[]>;
  /** ON, not paused, last seen strictly before `cutoff` */
  findExpired(cutoff: number): Promise<Device[]>;
  insert(device: NewDevice): Promise<Device>;
  updateSettings(id: DeviceId, patch: DeviceSettingsPatch): Promise<boolean>;
  /** Deletes the device together with its history */
  remove(id: DeviceId): Promise<boolean>;
  commit(id: DeviceId, decide: (current: Device) => DeviceMutation | null): Promise<CommitResult | null>;
}

/**
 * Append-only transition log (appends happen through DeviceStore.commit)
 */
export interface HistoryLog {
  /** Events with from <= timestamp <= until, oldest first */
  between(deviceId: DeviceId, from: number, until: number): Promise<HistoryEvent[]>;
  lastBefore(deviceId: DeviceId, before: number): Promise<HistoryEvent | null>;
  /** Earliest event with timestamp > after */
  firstAfter(deviceId: DeviceId, after: number): Promise<HistoryEvent | null>;
  /** Newest first */
  recent(deviceId: DeviceId, limit: number): Promise<HistoryEvent[]>;
  /** Oldest first */
  all(deviceId: DeviceId): Promise<HistoryEvent[]>;
}

export interface MonitorStorage {
  devices: DeviceStore;
  history: HistoryLog;
}
