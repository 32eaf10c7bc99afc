import { RowDataPacket } from 'mysql2/promise';
import { execute, query, withTransaction } from '../db/index.js';
import {
  Device,
  DeviceId,
  DeviceSettingsPatch,
  HistoryEvent,
  NewDevice,
  OwnerId,
  PowerState,
  TransitionState,
} from '../types/index.js';
import {
  DeviceExistsError,
  DuplicateKeyError,
  InvalidTransitionError,
  StorageError,
} from '../types/errors.js';
import { applyMutation } from './mutation.js';
import { CommitResult, DeviceMutation, DeviceStore, HistoryLog, MonitorStorage } from './types.js';

interface DeviceRow extends RowDataPacket {
  id: number;
  owner_id: number | null;
  secret_key: string;
  timezone: string;
  paused: number;
  state: PowerState;
  last_seen: number | null;
  last_change: number | null;
  created_at: number;
}

interface HistoryRow extends RowDataPacket {
  device_id: number;
  state: TransitionState;
  timestamp: number;
}

const DEVICE_COLUMNS =
  'id, owner_id, secret_key, timezone, paused, state, last_seen, last_change, created_at';

function toDevice(row: DeviceRow): Device {
  return {
    id: Number(row.id),
    ownerId: row.owner_id === null ? null : Number(row.owner_id),
    secretKey: row.secret_key,
    timezone: row.timezone,
    paused: Boolean(row.paused),
    state: row.state,
    lastSeen: row.last_seen === null ? null : Number(row.last_seen),
    lastChange: row.last_change === null ? null : Number(row.last_change),
    createdAt: Number(row.created_at),
  };
}

function toEvent(row: HistoryRow): HistoryEvent {
  return {
    deviceId: Number(row.device_id),
    state: row.state,
    timestamp: Number(row.timestamp),
  };
}

function isDuplicateEntry(err: unknown): err is { code: string; message: string } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ER_DUP_ENTRY' &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

function isDomainError(err: unknown): boolean {
  return (
    err instanceof DeviceExistsError ||
    err instanceof DuplicateKeyError ||
    err instanceof InvalidTransitionError
  );
}

/**
 * MySQL-backed device table and transition log
 */
export class MySqlStorage implements MonitorStorage, DeviceStore, HistoryLog {
  get devices(): DeviceStore {
    return this;
  }

  get history(): HistoryLog {
    return this;
  }

  findById(id: DeviceId): Promise<Device | null> {
    return this.guard('findById', async () => {
      const rows = await query<DeviceRow[]>(`SELECT ${DEVICE_COLUMNS} FROM devices WHERE id = ?`, [id]);
      return rows.length > 0 ? toDevice(rows[0]) : null;
    });
  }

  findByKey(secretKey: string): Promise<Device | null> {
    return this.guard('findByKey', async () => {
      const rows = await query<DeviceRow[]>(
        `SELECT ${DEVICE_COLUMNS} FROM devices WHERE secret_key = ?`,
        [secretKey]
      );
      return rows.length > 0 ? toDevice(rows[0]) : null;
    });
  }

  findByOwner(ownerId: OwnerId): Promise<Device[]> {
    return this.guard('findByOwner', async () => {
      const rows = await query<DeviceRow[]>(
        `SELECT ${DEVICE_COLUMNS} FROM devices WHERE owner_id = ? ORDER BY id`,
        [ownerId]
      );
      return rows.map(toDevice);
    });
  }

  findAll(): Promise<Device[]> {
    return this.guard('findAll', async () => {
      const rows = await query<DeviceRow[]>(`SELECT ${DEVICE_COLUMNS} FROM devices ORDER BY id`);
      return rows.map(toDevice);
    });
  }

  findExpired(cutoff: number): Promise<Device[]> {
    return this.guard('findExpired', async () => {
      const rows = await query<DeviceRow[]>(
        `SELECT ${DEVICE_COLUMNS} FROM devices
         WHERE state = 'ON' AND paused = 0 AND last_seen IS NOT NULL AND last_seen < ?
         ORDER BY id`,
        [cutoff]
      );
      return rows.map(toDevice);
    });
  }

  insert(device: NewDevice): Promise<Device> {
    return this.guard('insert', async () => {
      try {
        await execute(
          `INSERT INTO devices (id, owner_id, secret_key, timezone, created_at)
           VALUES (?, ?, ?, ?, ?)`,
          [device.id, device.ownerId, device.secretKey, device.timezone, device.createdAt]
        );
      } catch (err) {
        if (isDuplicateEntry(err)) {
          throw err.message.includes('secret_key')
            ? new DuplicateKeyError()
            : new DeviceExistsError(device.id);
        }
        throw err;
      }

      return {
        ...device,
        paused: false,
        state: 'UNKNOWN',
        lastSeen: null,
        lastChange: null,
      };
    });
  }

  updateSettings(id: DeviceId, patch: DeviceSettingsPatch): Promise<boolean> {
    return this.guard('updateSettings', async () => {
      const assignments: string[] = [];
      const params: unknown[] = [];

      if (patch.ownerId !== undefined) {
        assignments.push('owner_id = ?');
        params.push(patch.ownerId);
      }
      if (patch.secretKey !== undefined) {
        assignments.push('secret_key = ?');
        params.push(patch.secretKey);
      }
      if (patch.timezone !== undefined) {
        assignments.push('timezone = ?');
        params.push(patch.timezone);
      }
      if (patch.paused !== undefined) {
        assignments.push('paused = ?');
        params.push(patch.paused ? 1 : 0);
      }

      if (assignments.length === 0) {
        return (await this.findById(id)) !== null;
      }

      try {
        const result = await execute(
          `UPDATE devices SET ${assignments.join(', ')} WHERE id = ?`,
          [...params, id]
        );
        return result.affectedRows > 0;
      } catch (err) {
        if (isDuplicateEntry(err)) {
          throw new DuplicateKeyError();
        }
        throw err;
      }
    });
  }

  remove(id: DeviceId): Promise<boolean> {
    // history rows go with the device through ON DELETE CASCADE
    return this.guard('remove', async () => {
      const result = await execute('DELETE FROM devices WHERE id = ?', [id]);
      return result.affectedRows > 0;
    });
  }

  commit(
    id: DeviceId,
    decide: (current: Device) => DeviceMutation | null
  ): Promise<CommitResult | null> {
    return this.guard('commit', () =>
      withTransaction(async (conn) => {
        const [rows] = await conn.execute<DeviceRow[]>(
          `SELECT ${DEVICE_COLUMNS} FROM devices WHERE id = ? FOR UPDATE`,
          [id]
        );
        if (rows.length === 0) {
          return null;
        }

        const before = toDevice(rows[0]);
        const mutation = decide({ ...before });
        if (!mutation) {
          return { before, after: { ...before }, event: null };
        }

        const { after, event } = applyMutation(before, mutation);
        await conn.execute(
          'UPDATE devices SET state = ?, last_seen = ?, last_change = ? WHERE id = ?',
          [after.state, after.lastSeen, after.lastChange, id]
        );
        if (event) {
          await conn.execute(
            'INSERT INTO history (device_id, state, timestamp) VALUES (?, ?, ?)',
            [event.deviceId, event.state, event.timestamp]
          );
        }
        return { before, after, event };
      })
    );
  }

  between(deviceId: DeviceId, from: number, until: number): Promise<HistoryEvent[]> {
    return this.guard('between', async () => {
      const rows = await query<HistoryRow[]>(
        `SELECT device_id, state, timestamp FROM history
         WHERE device_id = ? AND timestamp >= ? AND timestamp <= ?
         ORDER BY timestamp ASC, id ASC`,
        [deviceId, from, until]
      );
      return rows.map(toEvent);
    });
  }

  lastBefore(deviceId: DeviceId, before: number): Promise<HistoryEvent | null> {
    return this.guard('lastBefore', async () => {
      const rows = await query<HistoryRow[]>(
        `SELECT device_id, state, timestamp FROM history
         WHERE device_id = ? AND timestamp < ?
         ORDER BY timestamp DESC, id DESC
         LIMIT 1`,
        [deviceId, before]
      );
      return rows.length > 0 ? toEvent(rows[0]) : null;
    });
  }

  firstAfter(deviceId: DeviceId, after: number): Promise<HistoryEvent | null> {
    return this.guard('firstAfter', async () => {
      const rows = await query<HistoryRow[]>(
        `SELECT device_id, state, timestamp FROM history
         WHERE device_id = ? AND timestamp > ?
         ORDER BY timestamp ASC, id ASC
         LIMIT 1`,
        [deviceId, after]
      );
      return rows.length > 0 ? toEvent(rows[0]) : null;
    });
  }

  recent(deviceId: DeviceId, limit: number): Promise<HistoryEvent[]> {
    return this.guard('recent', async () => {
      // LIMIT placeholders are rejected by prepared statements on some servers
      const safeLimit = Math.max(1, Math.floor(limit));
      const rows = await query<HistoryRow[]>(
        `SELECT device_id, state, timestamp FROM history
         WHERE device_id = ?
         ORDER BY timestamp DESC, id DESC
         LIMIT ${safeLimit}`,
        [deviceId]
      );
      return rows.map(toEvent);
    });
  }

  all(deviceId: DeviceId): Promise<HistoryEvent[]> {
    return this.guard('all', async () => {
      const rows = await query<HistoryRow[]>(
        `SELECT device_id, state, timestamp FROM history
         WHERE device_id = ?
         ORDER BY timestamp ASC, id ASC`,
        [deviceId]
      );
      return rows.map(toEvent);
    });
  }

  private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (err) {
      if (isDomainError(err)) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new StorageError(`MySQL ${operation} failed: ${message}`, { cause: err });
    }
  }
}
