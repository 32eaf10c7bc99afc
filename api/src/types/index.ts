// Device identity (external numeric channel id)
export type DeviceId = number;

// Owner reference (external numeric user id)
export type OwnerId = number;

// Power states
export type PowerState = 'UNKNOWN' | 'ON' | 'OFF';

// States that can be recorded in the transition log
export type TransitionState = Exclude<PowerState, 'UNKNOWN'>;

// Monitored device record. All timestamps are epoch milliseconds.
export interface Device {
  id: DeviceId;
  ownerId: OwnerId | null;
  secretKey: string;
  timezone: string;
  paused: boolean;
  state: PowerState;
  lastSeen: number | null;
  lastChange: number | null;
  createdAt: number;
}

export interface NewDevice {
  id: DeviceId;
  ownerId: OwnerId | null;
  secretKey: string;
  timezone: string;
  createdAt: number;
}

// Settings that management operations may change
export type DeviceSettingsPatch = Partial<Pick<Device, 'ownerId' | 'secretKey' | 'timezone' | 'paused'>>;

// Transition log entry
export interface HistoryEvent {
  deviceId: DeviceId;
  state: TransitionState;
  timestamp: number;
}

// Uptime/downtime accumulated over [windowStart, asOf)
export interface DailyStats {
  uptimeMs: number;
  downtimeMs: number;
  outages: number;
  windowStart: number;
  asOf: number;
}

export interface CurrentState {
  state: PowerState;
  lastSeen: number | null;
  lastChange: number | null;
}

export type TransitionDirection = 'recovered' | 'lost';

// Emitted to the notification dispatcher after every committed transition
export interface TransitionNotice {
  deviceId: DeviceId;
  direction: TransitionDirection;
  at: number;
  timezone: string;
  elapsedSincePriorChangeMs: number | null;
  dailyStats: DailyStats | null;
}

// Heartbeat outcomes
export type HeartbeatResult =
  | { status: 'accepted'; deviceId: DeviceId; transitioned: boolean }
  | { status: 'rejected'; reason: 'invalid_key' };

// Open period appended to an export
export interface OpenPeriod {
  state: PowerState;
  since: number;
  until: number;
  durationMs: number;
}

export interface HistoryExport {
  deviceId: DeviceId;
  events: HistoryEvent[];
  current: OpenPeriod | null;
}

export interface OwnerDeviceStatus {
  id: DeviceId;
  timezone: string;
  paused: boolean;
  sinceLastSeenMs: number | null;
}

export interface OwnerSummary {
  total: number;
  online: OwnerDeviceStatus[];
  offline: OwnerDeviceStatus[];
  noData: OwnerDeviceStatus[];
}

// WebSocket messages
export interface DeviceStateMessage {
  type: 'device_state';
  device_id: DeviceId;
  state: PowerState;
  last_seen: number | null;
  last_change: number | null;
  paused: boolean;
}

export interface PowerTransitionMessage {
  type: 'power_transition';
  device_id: DeviceId;
  direction: TransitionDirection;
  at: number;
  elapsed_ms: number | null;
  daily_stats: DailyStats | null;
}

export type FeedMessage = DeviceStateMessage | PowerTransitionMessage;

// API responses
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
