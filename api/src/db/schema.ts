import { getPool } from './index.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS devices (
  id BIGINT PRIMARY KEY,
  owner_id BIGINT NULL,
  secret_key VARCHAR(128) NOT NULL,
  timezone VARCHAR(64) NOT NULL DEFAULT 'Europe/Kiev',
  paused TINYINT(1) NOT NULL DEFAULT 0,
  state ENUM('UNKNOWN', 'ON', 'OFF') NOT NULL DEFAULT 'UNKNOWN',
  last_seen BIGINT NULL,
  last_change BIGINT NULL,
  created_at BIGINT NOT NULL,
  UNIQUE KEY uq_devices_secret_key (secret_key),
  KEY idx_devices_owner (owner_id),
  KEY idx_devices_scan (state, paused, last_seen)
);

CREATE TABLE IF NOT EXISTS history (
  id BIGINT AUTO_INCREMENT PRIMARY KEY,
  device_id BIGINT NOT NULL,
  state ENUM('ON', 'OFF') NOT NULL,
  timestamp BIGINT NOT NULL,
  KEY idx_history_device_time (device_id, timestamp),
  CONSTRAINT fk_history_device FOREIGN KEY (device_id) REFERENCES devices(id) ON DELETE CASCADE
);
`;

let migrated = false;

/**
 * Create tables on first use. Statements are idempotent.
 */
export async function ensureSchema(): Promise<void> {
  if (migrated) return;

  const statements = SCHEMA
    .split(';')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  for (const sql of statements) {
    await getPool().query(sql);
  }

  migrated = true;
}
