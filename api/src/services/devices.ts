import { randomBytes } from 'crypto';
import { Device, DeviceId, DeviceSettingsPatch, OwnerId } from '../types/index.js';
import { DeviceNotFoundError, ValidationError } from '../types/errors.js';
import { isValidTimeZone } from '../utils/time.js';
import { MonitorContext } from './context.js';

/**
 * Device provisioning and settings. Callers are expected to have checked
 * that the requester owns the device.
 */

const NEW_KEY_BYTES = 16;
const ROTATED_KEY_BYTES = 32;
const MAX_KEY_LENGTH = 128;

/**
 * URL-safe random secret
 */
export function generateSecretKey(bytes: number = NEW_KEY_BYTES): string {
  return randomBytes(bytes).toString('base64url');
}

function assertValidKey(secretKey: string): void {
  if (secretKey.length === 0 || secretKey.length > MAX_KEY_LENGTH) {
    throw new ValidationError(`Secret key must be 1 to ${MAX_KEY_LENGTH} characters`);
  }
  if (/\s/.test(secretKey)) {
    throw new ValidationError('Secret key must not contain whitespace');
  }
}

export async function getDeviceOrThrow(ctx: MonitorContext, deviceId: DeviceId): Promise<Device> {
  const device = await ctx.storage.devices.findById(deviceId);
  if (!device) {
    throw new DeviceNotFoundError(deviceId);
  }
  return device;
}

async function updateOrThrow(
  ctx: MonitorContext,
  deviceId: DeviceId,
  patch: DeviceSettingsPatch
): Promise<void> {
  const updated = await ctx.locks.run(deviceId, () => ctx.storage.devices.updateSettings(deviceId, patch));
  if (!updated) {
    throw new DeviceNotFoundError(deviceId);
  }
}

/**
 * Register a device for an owner. A supplied key imports an existing
 * heartbeat setup; otherwise a fresh key is issued.
 */
export async function createDevice(
  ctx: MonitorContext,
  params: { id: DeviceId; ownerId: OwnerId; secretKey?: string },
  now: number = Date.now()
): Promise<{ deviceId: DeviceId; secretKey: string }> {
  const secretKey = params.secretKey ?? generateSecretKey();
  assertValidKey(secretKey);

  const device = await ctx.storage.devices.insert({
    id: params.id,
    ownerId: params.ownerId,
    secretKey,
    timezone: ctx.defaultTimezone,
    createdAt: now,
  });

  console.log(`Device ${device.id} created for owner ${params.ownerId}`);
  return { deviceId: device.id, secretKey: device.secretKey };
}

export async function getKey(ctx: MonitorContext, deviceId: DeviceId): Promise<string> {
  const device = await getDeviceOrThrow(ctx, deviceId);
  return device.secretKey;
}

/**
 * Issue a new random key; the old one stops working immediately
 */
export async function rotateKey(ctx: MonitorContext, deviceId: DeviceId): Promise<string> {
  const secretKey = generateSecretKey(ROTATED_KEY_BYTES);
  await updateOrThrow(ctx, deviceId, { secretKey });
  return secretKey;
}

/**
 * Replace the key with one chosen by the owner
 */
export async function replaceKey(ctx: MonitorContext, deviceId: DeviceId, secretKey: string): Promise<void> {
  assertValidKey(secretKey);
  await updateOrThrow(ctx, deviceId, { secretKey });
}

export async function setTimezone(ctx: MonitorContext, deviceId: DeviceId, timezone: string): Promise<void> {
  if (!isValidTimeZone(timezone)) {
    throw new ValidationError(`Unknown timezone: ${timezone}`);
  }
  await updateOrThrow(ctx, deviceId, { timezone });
}

/**
 * While paused the scanner leaves the device alone; heartbeats still count
 */
export async function setPaused(ctx: MonitorContext, deviceId: DeviceId, paused: boolean): Promise<void> {
  await updateOrThrow(ctx, deviceId, { paused });
}

export async function transferOwner(ctx: MonitorContext, deviceId: DeviceId, newOwnerId: OwnerId): Promise<void> {
  await updateOrThrow(ctx, deviceId, { ownerId: newOwnerId });
}

/**
 * Remove the device and its whole history
 */
export async function deleteDevice(ctx: MonitorContext, deviceId: DeviceId): Promise<void> {
  const removed = await ctx.locks.run(deviceId, () => ctx.storage.devices.remove(deviceId));
  if (!removed) {
    throw new DeviceNotFoundError(deviceId);
  }
  console.log(`Device ${deviceId} deleted`);
}
