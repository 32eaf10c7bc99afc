/**
 * Error types shared by the monitor services and the HTTP layer
 */

import { DeviceId } from './index.js';

/**
 * Management or query operation on an unknown device
 */
export class DeviceNotFoundError extends Error {
  readonly deviceId: DeviceId;

  constructor(deviceId: DeviceId) {
    super(`Device ${deviceId} not found`);
    this.name = 'DeviceNotFoundError';
    this.deviceId = deviceId;
  }
}

/**
 * Durable store failure. The triggering operation committed nothing.
 */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

/**
 * Notification could not be delivered. Never undoes a committed transition.
 */
export class NotificationDeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationDeliveryError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DeviceExistsError extends Error {
  constructor(deviceId: DeviceId) {
    super(`Device ${deviceId} is already configured`);
    this.name = 'DeviceExistsError';
  }
}

export class DuplicateKeyError extends Error {
  constructor() {
    super('Secret key is already in use');
    this.name = 'DuplicateKeyError';
  }
}

/**
 * Raised by a store when asked to record a transition to the state already held
 */
export class InvalidTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}
