import { Device, HistoryEvent } from '../types/index.js';
import { InvalidTransitionError } from '../types/errors.js';
import { DeviceMutation } from './types.js';

/**
 * Compute the row and log entry a mutation produces.
 * Shared by the store implementations so both enforce the same rules.
 */
export function applyMutation(
  current: Device,
  mutation: DeviceMutation
): { after: Device; event: HistoryEvent | null } {
  const after: Device = { ...current };
  let event: HistoryEvent | null = null;

  if (mutation.lastSeen !== undefined) {
    after.lastSeen = mutation.lastSeen;
  }

  if (mutation.transition) {
    const { state, at } = mutation.transition;

    if (state === current.state) {
      throw new InvalidTransitionError(`Device ${current.id} is already ${state}`);
    }
    if (current.lastChange !== null && at <= current.lastChange) {
      throw new InvalidTransitionError(
        `Transition for device ${current.id} at ${at} is not after last change ${current.lastChange}`
      );
    }

    after.state = state;
    after.lastChange = at;
    event = { deviceId: current.id, state, timestamp: at };
  }

  return { after, event };
}
