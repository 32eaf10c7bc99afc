import { TransitionNotice } from '../types/index.js';
import { NotificationDeliveryError } from '../types/errors.js';

/**
 * Receives every committed transition
 */
export interface NotificationDispatcher {
  notify(notice: TransitionNotice): Promise<void>;
}

/**
 * Fans a notice out to every channel. All channels are attempted; failures
 * are reported together once the rest have settled.
 */
export class CompositeNotifier implements NotificationDispatcher {
  private readonly channels: NotificationDispatcher[];

  constructor(channels: NotificationDispatcher[] = []) {
    this.channels = [...channels];
  }

  add(channel: NotificationDispatcher): void {
    this.channels.push(channel);
  }

  get size(): number {
    return this.channels.length;
  }

  async notify(notice: TransitionNotice): Promise<void> {
    const results = await Promise.allSettled(this.channels.map((channel) => channel.notify(notice)));
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');

    if (failures.length > 0) {
      const reasons = failures.map((f) => (f.reason instanceof Error ? f.reason.message : String(f.reason)));
      throw new NotificationDeliveryError(
        `${failures.length} of ${results.length} channels failed for device ${notice.deviceId}: ${reasons.join('; ')}`,
        { cause: failures[0].reason }
      );
    }
  }
}

/**
 * Hand a notice to the dispatcher without waiting for delivery.
 * Delivery errors are logged here and go no further.
 */
export function publishTransition(notifier: NotificationDispatcher, notice: TransitionNotice): void {
  let delivery: Promise<void>;
  try {
    delivery = notifier.notify(notice);
  } catch (err) {
    console.error(`Error notifying about device ${notice.deviceId}:`, err);
    return;
  }

  delivery.catch((err: unknown) => {
    console.error(`Error notifying about device ${notice.deviceId}:`, err);
  });
}
