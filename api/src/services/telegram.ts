import { DeviceId, TransitionNotice } from '../types/index.js';
import { NotificationDeliveryError } from '../types/errors.js';
import { formatTransitionMessage } from './messages.js';
import { NotificationDispatcher } from './notifications.js';

const TELEGRAM_API = 'https://api.telegram.org';

/**
 * Posts transition messages to the Telegram channel whose id is the device id
 */
export class TelegramNotifier implements NotificationDispatcher {
  constructor(
    private readonly token: string,
    private readonly fetchFn: typeof fetch = fetch
  ) {}

  async sendMessage(chatId: DeviceId, text: string): Promise<void> {
    const url = `${TELEGRAM_API}/bot${this.token}/sendMessage`;

    let resp: Response;
    try {
      resp = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          disable_web_page_preview: true,
        }),
      });
    } catch (err) {
      throw new NotificationDeliveryError(`Telegram request for chat ${chatId} failed`, { cause: err });
    }

    if (!resp.ok) {
      throw new NotificationDeliveryError(`Telegram rejected message to chat ${chatId}: HTTP ${resp.status}`);
    }
  }

  async notify(notice: TransitionNotice): Promise<void> {
    await this.sendMessage(notice.deviceId, formatTransitionMessage(notice));
  }
}
