export interface MonitorConfig {
  port: number;
  apiKey: string | null;
  gracePeriodMs: number;
  scanIntervalMs: number;
  defaultTimezone: string;
  telegramBotToken: string | null;
}

export const DEFAULT_TIMEZONE = 'Europe/Kiev';

export function getMonitorConfig(): MonitorConfig {
  const graceMinutes = parseFloat(process.env.GRACE_PERIOD_MINUTES || '5');
  const scanSeconds = parseFloat(process.env.SCAN_INTERVAL_SECONDS || '30');

  return {
    port: parseInt(process.env.PORT || '8080', 10),
    apiKey: process.env.API_KEY || null,
    gracePeriodMs: (graceMinutes > 0 ? graceMinutes : 5) * 60 * 1000,
    scanIntervalMs: (scanSeconds > 0 ? scanSeconds : 30) * 1000,
    defaultTimezone: process.env.DEFAULT_TIMEZONE || DEFAULT_TIMEZONE,
    telegramBotToken: process.env.TELEGRAM_BOT_TOKEN || null,
  };
}
