import { DailyStats, Device, HistoryEvent, OwnerDeviceStatus, OwnerSummary, TransitionNotice } from '../types/index.js';
import { formatLocalDateTime, formatLocalTime } from '../utils/time.js';

/**
 * 45с, 5хв 3с, 2год 5хв
 */
export function formatDuration(ms: number): string {
  const seconds = Math.max(0, ms) / 1000;

  if (seconds < 60) {
    return `${Math.floor(seconds)}с`;
  }
  if (seconds < 3600) {
    const mins = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return secs > 0 ? `${mins}хв ${secs}с` : `${mins}хв`;
  }

  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  return mins > 0 ? `${hours}год ${mins}хв` : `${hours}год`;
}

function formatElapsed(ms: number | null): string {
  return ms === null ? 'невідомо' : formatDuration(ms);
}

/**
 * 📊 Сьогодні: світло було 8год 50хв, не було 10хв, відключень: 1
 */
export function formatDailyStats(stats: DailyStats): string {
  return (
    `📊 Сьогодні: світло було ${formatDuration(stats.uptimeMs)}, ` +
    `не було ${formatDuration(stats.downtimeMs)}, відключень: ${stats.outages}`
  );
}

/**
 * 🟢 02:44 Світло з'явилося
 * 🕓 Його не було 7год 19хв
 */
export function formatRecoveredMessage(notice: TransitionNotice): string {
  const lines = [
    `🟢 ${formatLocalTime(notice.at, notice.timezone)} Світло з'явилося`,
    `🕓 Його не було ${formatElapsed(notice.elapsedSincePriorChangeMs)}`,
  ];
  if (notice.dailyStats) {
    lines.push(formatDailyStats(notice.dailyStats));
  }
  return lines.join('\n');
}

/**
 * 🔴 05:48 Світло зникло
 * 🕓 Воно було 3год 4хв
 */
export function formatLostMessage(notice: TransitionNotice): string {
  const lines = [
    `🔴 ${formatLocalTime(notice.at, notice.timezone)} Світло зникло`,
    `🕓 Воно було ${formatElapsed(notice.elapsedSincePriorChangeMs)}`,
  ];
  if (notice.dailyStats) {
    lines.push(formatDailyStats(notice.dailyStats));
  }
  return lines.join('\n');
}

export function formatTransitionMessage(notice: TransitionNotice): string {
  return notice.direction === 'recovered' ? formatRecoveredMessage(notice) : formatLostMessage(notice);
}

/**
 * Transition list, newest first, each entry with how long it lasted
 */
export function formatHistory(events: HistoryEvent[], timezone: string): string {
  if (events.length === 0) {
    return '📜 Історія порожня';
  }

  let msg = `📜 Історія (останні ${events.length}):\n\n`;
  let newer: number | null = null;

  for (const event of events) {
    const emoji = event.state === 'ON' ? '🟢' : '🔴';
    const text = event.state === 'ON' ? "з'явилося" : 'зникло';
    const lasted = newer === null ? '' : ` (тривало ${formatDuration(newer - event.timestamp)})`;

    msg += `${emoji} ${formatLocalDateTime(event.timestamp, timezone)} Світло ${text}${lasted}\n`;
    newer = event.timestamp;
  }

  return msg;
}

export function formatStatus(device: Device, now: number): string {
  if (device.lastSeen === null) {
    return '📊 Статус: 🔴 світла немає\n\n⚠️ Ще не було жодного запиту';
  }

  const on = device.state === 'ON';
  let msg = `📊 Статус: ${on ? '🟢 світло є' : '🔴 світла немає'}\n\n`;
  msg += `📶 Останній запит: ${formatDuration(now - device.lastSeen)} тому\n`;

  if (device.lastChange !== null) {
    msg += `🔄 Статус змінено: ${formatDuration(now - device.lastChange)} тому`;
  }
  if (device.paused) {
    msg += '\n⏸ Моніторинг призупинено';
  }

  return msg;
}

function formatOwnerEntries(entries: OwnerDeviceStatus[]): string {
  return entries
    .map((entry) => {
      const ago = entry.sinceLastSeenMs === null ? '' : `\n  └ ${formatDuration(entry.sinceLastSeenMs)} тому`;
      return `  ${entry.id} (${entry.timezone})${ago}\n`;
    })
    .join('');
}

export function formatOwnerSummary(summary: OwnerSummary): string {
  if (summary.total === 0) {
    return '❌ У вас немає налаштованих каналів';
  }

  let msg = `📊 Ваші канали (${summary.total} всього)\n\n`;

  if (summary.online.length > 0) {
    msg += `🟢 Онлайн (${summary.online.length}):\n${formatOwnerEntries(summary.online)}\n`;
  }
  if (summary.offline.length > 0) {
    msg += `🔴 Офлайн (${summary.offline.length}):\n${formatOwnerEntries(summary.offline)}\n`;
  }
  if (summary.noData.length > 0) {
    msg += `⚠️ Немає даних (${summary.noData.length}):\n${formatOwnerEntries(summary.noData)}`;
  }

  return msg;
}
