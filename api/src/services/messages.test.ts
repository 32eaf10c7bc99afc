import { describe, it, expect } from 'vitest';
import {
  formatDailyStats,
  formatDuration,
  formatHistory,
  formatOwnerSummary,
  formatStatus,
  formatTransitionMessage,
} from './messages.js';
import { Device } from '../types/index.js';
import { HOUR, MINUTE } from '../test-helpers.js';

const device: Device = {
  id: 1,
  ownerId: 1,
  secretKey: 'test-secret',
  timezone: 'UTC',
  paused: false,
  state: 'ON',
  lastSeen: null,
  lastChange: null,
  createdAt: 0,
};

describe('formatDuration', () => {
  it.each([
    [45_000, '45с'],
    [5 * MINUTE + 3_000, '5хв 3с'],
    [5 * MINUTE, '5хв'],
    [2 * HOUR + 5 * MINUTE, '2год 5хв'],
    [2 * HOUR, '2год'],
    [-1_000, '0с'],
  ])('formats %d ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('transition messages', () => {
  it('formats a recovery in local time with the day so far', () => {
    const text = formatTransitionMessage({
      deviceId: 1,
      direction: 'recovered',
      at: Date.UTC(2024, 2, 10, 0, 44),
      timezone: 'Europe/Kyiv',
      elapsedSincePriorChangeMs: 7 * HOUR + 19 * MINUTE,
      dailyStats: {
        uptimeMs: 8 * HOUR + 50 * MINUTE,
        downtimeMs: 10 * MINUTE,
        outages: 1,
        windowStart: 0,
        asOf: 0,
      },
    });

    expect(text).toBe(
      "🟢 02:44 Світло з'явилося\n" +
        '🕓 Його не було 7год 19хв\n' +
        '📊 Сьогодні: світло було 8год 50хв, не було 10хв, відключень: 1'
    );
  });

  it('formats a loss without a known duration or stats', () => {
    const text = formatTransitionMessage({
      deviceId: 1,
      direction: 'lost',
      at: Date.UTC(2024, 2, 10, 5, 48),
      timezone: 'UTC',
      elapsedSincePriorChangeMs: null,
      dailyStats: null,
    });

    expect(text).toBe('🔴 05:48 Світло зникло\n🕓 Воно було невідомо');
  });

  it('formats the stats line', () => {
    expect(
      formatDailyStats({ uptimeMs: 0, downtimeMs: 10 * HOUR, outages: 1, windowStart: 0, asOf: 0 })
    ).toBe('📊 Сьогодні: світло було 0с, не було 10год, відключень: 1');
  });
});

describe('formatHistory', () => {
  it('shows how long each earlier state lasted', () => {
    const text = formatHistory(
      [
        { deviceId: 1, state: 'OFF', timestamp: Date.UTC(2024, 2, 10, 9, 30) },
        { deviceId: 1, state: 'ON', timestamp: Date.UTC(2024, 2, 10, 8) },
      ],
      'UTC'
    );

    expect(text).toBe(
      '📜 Історія (останні 2):\n\n' +
        '🔴 10.03 09:30 Світло зникло\n' +
        "🟢 10.03 08:00 Світло з'явилося (тривало 1год 30хв)\n"
    );
  });

  it('reports an empty history', () => {
    expect(formatHistory([], 'UTC')).toBe('📜 Історія порожня');
  });
});

describe('formatStatus', () => {
  it('reports a device that never sent a heartbeat', () => {
    expect(formatStatus({ ...device, state: 'UNKNOWN' }, 0)).toBe(
      '📊 Статус: 🔴 світла немає\n\n⚠️ Ще не було жодного запиту'
    );
  });

  it('reports the last heartbeat, last change and pause', () => {
    const now = Date.UTC(2024, 2, 10, 12);
    const text = formatStatus({ ...device, paused: true, lastSeen: now - 30_000, lastChange: now - 2 * HOUR }, now);

    expect(text).toBe(
      '📊 Статус: 🟢 світло є\n\n' +
        '📶 Останній запит: 30с тому\n' +
        '🔄 Статус змінено: 2год тому\n' +
        '⏸ Моніторинг призупинено'
    );
  });
});

describe('formatOwnerSummary', () => {
  it('reports an owner without devices', () => {
    expect(formatOwnerSummary({ total: 0, online: [], offline: [], noData: [] })).toBe(
      '❌ У вас немає налаштованих каналів'
    );
  });

  it('lists devices by group', () => {
    const text = formatOwnerSummary({
      total: 2,
      online: [{ id: 1, timezone: 'UTC', paused: false, sinceLastSeenMs: MINUTE }],
      offline: [],
      noData: [{ id: 3, timezone: 'UTC', paused: false, sinceLastSeenMs: null }],
    });

    expect(text).toBe(
      '📊 Ваші канали (2 всього)\n\n' +
        '🟢 Онлайн (1):\n  1 (UTC)\n  └ 1хв тому\n\n' +
        '⚠️ Немає даних (1):\n  3 (UTC)\n'
    );
  });
});
