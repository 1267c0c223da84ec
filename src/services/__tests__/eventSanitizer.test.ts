import { describe, expect, test } from 'vitest';
import { matchPlant, sanitizeEventRow, sanitizeEvents, type SanitizeOptions } from '../eventSanitizer';
import { parseCalendarDate } from '../../utils/dates';
import { PLANT, eventRow } from './_helpers/fixtures';

const options: SanitizeOptions = {
  plantFilter: matchPlant(PLANT),
  durationMismatchToleranceMinutes: 1,
  diagnosticSampleSize: 5
};

describe('sanitizeEventRow', () => {
  test('accepts a valid row and derives its duration', () => {
    const outcome = sanitizeEventRow(eventRow('01.01.2024 10:00', '01.01.2024 10:30', 50, { stated: 30 }), 7, options);

    expect(outcome.status).toBe('accepted');
    if (outcome.status !== 'accepted') return;
    expect(outcome.event.plantId).toBe(PLANT);
    expect(outcome.event.computedDurationMinutes).toBe(30);
    expect(outcome.event.statedDurationMinutes).toBe(30);
    expect(outcome.event.curtailmentLevelPercent).toBe(50);
    expect(outcome.event.durationMismatch).toBe(false);
    expect(outcome.event.sourceIndex).toBe(7);
    expect(Object.isFrozen(outcome.event)).toBe(true);
  });

  test('flags but keeps a row whose stated duration disagrees', () => {
    const outcome = sanitizeEventRow(eventRow('01.01.2024 10:00', '01.01.2024 10:30', '60', { stated: '45' }), 0, options);

    expect(outcome.status).toBe('accepted');
    if (outcome.status !== 'accepted') return;
    expect(outcome.event.durationMismatch).toBe(true);
    expect(outcome.event.computedDurationMinutes).toBe(30);
    expect(outcome.event.statedDurationMinutes).toBe(45);
  });

  test('tolerates rounding in the stated duration', () => {
    const outcome = sanitizeEventRow(eventRow('01.01.2024 10:00:00', '01.01.2024 10:30:40', 50, { stated: 30 }), 0, options);

    expect(outcome.status === 'accepted' && outcome.event.durationMismatch).toBe(false);
  });

  test('treats a missing or non-positive stated duration as absent', () => {
    const outcome = sanitizeEventRow(eventRow('01.01.2024 10:00', '01.01.2024 10:30', 50, { stated: 0 }), 0, options);

    expect(outcome.status === 'accepted' && outcome.event.statedDurationMinutes).toBeNull();
  });

  test.each([
    ['unparsable-start', eventRow('not a date', '01.01.2024 10:30', 50)],
    ['unparsable-end', eventRow('01.01.2024 10:00', '2024-01-01 10:30', 50)],
    ['non-positive-duration', eventRow('01.01.2024 10:00', '01.01.2024 10:00', 50)],
    ['non-positive-duration', eventRow('01.01.2024 10:00', '01.01.2024 09:00', 50)],
    ['level-out-of-range', eventRow('01.01.2024 10:00', '01.01.2024 10:30', 120)]
  ])('rejects %s', (reason, row) => {
    const outcome = sanitizeEventRow(row, 3, options);

    expect(outcome.status).toBe('rejected');
    if (outcome.status !== 'rejected') return;
    expect(outcome.rejection.reason).toBe(reason);
    expect(outcome.rejection.sourceIndex).toBe(3);
  });

  test.each([[0], ['0'], [''], ['n/a'], [-10]])('drops level %j as zero-level', level => {
    const outcome = sanitizeEventRow(eventRow('01.01.2024 10:00', '01.01.2024 10:30', level), 0, options);

    expect(outcome.status).toBe('zero-level');
  });

  test('ignores other plants before looking at the timestamps', () => {
    const outcome = sanitizeEventRow(eventRow('garbage', 'garbage', 50, { plant: 'PLANT-2' }), 0, options);

    expect(outcome.status).toBe('other-plant');
  });

  test('matches plant identifiers after trimming', () => {
    const outcome = sanitizeEventRow(eventRow('01.01.2024 10:00', '01.01.2024 10:30', 50, { plant: ` ${PLANT} ` }), 0, options);

    expect(outcome.status).toBe('accepted');
  });

  test('filters events starting outside the analysis period', () => {
    const withPeriod: SanitizeOptions = {
      ...options,
      period: { start: parseCalendarDate('2024-01-01'), end: parseCalendarDate('2025-01-01') }
    };

    expect(sanitizeEventRow(eventRow('31.12.2023 23:30', '01.01.2024 00:30', 50), 0, withPeriod).status).toBe('out-of-period');
    expect(sanitizeEventRow(eventRow('01.01.2025 00:00', '01.01.2025 00:30', 50), 0, withPeriod).status).toBe('out-of-period');
    expect(sanitizeEventRow(eventRow('01.01.2024 00:00', '01.01.2024 00:30', 50), 0, withPeriod).status).toBe('accepted');
  });
});

describe('sanitizeEvents', () => {
  const rows = [
    eventRow('01.01.2024 10:00', '01.01.2024 10:30', 50, { stated: 45 }),
    eventRow('02.01.2024 08:00', '02.01.2024 09:30', 100, { stated: 90 }),
    eventRow('03.01.2024 08:00', '03.01.2024 09:00', 0),
    eventRow('not a date', '04.01.2024 09:00', 50),
    eventRow('05.01.2024 08:00', '05.01.2024 09:00', 50, { plant: 'PLANT-2' })
  ];

  test('counts every kind of row separately', () => {
    const result = sanitizeEvents(rows, options);

    expect(result.events.map(event => event.sourceIndex)).toEqual([0, 1]);
    expect(result.diagnostics).toEqual({
      totalRows: 5,
      otherPlantRows: 1,
      outOfPeriodRows: 0,
      rejectedRows: {
        'unparsable-start': 1,
        'unparsable-end': 0,
        'non-positive-duration': 0,
        'level-out-of-range': 0
      },
      zeroLevelRows: 1,
      durationMismatches: 1,
      acceptedEvents: 2
    });
  });

  test('samples flagged events and rejected rows', () => {
    const result = sanitizeEvents(rows, options);

    expect(result.flaggedEvents.map(event => event.sourceIndex)).toEqual([0]);
    expect(result.rejectedSample).toEqual([
      { sourceIndex: 3, reason: 'unparsable-start', start: 'not a date', end: '04.01.2024 09:00' }
    ]);
  });

  test('summarizes accepted events', () => {
    expect(sanitizeEvents(rows, options).summary).toEqual({
      totalDurationMinutes: 120,
      maxDurationMinutes: 90,
      minDurationMinutes: 30,
      averageLevelPercent: 75
    });
  });

  test('bounds the diagnostic samples', () => {
    const bad = [eventRow('x', 'y', 50), eventRow('x', 'y', 50), eventRow('x', 'y', 50)];
    const result = sanitizeEvents(bad, { ...options, diagnosticSampleSize: 1 });

    expect(result.rejectedSample).toHaveLength(1);
    expect(result.diagnostics.rejectedRows['unparsable-start']).toBe(3);
    expect(result.summary).toBeNull();
  });
});
