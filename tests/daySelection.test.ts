import { selectDays } from '../logic/dynamicPrices/daySelection';

const days = [
  { date: '2025-03-29', electricity: { tariffs: [] } },
  { date: '2025-03-30', electricity: { tariffs: [] } },
  { date: '2025-03-31', electricity: { tariffs: [] } },
];

describe('selectDays', () => {
  test('picks the day matching the Amsterdam date and the next one', () => {
    const { today, tomorrow } = selectDays(days, Date.UTC(2025, 2, 30, 10, 0, 0));
    expect(today?.date).toBe('2025-03-30');
    expect(tomorrow?.date).toBe('2025-03-31');
  });

  test('uses the Amsterdam date late in the UTC evening', () => {
    const { today } = selectDays(days, Date.UTC(2025, 2, 29, 23, 30, 0));
    expect(today?.date).toBe('2025-03-30');
  });

  test('has no tomorrow on the last published day', () => {
    const { today, tomorrow } = selectDays(days, Date.UTC(2025, 2, 31, 10, 0, 0));
    expect(today?.date).toBe('2025-03-31');
    expect(tomorrow).toBeNull();
  });

  test('falls back to the first day when nothing matches', () => {
    const { today, tomorrow } = selectDays(days, Date.UTC(2025, 5, 1, 10, 0, 0));
    expect(today?.date).toBe('2025-03-29');
    expect(tomorrow?.date).toBe('2025-03-30');
  });

  test('ignores entries that are not objects', () => {
    const { today, tomorrow } = selectDays([null, 'x', days[1]], Date.UTC(2025, 2, 30, 10, 0, 0));
    expect(today?.date).toBe('2025-03-30');
    expect(tomorrow).toBeNull();
  });

  test('returns nothing for an empty list', () => {
    expect(selectDays([])).toEqual({ today: null, tomorrow: null });
  });
});
