import type { RawPriceDay } from './types';
import { isRecord, PRICE_TIME_ZONE } from './tariffParser';
import { getDateKeyInTimeZone } from '../utils/dateUtils';

export interface SelectedDays {
  today: RawPriceDay | null;
  tomorrow: RawPriceDay | null;
}

/**
 * Find the entries for today and tomorrow in the API's day list.
 * - Today is the Europe/Amsterdam calendar date of `now`
 * - If no day matches, the first day is treated as today
 * - Tomorrow is the day following today in the list, when published
 * @param days - `prices` list from the API payload
 * @param now - Current timestamp in milliseconds (defaults to Date.now())
 */
export function selectDays(days: ReadonlyArray<unknown>, now: number = Date.now()): SelectedDays {
  const priceDays: Array<RawPriceDay> = days.filter(isRecord);
  if (priceDays.length === 0) {
    return { today: null, tomorrow: null };
  }

  const todayKey = getDateKeyInTimeZone(PRICE_TIME_ZONE, now);
  const todayIndex = Math.max(0, priceDays.findIndex((day) => day.date === todayKey));

  return {
    today: priceDays[todayIndex],
    tomorrow: todayIndex + 1 < priceDays.length ? priceDays[todayIndex + 1] : null,
  };
}
