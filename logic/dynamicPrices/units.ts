/**
 * Normalize unit strings to their usual spelling ("kWh", "m³").
 * Unknown units are returned as given, empty input gives null.
 */
export function normalizeUnit(raw: unknown): string | null {
  if (typeof raw !== 'string' || raw.trim() === '') {
    return null;
  }
  const unit = raw.trim();
  const folded = unit.replace(/³/g, '3').toLowerCase();
  if (folded === 'kwh') {
    return 'kWh';
  }
  if (folded === 'm3' || folded === 'm^3') {
    return 'm³';
  }
  return unit;
}
