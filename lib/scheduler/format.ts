/**
 * Display helpers for clock times, hours and progress.
 */

/**
 * Minutes from midnight to "HH:MM". 1440 renders as "24:00".
 */
export function formatClock(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(mins).padStart(2, '0')}`;
}

/**
 * Hours without trailing zeros: 3 -> "3h", 2.5 -> "2.5h", 1/3 -> "0.33h".
 */
export function formatHours(hours: number): string {
  return `${Number(hours.toFixed(2))}h`;
}

/**
 * Progress as "completed/total" with one decimal each, e.g. "3.0/6.0".
 */
export function formatProgress(hoursCompleted: number, totalHours: number): string {
  return `${hoursCompleted.toFixed(1)}/${totalHours.toFixed(1)}`;
}

/**
 * Round an hour amount to six decimals so repeated session additions
 * (0.1 + 0.2 ...) compare cleanly against the task total.
 */
export function roundHours(hours: number): number {
  return Math.round(hours * 1e6) / 1e6;
}

export function hoursToMinutes(hours: number): number {
  return Math.round(hours * 60);
}

export function minutesToHours(minutes: number): number {
  return roundHours(minutes / 60);
}
