const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;

/**
 * Converts "HH:MM" to minutes since midnight.
 * Returns null unless hour is 0-23 and minute is 0-59.
 */
export function timeToMinutes(time: string): number | null {
  const match = CLOCK_PATTERN.exec(time.trim());
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }

  return hours * 60 + minutes;
}

/**
 * Formats minutes since midnight as zero-padded "HH:MM"
 */
export function minutesToTime(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Expands a "HH:MM-HH:MM" window into departures every `intervalMinutes`,
 * start and end inclusive. Malformed windows yield an empty list.
 */
export function expandTimeWindow(window: string, intervalMinutes: number): string[] {
  const match = /^\s*(\d{1,2}:\d{2})\s*-\s*(\d{1,2}:\d{2})\s*$/.exec(window);
  if (!match || intervalMinutes <= 0) {
    return [];
  }

  const start = timeToMinutes(match[1]);
  const end = timeToMinutes(match[2]);
  if (start === null || end === null) {
    return [];
  }

  const times: string[] = [];
  for (let current = start; current <= end; current += intervalMinutes) {
    times.push(minutesToTime(current));
  }
  return times;
}
