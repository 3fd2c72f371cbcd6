import logger from '../config/logger';
import { ScheduleEntry, TimetableRow } from '../types/schedule';
import { expandTimeWindow, timeToMinutes } from '../utils/clock';

export const DEFAULT_DEPARTURE_INTERVAL_MINUTES = 60;
const DEFAULT_VEHICLE_CLASS = 1;
const DEFAULT_CAPACITY = 50;

interface RowGroup {
  routeId: string | null;
  routeName: string;
  vehicleClass: number;
  direction: string | null;
  windows: Set<string>;
}

function parseVehicleClass(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_VEHICLE_CLASS;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? DEFAULT_VEHICLE_CLASS : parsed;
}

/**
 * ScheduleIndex holds the static timetable as discrete departure times per route.
 * Built once at startup and never mutated.
 */
export class ScheduleIndex {
  private readonly entries: ReadonlyArray<ScheduleEntry>;
  private readonly byRoute: ReadonlyMap<string, ScheduleEntry[]>;

  private constructor(entries: ScheduleEntry[]) {
    this.entries = entries;

    const byRoute = new Map<string, ScheduleEntry[]>();
    for (const entry of entries) {
      const list = byRoute.get(entry.routeName) ?? [];
      list.push(entry);
      byRoute.set(entry.routeName, list);
    }
    this.byRoute = byRoute;
  }

  static empty(): ScheduleIndex {
    return new ScheduleIndex([]);
  }

  /**
   * Groups rows by (route id, route name, vehicle class, direction), expands each distinct
   * time window and keeps the groups that produced at least one departure.
   */
  static build(
    rows: TimetableRow[],
    intervalMinutes: number = DEFAULT_DEPARTURE_INTERVAL_MINUTES
  ): ScheduleIndex {
    const groups = new Map<string, RowGroup>();

    for (const row of rows) {
      const routeName = row.routeName ?? row.routeId;
      if (!routeName) {
        continue;
      }

      const vehicleClass = parseVehicleClass(row.vehicleClass);
      const key = JSON.stringify([row.routeId ?? null, routeName, vehicleClass, row.direction ?? null]);

      let group = groups.get(key);
      if (!group) {
        group = {
          routeId: row.routeId ?? null,
          routeName,
          vehicleClass,
          direction: row.direction ?? null,
          windows: new Set<string>(),
        };
        groups.set(key, group);
      }
      group.windows.add(row.timeSlot.trim());
    }

    const entries: ScheduleEntry[] = [];
    for (const group of groups.values()) {
      const times = new Set<string>();
      for (const window of group.windows) {
        const expanded = expandTimeWindow(window, intervalMinutes);
        if (expanded.length === 0) {
          logger.debug(`Skipping malformed time window "${window}" for route ${group.routeName}`);
        }
        expanded.forEach((time) => times.add(time));
      }

      if (times.size === 0) {
        continue;
      }

      entries.push({
        id: `BUS-${entries.length + 1}`,
        routeId: group.routeId,
        routeName: group.routeName,
        vehicleClass: group.vehicleClass,
        direction: group.direction,
        capacity: DEFAULT_CAPACITY,
        departureTimes: [...times].sort((a, b) => (timeToMinutes(a) ?? 0) - (timeToMinutes(b) ?? 0)),
      });
    }

    logger.info(`Schedule index built: ${entries.length} entries from ${rows.length} rows`);
    return new ScheduleIndex(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  routeNames(): string[] {
    return [...this.byRoute.keys()].sort();
  }

  entriesForRoute(routeName: string): ScheduleEntry[] {
    return [...(this.byRoute.get(routeName) ?? [])];
  }

  /**
   * Entries of the route that depart exactly at `time` (HH:MM)
   */
  matching(routeName: string, time: string): ScheduleEntry[] {
    return this.entriesForRoute(routeName).filter((entry) => entry.departureTimes.includes(time));
  }

  hasDeparture(routeName: string, time: string): boolean {
    return this.matching(routeName, time).length > 0;
  }
}
