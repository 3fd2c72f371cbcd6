/**
 * One row of the imported timetable. Columns other than the time slot are optional.
 */
export interface TimetableRow {
  routeId?: string;
  routeName?: string;
  vehicleClass?: string;
  direction?: string;
  timeSlot: string;
}

/**
 * Departure times of one (route, vehicle class, direction) group
 */
export interface ScheduleEntry {
  id: string;
  routeId: string | null;
  routeName: string;
  vehicleClass: number;
  direction: string | null;
  capacity: number;
  departureTimes: string[];
}
