import fs from 'fs';
import { parse } from 'csv-parse/sync';
import logger from '../config/logger';
import { TimetableRow } from '../types/schedule';

type CsvRecord = Record<string, unknown>;

function isRecord(value: unknown): value is CsvRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function column(record: CsvRecord, name: string): string | undefined {
  const value = record[name];
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Maps CSV records with columns route_id, bus_route, bus_type_num, direction, time_slot.
 * Records without a time slot are dropped.
 */
export function toTimetableRows(records: CsvRecord[]): TimetableRow[] {
  const rows: TimetableRow[] = [];

  for (const record of records) {
    const timeSlot = column(record, 'time_slot');
    if (!timeSlot) {
      continue;
    }

    rows.push({
      routeId: column(record, 'route_id'),
      routeName: column(record, 'bus_route'),
      vehicleClass: column(record, 'bus_type_num'),
      direction: column(record, 'direction'),
      timeSlot,
    });
  }

  return rows;
}

export function parseTimetableCsv(content: string): TimetableRow[] {
  const parsed: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (!Array.isArray(parsed)) {
    return [];
  }
  return toTimetableRows(parsed.filter(isRecord));
}

/**
 * Reads the timetable CSV. A missing or unreadable file gives an empty timetable.
 */
export function loadTimetable(filePath: string): TimetableRow[] {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Timetable file not found at ${filePath}; schedule search will be empty`);
    return [];
  }

  try {
    const rows = parseTimetableCsv(fs.readFileSync(filePath, 'utf8'));
    logger.info(`Loaded ${rows.length} timetable rows from ${filePath}`);
    return rows;
  } catch (error) {
    logger.error('Failed to parse timetable CSV:', {
      filePath,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    return [];
  }
}
