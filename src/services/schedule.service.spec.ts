import { ScheduleIndex } from './schedule.service';

describe('ScheduleIndex', () => {
  const index = ScheduleIndex.build([
    { routeId: 'R1', routeName: 'Kandy-Colombo', vehicleClass: '1', direction: 'outbound', timeSlot: '06:00-08:00' },
    { routeId: 'R1', routeName: 'Kandy-Colombo', vehicleClass: '1', direction: 'outbound', timeSlot: '06:00-08:00' },
    { routeId: 'R1', routeName: 'Kandy-Colombo', vehicleClass: '1', direction: 'outbound', timeSlot: '05:00-05:00' },
    { routeId: 'R1', routeName: 'Kandy-Colombo', vehicleClass: '2', timeSlot: '07:00-07:00' },
    { routeId: 'R2', timeSlot: '10:00-11:00' },
    { routeName: 'Broken', timeSlot: 'not-a-window' },
  ]);

  it('groups rows by route, vehicle class and direction and drops empty groups', () => {
    expect(index.size).toBe(3);
    expect(index.routeNames()).toEqual(['Kandy-Colombo', 'R2']);
  });

  it('merges duplicate windows into one sorted departure list', () => {
    const [first] = index.entriesForRoute('Kandy-Colombo');
    expect(first).toEqual({
      id: 'BUS-1',
      routeId: 'R1',
      routeName: 'Kandy-Colombo',
      vehicleClass: 1,
      direction: 'outbound',
      capacity: 50,
      departureTimes: ['05:00', '06:00', '07:00', '08:00'],
    });
  });

  it('falls back to the route id when the route name is missing', () => {
    expect(index.entriesForRoute('R2')[0].departureTimes).toEqual(['10:00', '11:00']);
    expect(index.entriesForRoute('R2')[0].vehicleClass).toBe(1);
  });

  it('matches only exact departure times inside a window', () => {
    expect(index.matching('Kandy-Colombo', '07:00').map((entry) => entry.id)).toEqual(['BUS-1', 'BUS-2']);
    expect(index.hasDeparture('Kandy-Colombo', '09:00')).toBe(false);
    expect(index.hasDeparture('Kandy-Colombo', '07:30')).toBe(false);
  });

  it('is case-sensitive on route names', () => {
    expect(index.matching('kandy-colombo', '07:00')).toEqual([]);
  });

  it('respects a custom departure interval', () => {
    const halfHourly = ScheduleIndex.build([{ routeName: 'A-B', timeSlot: '06:00-07:00' }], 30);
    expect(halfHourly.entriesForRoute('A-B')[0].departureTimes).toEqual(['06:00', '06:30', '07:00']);
  });

  it('empty() has no routes', () => {
    expect(ScheduleIndex.empty().routeNames()).toEqual([]);
    expect(ScheduleIndex.empty().matching('A-B', '06:00')).toEqual([]);
  });
});
