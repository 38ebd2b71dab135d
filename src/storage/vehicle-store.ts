/**
 * Vehicles table. Vehicle data is operational, not personal, and is stored
 * in plaintext so range filters can run in SQL.
 */

import { assignments, guardSql, toFlag, type Db } from './database';
import type { Vehicle } from '~/types';

interface VehicleRecord extends Omit<Vehicle, 'outOfService'> {
  outOfService: number;
}

type VehicleParams = Omit<VehicleRecord, 'id'>;

export type VehicleChangeSet = Partial<Omit<Vehicle, 'id'>>;

/**
 * Plaintext pre-filter applied before term matching
 */
export interface VehicleFilter {
  outOfService?: boolean;
  minSoc?: number;
  maxSoc?: number;
  maxMileage?: number;
}

const SELECT = `
  SELECT id, brand, model, serial_number AS serialNumber, top_speed AS topSpeed,
         battery_capacity AS batteryCapacity, soc, soc_min AS socMin, soc_max AS socMax,
         latitude, longitude, out_of_service AS outOfService, mileage,
         last_maintenance_date AS lastMaintenanceDate, in_service_date AS inServiceDate
  FROM vehicles`;

const COLUMNS: ReadonlyArray<readonly [keyof VehicleChangeSet, string]> = [
  ['brand', 'brand'],
  ['model', 'model'],
  ['serialNumber', 'serial_number'],
  ['topSpeed', 'top_speed'],
  ['batteryCapacity', 'battery_capacity'],
  ['soc', 'soc'],
  ['socMin', 'soc_min'],
  ['socMax', 'soc_max'],
  ['latitude', 'latitude'],
  ['longitude', 'longitude'],
  ['outOfService', 'out_of_service'],
  ['mileage', 'mileage'],
  ['lastMaintenanceDate', 'last_maintenance_date'],
  ['inServiceDate', 'in_service_date']
];

function toVehicle(record: VehicleRecord): Vehicle {
  return { ...record, outOfService: record.outOfService === 1 };
}

function toParams(changes: VehicleChangeSet): Record<string, unknown> {
  const { outOfService, ...rest } = changes;
  return outOfService === undefined ? rest : { ...rest, outOfService: toFlag(outOfService) };
}

export class VehicleStore {
  constructor(private readonly db: Db) {}

  insert(vehicle: Omit<Vehicle, 'id'>): number {
    return guardSql('insert vehicle', () => {
      const params: VehicleParams = { ...vehicle, outOfService: toFlag(vehicle.outOfService) };
      const result = this.db
        .prepare<VehicleParams>(
          `INSERT INTO vehicles (brand, model, serial_number, top_speed, battery_capacity, soc, soc_min, soc_max,
                                 latitude, longitude, out_of_service, mileage, last_maintenance_date, in_service_date)
           VALUES (@brand, @model, @serialNumber, @topSpeed, @batteryCapacity, @soc, @socMin, @socMax,
                   @latitude, @longitude, @outOfService, @mileage, @lastMaintenanceDate, @inServiceDate)`
        )
        .run(params);
      return Number(result.lastInsertRowid);
    });
  }

  findById(id: number): Vehicle | null {
    return guardSql('read vehicle', () => {
      const record = this.db.prepare<[number], VehicleRecord>(`${SELECT} WHERE id = ?`).get(id);
      return record ? toVehicle(record) : null;
    });
  }

  serialTaken(serialNumber: string, excludeId: number = 0): boolean {
    return guardSql('check serial number', () => {
      const row = this.db
        .prepare<[string, number], { id: number }>('SELECT id FROM vehicles WHERE serial_number = ? AND id != ?')
        .get(serialNumber, excludeId);
      return row !== undefined;
    });
  }

  /**
   * All vehicles matching the plaintext filter, by id
   */
  all(filter: VehicleFilter = {}): Vehicle[] {
    const clauses: string[] = [];
    const params: Record<string, number> = {};

    if (filter.outOfService !== undefined) {
      clauses.push('out_of_service = @outOfService');
      params.outOfService = toFlag(filter.outOfService);
    }
    if (filter.minSoc !== undefined) {
      clauses.push('soc >= @minSoc');
      params.minSoc = filter.minSoc;
    }
    if (filter.maxSoc !== undefined) {
      clauses.push('soc <= @maxSoc');
      params.maxSoc = filter.maxSoc;
    }
    if (filter.maxMileage !== undefined) {
      clauses.push('mileage <= @maxMileage');
      params.maxMileage = filter.maxMileage;
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
    return guardSql('list vehicles', () =>
      this.db
        .prepare<Record<string, number>, VehicleRecord>(`${SELECT}${where} ORDER BY id`)
        .all(params)
        .map(toVehicle)
    );
  }

  update(id: number, changes: VehicleChangeSet): boolean {
    const sets = assignments(COLUMNS, changes);
    if (sets.length === 0) {
      return this.findById(id) !== null;
    }

    return guardSql('update vehicle', () => {
      const result = this.db
        .prepare<Record<string, unknown>>(`UPDATE vehicles SET ${sets.join(', ')} WHERE id = @id`)
        .run({ ...toParams(changes), id });
      return result.changes > 0;
    });
  }

  delete(id: number): boolean {
    return guardSql('delete vehicle', () => this.db.prepare<[number]>('DELETE FROM vehicles WHERE id = ?').run(id).changes > 0);
  }
}
