/**
 * Vehicle Repository
 *
 * Vehicles hold no PII and are stored in plaintext. Operators may update
 * only the operational subset of fields; the engine decides that from the
 * field names in the request.
 */

import { inTransaction, localDate } from '~/storage/database';
import { VehicleStore, type VehicleFilter } from '~/storage/vehicle-store';
import {
  assertSocBounds,
  parseFields,
  parseSearchTerm,
  vehicleChangesSchema,
  vehicleSchema,
  type VehicleChanges,
  type VehicleInput
} from '~/validation/fields';
import { ConflictError, NotFoundError, succeed } from '~/types';
import type { Outcome, Session, Vehicle } from '~/types';
import { authorize, matchesTerm, reject, type RepositoryContext } from './context';

export type { VehicleFilter } from '~/storage/vehicle-store';

export class VehicleRepository {
  private readonly store: VehicleStore;

  constructor(private readonly ctx: RepositoryContext) {
    this.store = new VehicleStore(ctx.db);
  }

  private requireVehicle(id: number): Vehicle {
    const vehicle = this.store.findById(id);
    if (!vehicle) {
      throw new NotFoundError('Vehicle', id);
    }
    return vehicle;
  }

  async create(session: Session, input: VehicleInput): Promise<Outcome<Vehicle>> {
    const denied = await authorize(this.ctx, session, { action: 'create-vehicle' }, 'vehicle creation');
    if (denied) return { ok: false, failure: denied };

    try {
      const parsed = parseFields(vehicleSchema, input);
      const values = { ...parsed, inServiceDate: parsed.inServiceDate ?? localDate(this.ctx.clock()) };
      assertSocBounds(values);

      const id = inTransaction(this.ctx.db, 'create vehicle', () => {
        if (this.store.serialTaken(values.serialNumber)) {
          throw new ConflictError(`Serial number ${values.serialNumber} already exists`, 'serialNumber');
        }
        return this.store.insert(values);
      });

      await this.ctx.audit.record(session.identity, 'New vehicle added', `Serial: ${values.serialNumber}`, {
        eventType: 'data-create'
      });
      return succeed({ id, ...values });
    } catch (error) {
      return await reject(this.ctx, session, 'Failed to add vehicle', error);
    }
  }

  async getById(session: Session, id: number): Promise<Outcome<Vehicle>> {
    const denied = await authorize(this.ctx, session, { action: 'view-vehicles' }, 'vehicle lookup');
    if (denied) return { ok: false, failure: denied };

    try {
      const vehicle = this.requireVehicle(id);
      await this.ctx.audit.record(session.identity, 'Viewed vehicle', `Vehicle ID: ${id}`);
      return succeed(vehicle);
    } catch (error) {
      return await reject(this.ctx, session, 'Vehicle lookup failed', error);
    }
  }

  async getAll(session: Session, filter: VehicleFilter = {}): Promise<Outcome<Vehicle[]>> {
    const denied = await authorize(this.ctx, session, { action: 'view-vehicles' }, 'vehicle list access');
    if (denied) return { ok: false, failure: denied };

    const vehicles = this.store.all(filter);
    await this.ctx.audit.record(session.identity, 'Viewed vehicle list', `Vehicles: ${vehicles.length}`);
    return succeed(vehicles);
  }

  /**
   * Plaintext range filter in SQL first, then a substring match over
   * brand, model, serial number and id
   */
  async search(session: Session, term: string, filter: VehicleFilter = {}): Promise<Outcome<Vehicle[]>> {
    const denied = await authorize(this.ctx, session, { action: 'view-vehicles' }, 'vehicle search');
    if (denied) return { ok: false, failure: denied };

    try {
      const needle = parseSearchTerm(term);
      const matches = this.store
        .all(filter)
        .filter((vehicle) => matchesTerm(needle, [vehicle.id, vehicle.brand, vehicle.model, vehicle.serialNumber]));

      await this.ctx.audit.record(session.identity, 'Searched vehicles', `Matches: ${matches.length}`);
      return succeed(matches);
    } catch (error) {
      return await reject(this.ctx, session, 'Vehicle search failed', error);
    }
  }

  /**
   * Sparse update. SoC bounds are checked against the merged record.
   */
  async update(session: Session, id: number, changes: VehicleChanges): Promise<Outcome<Vehicle>> {
    const fields = Object.keys(changes);
    const denied = await authorize(this.ctx, session, { action: 'update-vehicle', fields }, 'vehicle update');
    if (denied) return { ok: false, failure: denied };

    try {
      const values = parseFields(vehicleChangesSchema, changes);
      const merged = inTransaction(this.ctx.db, 'update vehicle', () => {
        const current = this.requireVehicle(id);
        const next: Vehicle = { ...current, ...values };
        assertSocBounds(next);

        if (values.serialNumber !== undefined && this.store.serialTaken(values.serialNumber, id)) {
          throw new ConflictError(`Serial number ${values.serialNumber} already exists`, 'serialNumber');
        }
        this.store.update(id, values);
        return next;
      });

      await this.ctx.audit.record(session.identity, 'Vehicle updated', `Vehicle ID: ${id}, Fields: ${fields.join(', ')}`, {
        eventType: 'data-update'
      });
      return succeed(merged);
    } catch (error) {
      return await reject(this.ctx, session, 'Vehicle update failed', error);
    }
  }

  /**
   * Hard delete. Resolves to false when there was nothing to delete.
   */
  async delete(session: Session, id: number): Promise<Outcome<boolean>> {
    const denied = await authorize(this.ctx, session, { action: 'delete-vehicle' }, 'vehicle deletion');
    if (denied) return { ok: false, failure: denied };

    const removed = this.store.delete(id);
    await this.ctx.audit.record(
      session.identity,
      removed ? 'Vehicle deleted' : 'Vehicle deletion skipped',
      removed ? `Vehicle ID: ${id}` : `Vehicle ID: ${id} not found`,
      removed ? { eventType: 'data-delete' } : {}
    );
    return succeed(removed);
  }
}
