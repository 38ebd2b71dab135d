/**
 * Traveller Repository
 *
 * Every free-text PII field is randomized ciphertext. The driving license
 * also carries a deterministic token that enforces uniqueness, so no
 * ciphertexts are ever compared.
 */

import { inTransaction, localDate, nowTimestamp } from '~/storage/database';
import { TravellerStore, type TravellerRow, type TravellerRowChanges } from '~/storage/traveller-store';
import {
  assertBirthdayNotInFuture,
  parseFields,
  parseSearchTerm,
  travellerChangesSchema,
  travellerSchema,
  type TravellerChanges,
  type TravellerInput
} from '~/validation/fields';
import { ConflictError, NotFoundError, succeed } from '~/types';
import type { Outcome, Readout, Session, Traveller } from '~/types';
import { authorize, matchesTerm, readout, reject, type RepositoryContext } from './context';

/** Encrypted-column name for each randomized traveller field */
const CIPHER_COLUMNS = [
  ['firstName', 'firstNameCipher'],
  ['lastName', 'lastNameCipher'],
  ['birthday', 'birthdayCipher'],
  ['streetName', 'streetNameCipher'],
  ['houseNumber', 'houseNumberCipher'],
  ['zipCode', 'zipCodeCipher'],
  ['email', 'emailCipher'],
  ['mobilePhone', 'mobilePhoneCipher'],
  ['drivingLicenseNumber', 'licenseCipher']
] as const;

export class TravellerRepository {
  private readonly store: TravellerStore;

  constructor(private readonly ctx: RepositoryContext) {
    this.store = new TravellerStore(ctx.db);
  }

  private async decrypt(row: TravellerRow): Promise<Traveller> {
    const { codec } = this.ctx;
    const [firstName, lastName, birthday, streetName, houseNumber, zipCode, email, mobilePhone, drivingLicenseNumber] =
      await Promise.all(CIPHER_COLUMNS.map(([, column]) => codec.decryptDisplay(row[column])));

    return {
      id: row.id,
      firstName,
      lastName,
      birthday,
      gender: row.gender,
      streetName,
      houseNumber,
      zipCode,
      city: row.city,
      email,
      mobilePhone,
      drivingLicenseNumber,
      createdAt: row.createdAt
    };
  }

  /**
   * Encrypt whichever randomized fields are present in a change set
   */
  private async encryptChanges(values: Partial<Record<(typeof CIPHER_COLUMNS)[number][0], string>>): Promise<TravellerRowChanges> {
    const { codec } = this.ctx;
    const patch: TravellerRowChanges = {};
    await Promise.all(
      CIPHER_COLUMNS.map(async ([field, column]) => {
        const plain = values[field];
        if (plain !== undefined) {
          patch[column] = await codec.encryptDisplay(plain);
        }
      })
    );
    if (values.drivingLicenseNumber !== undefined) {
      patch.licenseToken = await codec.pseudonymize(values.drivingLicenseNumber);
    }
    return patch;
  }

  async create(session: Session, input: TravellerInput): Promise<Outcome<Traveller>> {
    const denied = await authorize(this.ctx, session, { action: 'create-traveller' }, 'traveller creation');
    if (denied) return { ok: false, failure: denied };

    try {
      const values = parseFields(travellerSchema, input);
      assertBirthdayNotInFuture(values.birthday, localDate(this.ctx.clock()));
      const { codec } = this.ctx;
      const [
        firstNameCipher,
        lastNameCipher,
        birthdayCipher,
        streetNameCipher,
        houseNumberCipher,
        zipCodeCipher,
        emailCipher,
        mobilePhoneCipher,
        licenseCipher,
        licenseToken
      ] = await Promise.all([
        codec.encryptDisplay(values.firstName),
        codec.encryptDisplay(values.lastName),
        codec.encryptDisplay(values.birthday),
        codec.encryptDisplay(values.streetName),
        codec.encryptDisplay(values.houseNumber),
        codec.encryptDisplay(values.zipCode),
        codec.encryptDisplay(values.email),
        codec.encryptDisplay(values.mobilePhone),
        codec.encryptDisplay(values.drivingLicenseNumber),
        codec.pseudonymize(values.drivingLicenseNumber)
      ]);
      const createdAt = nowTimestamp(this.ctx.clock());

      const id = inTransaction(this.ctx.db, 'create traveller', () => {
        if (this.store.licenseTaken(licenseToken)) {
          throw new ConflictError(
            `Driving license ${values.drivingLicenseNumber} is already registered`,
            'drivingLicenseNumber'
          );
        }
        return this.store.insert({
          firstNameCipher,
          lastNameCipher,
          birthdayCipher,
          gender: values.gender,
          streetNameCipher,
          houseNumberCipher,
          zipCodeCipher,
          city: values.city,
          emailCipher,
          mobilePhoneCipher,
          licenseToken,
          licenseCipher,
          createdAt
        });
      });

      await this.ctx.audit.record(session.identity, 'New traveller added', `Traveller ID: ${id}`, {
        eventType: 'data-create'
      });
      return succeed({ id, ...values, createdAt });
    } catch (error) {
      return await reject(this.ctx, session, 'Failed to add traveller', error);
    }
  }

  async getById(session: Session, id: number): Promise<Outcome<Traveller>> {
    const denied = await authorize(this.ctx, session, { action: 'view-pii-list' }, 'traveller lookup');
    if (denied) return { ok: false, failure: denied };

    try {
      const row = this.store.findById(id);
      if (!row) {
        throw new NotFoundError('Traveller', id);
      }
      const traveller = await this.decrypt(row);
      await this.ctx.audit.record(session.identity, 'Viewed traveller', `Traveller ID: ${id}`);
      return succeed(traveller);
    } catch (error) {
      return await reject(this.ctx, session, 'Traveller lookup failed', error);
    }
  }

  async getAll(session: Session): Promise<Outcome<Readout<Traveller>[]>> {
    const denied = await authorize(this.ctx, session, { action: 'view-pii-list' }, 'traveller list access');
    if (denied) return { ok: false, failure: denied };

    const travellers = await Promise.all(this.store.all().map((row) => readout(row, (r) => this.decrypt(r))));
    await this.ctx.audit.record(session.identity, 'Viewed traveller list', `Travellers: ${travellers.length}`);
    return succeed(travellers);
  }

  /**
   * Decrypts every traveller and matches names, contact details, license
   * and id
   */
  async search(session: Session, term: string): Promise<Outcome<Traveller[]>> {
    const denied = await authorize(this.ctx, session, { action: 'view-pii-list' }, 'traveller search');
    if (denied) return { ok: false, failure: denied };

    try {
      const needle = parseSearchTerm(term);
      const readouts = await Promise.all(this.store.all().map((row) => readout(row, (r) => this.decrypt(r))));

      const matches: Traveller[] = [];
      for (const entry of readouts) {
        if (!entry.ok) {
          this.ctx.logger.warn('Skipping undecryptable traveller in search', { id: entry.id });
          continue;
        }
        const t = entry.value;
        if (
          matchesTerm(needle, [t.id, t.firstName, t.lastName, t.email, t.mobilePhone, t.drivingLicenseNumber, t.city])
        ) {
          matches.push(t);
        }
      }

      await this.ctx.audit.record(session.identity, 'Searched travellers', `Matches: ${matches.length}`);
      return succeed(matches);
    } catch (error) {
      return await reject(this.ctx, session, 'Traveller search failed', error);
    }
  }

  async update(session: Session, id: number, changes: TravellerChanges): Promise<Outcome<Traveller>> {
    const denied = await authorize(this.ctx, session, { action: 'update-traveller' }, 'traveller update');
    if (denied) return { ok: false, failure: denied };

    try {
      const values = parseFields(travellerChangesSchema, changes);
      if (values.birthday !== undefined) {
        assertBirthdayNotInFuture(values.birthday, localDate(this.ctx.clock()));
      }
      const row = this.store.findById(id);
      if (!row) {
        throw new NotFoundError('Traveller', id);
      }
      const current = await this.decrypt(row);

      const patch = await this.encryptChanges(values);
      if (values.gender !== undefined) patch.gender = values.gender;
      if (values.city !== undefined) patch.city = values.city;

      inTransaction(this.ctx.db, 'update traveller', () => {
        const { licenseToken } = patch;
        if (licenseToken !== undefined && this.store.licenseTaken(licenseToken, id)) {
          throw new ConflictError(
            `Driving license ${values.drivingLicenseNumber} is already registered`,
            'drivingLicenseNumber'
          );
        }
        if (!this.store.update(id, patch)) {
          throw new NotFoundError('Traveller', id);
        }
      });

      await this.ctx.audit.record(
        session.identity,
        'Traveller updated',
        `Traveller ID: ${id}, Fields: ${Object.keys(values).join(', ')}`,
        { eventType: 'data-update' }
      );
      return succeed({ ...current, ...values });
    } catch (error) {
      return await reject(this.ctx, session, 'Traveller update failed', error);
    }
  }

  /**
   * Hard delete. Resolves to false when there was nothing to delete.
   */
  async delete(session: Session, id: number): Promise<Outcome<boolean>> {
    const denied = await authorize(this.ctx, session, { action: 'delete-traveller' }, 'traveller deletion');
    if (denied) return { ok: false, failure: denied };

    const removed = this.store.delete(id);
    await this.ctx.audit.record(
      session.identity,
      removed ? 'Traveller deleted' : 'Traveller deletion skipped',
      removed ? `Traveller ID: ${id}` : `Traveller ID: ${id} not found`,
      removed ? { eventType: 'data-delete' } : {}
    );
    return succeed(removed);
  }
}
