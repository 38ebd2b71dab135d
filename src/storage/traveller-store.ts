/**
 * Travellers table. PII columns hold ciphertext; the driving license is
 * stored twice: a deterministic token for uniqueness and a ciphertext
 * for display.
 */

import { assignments, guardSql, type Db } from './database';
import type { Gender } from '~/types';

export interface TravellerRow {
  id: number;
  firstNameCipher: string;
  lastNameCipher: string;
  birthdayCipher: string;
  gender: Gender;
  streetNameCipher: string;
  houseNumberCipher: string;
  zipCodeCipher: string;
  city: string;
  emailCipher: string;
  mobilePhoneCipher: string;
  licenseToken: string;
  licenseCipher: string;
  createdAt: string;
}

export type NewTravellerRow = Omit<TravellerRow, 'id'>;

export type TravellerRowChanges = Partial<Omit<TravellerRow, 'id' | 'createdAt'>>;

const SELECT = `
  SELECT id, first_name_enc AS firstNameCipher, last_name_enc AS lastNameCipher,
         birthday_enc AS birthdayCipher, gender, street_name_enc AS streetNameCipher,
         house_number_enc AS houseNumberCipher, zip_code_enc AS zipCodeCipher, city,
         email_enc AS emailCipher, mobile_phone_enc AS mobilePhoneCipher,
         license_token AS licenseToken, license_enc AS licenseCipher, created_at AS createdAt
  FROM travellers`;

const COLUMNS: ReadonlyArray<readonly [keyof TravellerRowChanges, string]> = [
  ['firstNameCipher', 'first_name_enc'],
  ['lastNameCipher', 'last_name_enc'],
  ['birthdayCipher', 'birthday_enc'],
  ['gender', 'gender'],
  ['streetNameCipher', 'street_name_enc'],
  ['houseNumberCipher', 'house_number_enc'],
  ['zipCodeCipher', 'zip_code_enc'],
  ['city', 'city'],
  ['emailCipher', 'email_enc'],
  ['mobilePhoneCipher', 'mobile_phone_enc'],
  ['licenseToken', 'license_token'],
  ['licenseCipher', 'license_enc']
];

export class TravellerStore {
  constructor(private readonly db: Db) {}

  insert(row: NewTravellerRow): number {
    return guardSql('insert traveller', () => {
      const result = this.db
        .prepare<NewTravellerRow>(
          `INSERT INTO travellers (first_name_enc, last_name_enc, birthday_enc, gender, street_name_enc,
                                   house_number_enc, zip_code_enc, city, email_enc, mobile_phone_enc,
                                   license_token, license_enc, created_at)
           VALUES (@firstNameCipher, @lastNameCipher, @birthdayCipher, @gender, @streetNameCipher,
                   @houseNumberCipher, @zipCodeCipher, @city, @emailCipher, @mobilePhoneCipher,
                   @licenseToken, @licenseCipher, @createdAt)`
        )
        .run(row);
      return Number(result.lastInsertRowid);
    });
  }

  findById(id: number): TravellerRow | null {
    return guardSql('read traveller', () => {
      return this.db.prepare<[number], TravellerRow>(`${SELECT} WHERE id = ?`).get(id) ?? null;
    });
  }

  /**
   * Whether a license token belongs to a traveller other than `excludeId`
   */
  licenseTaken(licenseToken: string, excludeId: number = 0): boolean {
    return guardSql('check license number', () => {
      const row = this.db
        .prepare<[string, number], { id: number }>('SELECT id FROM travellers WHERE license_token = ? AND id != ?')
        .get(licenseToken, excludeId);
      return row !== undefined;
    });
  }

  all(): TravellerRow[] {
    return guardSql('list travellers', () => this.db.prepare<[], TravellerRow>(`${SELECT} ORDER BY id`).all());
  }

  update(id: number, changes: TravellerRowChanges): boolean {
    const sets = assignments(COLUMNS, changes);
    if (sets.length === 0) {
      return this.findById(id) !== null;
    }

    return guardSql('update traveller', () => {
      const result = this.db
        .prepare<TravellerRowChanges & { id: number }>(`UPDATE travellers SET ${sets.join(', ')} WHERE id = @id`)
        .run({ ...changes, id });
      return result.changes > 0;
    });
  }

  delete(id: number): boolean {
    return guardSql('delete traveller', () =>
      this.db.prepare<[number]>('DELETE FROM travellers WHERE id = ?').run(id).changes > 0
    );
  }
}
