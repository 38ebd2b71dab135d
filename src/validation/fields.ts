/**
 * Field validators
 *
 * Whitelist validation for every user-supplied field. Each schema also
 * canonicalizes its value (case, phone format, rounding) so that stored
 * values and lookup tokens are computed from one canonical form.
 */

import { z } from 'zod';
import { ValidationError } from '~/types';

export const CITIES = [
  'Rotterdam',
  'Amsterdam',
  'The Hague',
  'Utrecht',
  'Eindhoven',
  'Groningen',
  'Tilburg',
  'Almere',
  'Breda',
  'Nijmegen'
] as const;

/** Service area bounding box */
export const SERVICE_AREA = {
  minLatitude: 51.8,
  maxLatitude: 52.0,
  minLongitude: 4.3,
  maxLongitude: 4.6
} as const;

const USERNAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_.']{7,9}$/;
const NAME_PATTERN = /^[A-Za-z\s\-']+$/;
const PRODUCT_PATTERN = /^[A-Za-z0-9\s\-']+$/;
const EMAIL_PATTERN = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;
const PHONE_PATTERN = /^(?:\+31-6-)?(\d{8})$/;
const ZIP_PATTERN = /^\d{4}[A-Z]{2}$/;
const LICENSE_PATTERN = /^[A-Z]{1,2}\d{7,8}$/;
const SERIAL_PATTERN = /^[A-Za-z0-9]{10,17}$/;
const HOUSE_NUMBER_PATTERN = /^\d{1,5}[A-Za-z]?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const PASSWORD_SPECIALS = "~!@#$%&_-+=`|\\(){}[]:;'<>,.?/";

function clean(value: string): string {
  return value.replace(/\0/g, '').trim();
}

function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, lead: string, ch: string) => lead + ch.toUpperCase());
}

function text(label: string) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .transform(clean);
}

function integer(label: string, min: number, max: number) {
  return z
    .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .int(`${label} must be a whole number`)
    .min(min, `${label} must be at least ${min}`)
    .max(max, `${label} must be at most ${max}`);
}

function isCalendarDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function date(label: string) {
  return text(label).refine(isCalendarDate, `${label} must be a valid date in format YYYY-MM-DD`);
}

export function personName(label: string) {
  return text(label)
    .pipe(
      z
        .string()
        .min(1, `${label} cannot be empty`)
        .max(50, `${label} must be at most 50 characters`)
        .regex(NAME_PATTERN, `${label} must contain only letters, spaces, hyphens, and apostrophes`)
    )
    .transform(toTitleCase);
}

export const usernameSchema = text('Username')
  .pipe(
    z
      .string()
      .min(8, 'Username must be between 8-10 characters')
      .max(10, 'Username must be between 8-10 characters')
      .regex(
        USERNAME_PATTERN,
        "Username must start with a letter or underscore and contain only letters, numbers, _, ', ."
      )
  )
  .transform((value) => value.toLowerCase());

export const passwordSchema = z
  .string({ required_error: 'Password is required', invalid_type_error: 'Password must be text' })
  .min(12, 'Password must be between 12-30 characters')
  .max(30, 'Password must be between 12-30 characters')
  .refine(
    (value) =>
      /[a-z]/.test(value) &&
      /[A-Z]/.test(value) &&
      /\d/.test(value) &&
      [...value].some((ch) => PASSWORD_SPECIALS.includes(ch)),
    'Password must contain at least one lowercase, uppercase, digit, and special character'
  );

export const emailSchema = text('Email').refine((value) => EMAIL_PATTERN.test(value), 'Invalid email format');

/** Accepts 8 digits and normalizes to the national mobile format */
export const mobilePhoneSchema = text('Mobile phone').transform((value, ctx) => {
  const match = PHONE_PATTERN.exec(value);
  if (!match) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Mobile phone must be exactly 8 digits' });
    return z.NEVER;
  }
  return `+31-6-${match[1]}`;
});

export const zipCodeSchema = text('Zip code')
  .transform((value) => value.toUpperCase())
  .refine((value) => ZIP_PATTERN.test(value), 'Zip code must be in format DDDDXX (4 digits + 2 letters)');

export const drivingLicenseSchema = text('Driving license number')
  .transform((value) => value.toUpperCase())
  .refine(
    (value) => LICENSE_PATTERN.test(value),
    'Driving license must be in format XXDDDDDDD or XDDDDDDDD'
  );

export const citySchema = text('City').transform((value, ctx) => {
  const city = CITIES.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
  if (!city) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `City must be one of: ${CITIES.join(', ')}` });
    return z.NEVER;
  }
  return city;
});

export const genderSchema = text('Gender')
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['male', 'female'], { errorMap: () => ({ message: "Gender must be 'male' or 'female'" }) }));

export const serialNumberSchema = text('Serial number')
  .refine((value) => SERIAL_PATTERN.test(value), 'Serial number must be 10-17 alphanumeric characters')
  .transform((value) => value.toUpperCase());

function coordinate(label: string, min: number, max: number) {
  return z
    .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
    .min(min, `${label} must be within the service area (${min}-${max})`)
    .max(max, `${label} must be within the service area (${min}-${max})`)
    .transform((value) => Math.round(value * 1e5) / 1e5);
}

export const accountRoleSchema = z.enum(['administrator', 'operator'], {
  errorMap: () => ({ message: "Role must be 'administrator' or 'operator'" })
});

export const newUserSchema = z.object({
  username: usernameSchema,
  password: passwordSchema,
  role: accountRoleSchema,
  firstName: personName('First name'),
  lastName: personName('Last name')
});

export const profileChangesSchema = z
  .object({
    username: usernameSchema,
    firstName: personName('First name'),
    lastName: personName('Last name')
  })
  .partial()
  .strict();

export const travellerSchema = z.object({
  firstName: personName('First name'),
  lastName: personName('Last name'),
  birthday: date('Birthday'),
  gender: genderSchema,
  streetName: personName('Street name'),
  houseNumber: text('House number').refine(
    (value) => HOUSE_NUMBER_PATTERN.test(value),
    'House number must be 1-5 digits with an optional letter'
  ),
  zipCode: zipCodeSchema,
  city: citySchema,
  email: emailSchema,
  mobilePhone: mobilePhoneSchema,
  drivingLicenseNumber: drivingLicenseSchema
});

export const travellerChangesSchema = travellerSchema.partial().strict();

export const vehicleSchema = z.object({
  brand: text('Brand').pipe(
    z.string().min(1, 'Brand cannot be empty').max(50, 'Brand must be at most 50 characters').regex(PRODUCT_PATTERN, 'Brand must contain only letters, digits, spaces, hyphens, and apostrophes')
  ),
  model: text('Model').pipe(
    z.string().min(1, 'Model cannot be empty').max(50, 'Model must be at most 50 characters').regex(PRODUCT_PATTERN, 'Model must contain only letters, digits, spaces, hyphens, and apostrophes')
  ),
  serialNumber: serialNumberSchema,
  topSpeed: integer('Top speed', 1, 100),
  batteryCapacity: integer('Battery capacity', 100, 10000),
  soc: integer('State of charge', 0, 100),
  socMin: integer('Minimum SoC', 0, 100),
  socMax: integer('Maximum SoC', 0, 100),
  latitude: coordinate('Latitude', SERVICE_AREA.minLatitude, SERVICE_AREA.maxLatitude),
  longitude: coordinate('Longitude', SERVICE_AREA.minLongitude, SERVICE_AREA.maxLongitude),
  outOfService: z.boolean({ invalid_type_error: 'Out-of-service flag must be true or false' }).default(false),
  mileage: integer('Mileage', 0, 999999).default(0),
  lastMaintenanceDate: date('Last maintenance date').nullable().default(null),
  /** Left out means today; the repository fills it from its clock */
  inServiceDate: date('In-service date').optional()
});

/** Sparse changes carry no defaults: an omitted field stays untouched */
export const vehicleChangesSchema = z
  .object({
    brand: vehicleSchema.shape.brand,
    model: vehicleSchema.shape.model,
    serialNumber: serialNumberSchema,
    topSpeed: vehicleSchema.shape.topSpeed,
    batteryCapacity: vehicleSchema.shape.batteryCapacity,
    soc: vehicleSchema.shape.soc,
    socMin: vehicleSchema.shape.socMin,
    socMax: vehicleSchema.shape.socMax,
    latitude: vehicleSchema.shape.latitude,
    longitude: vehicleSchema.shape.longitude,
    outOfService: z.boolean({ invalid_type_error: 'Out-of-service flag must be true or false' }),
    mileage: integer('Mileage', 0, 999999),
    lastMaintenanceDate: date('Last maintenance date').nullable(),
    inServiceDate: date('In-service date')
  })
  .partial()
  .strict();

export type NewUserInput = z.input<typeof newUserSchema>;
export type ProfileChanges = z.input<typeof profileChangesSchema>;
export type TravellerInput = z.input<typeof travellerSchema>;
export type TravellerChanges = z.input<typeof travellerChangesSchema>;
export type VehicleInput = z.input<typeof vehicleSchema>;
export type VehicleChanges = z.input<typeof vehicleChangesSchema>;

/**
 * Validate and canonicalize input against a schema.
 *
 * @throws {ValidationError} Naming the first offending field
 */
export function parseFields<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue.path.length > 0 ? issue.path.map(String).join('.') : undefined;
  throw new ValidationError(issue.message, field);
}

/**
 * SoC ordering must hold for the merged record after every create/update
 *
 * @throws {ValidationError}
 */
export function assertSocBounds(values: { soc: number; socMin: number; socMax: number }): void {
  if (values.socMin >= values.socMax) {
    throw new ValidationError(
      `Minimum SoC (${values.socMin}) must be less than maximum SoC (${values.socMax})`,
      'socMin'
    );
  }
  if (values.soc < values.socMin || values.soc > values.socMax) {
    throw new ValidationError(
      `State of charge ${values.soc} must be between minimum SoC (${values.socMin}) and maximum SoC (${values.socMax})`,
      'soc'
    );
  }
}

/**
 * @param today - Local calendar date, YYYY-MM-DD
 * @throws {ValidationError}
 */
export function assertBirthdayNotInFuture(birthday: string, today: string): void {
  if (birthday > today) {
    throw new ValidationError('Birthday cannot be in the future', 'birthday');
  }
}

/**
 * Normalize a free-text search term
 *
 * @throws {ValidationError} If shorter than 2 characters
 */
export function parseSearchTerm(term: string): string {
  const normalized = clean(term).toLowerCase();
  if (normalized.length < 2) {
    throw new ValidationError('Search term must be at least 2 characters', 'term');
  }
  return normalized;
}
