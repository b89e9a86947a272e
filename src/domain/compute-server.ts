/**
 * Compute server domain model.
 *
 * New servers report `BUILD` forever; seeded servers may be `ACTIVE`. Stored
 * rows may carry any status string and are served back unchanged.
 */

import { isRecord, isString, nullableRef, readId, requireBody, requiredString, stringOr } from './guards';
import { ServiceError, validationError } from './errors';

export interface Server {
  id: string;
  name: string;
  status: string;
  image_id: string | null;
  flavor_id: string | null;
}

export interface CreateServerInput {
  name: string;
  image_id: string;
  flavor_id: string | null;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || isString(value);
}

/**
 * Read one stored server row. Rows from data directories that predate image
 * and flavor ids load with both set to null. Fields this model does not know
 * are kept. Returns undefined for a row without a usable id.
 */
export function readServer(value: unknown): Server | undefined {
  if (!isRecord(value)) return undefined;
  const id = readId(value.id);
  if (id === undefined) return undefined;
  return {
    ...value,
    id,
    name: stringOr(value.name, ''),
    status: stringOr(value.status, 'UNKNOWN'),
    image_id: nullableRef(value.image_id),
    flavor_id: nullableRef(value.flavor_id),
  };
}

export function parseServerInput(body: unknown): CreateServerInput {
  const fields = requireBody(body);
  const flavorId = fields.flavor_id ?? null;
  if (!isNullableString(flavorId)) {
    throw new ServiceError(validationError('flavor_id must be a string or null', { field: 'flavor_id' }));
  }
  return {
    name: requiredString(fields, 'name'),
    image_id: requiredString(fields, 'image_id'),
    flavor_id: flavorId,
  };
}

export function buildServer(id: string, input: CreateServerInput): Server {
  return {
    id,
    name: input.name,
    status: 'BUILD',
    image_id: input.image_id,
    flavor_id: input.flavor_id,
  };
}
