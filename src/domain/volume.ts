/**
 * Block-storage volume domain model. New volumes are always `available`.
 */

import { isRecord, numberOr, readId, requireBody, requiredInteger, requiredString, stringOr } from './guards';

export interface Volume {
  id: string;
  name: string;
  size: number;
  status: string;
}

export interface CreateVolumeInput {
  name: string;
  /** Size in GiB. */
  size: number;
}

/** Read one stored volume row; undefined when it has no usable id. */
export function readVolume(value: unknown): Volume | undefined {
  if (!isRecord(value)) return undefined;
  const id = readId(value.id);
  if (id === undefined) return undefined;
  return {
    ...value,
    id,
    name: stringOr(value.name, ''),
    size: numberOr(value.size, 0),
    status: stringOr(value.status, 'available'),
  };
}

export function parseVolumeInput(body: unknown): CreateVolumeInput {
  const fields = requireBody(body);
  return {
    name: requiredString(fields, 'name'),
    size: requiredInteger(fields, 'size'),
  };
}

export function buildVolume(id: string, input: CreateVolumeInput): Volume {
  return { id, name: input.name, size: input.size, status: 'available' };
}
