/**
 * Image registry domain model.
 *
 * Images are created in the `queued` state and never leave it here; seeded
 * records may already be `active`.
 */

import {
  isRecord,
  numberOr,
  optionalInteger,
  optionalString,
  readId,
  requireBody,
  requiredString,
  stringOr,
} from './guards';

export interface Image {
  id: string;
  name: string;
  status: string;
  size: number;
  visibility: string;
  container_format: string;
  disk_format: string;
  created_at: string;
}

export interface CreateImageInput {
  name: string;
  size: number;
  visibility: string;
  container_format: string;
  disk_format: string;
}

/** Image as it appears in a list response. */
export interface ImageListEntry extends Image {
  links: Array<{ rel: string; href: string }>;
}

/**
 * Read one stored image row. Missing descriptive fields take the values the
 * list endpoint has always reported for them; `created_at` falls back to
 * `loadedAt`. Returns undefined for a row without a usable id.
 */
export function readImage(value: unknown, loadedAt: string): Image | undefined {
  if (!isRecord(value)) return undefined;
  const id = readId(value.id);
  if (id === undefined) return undefined;
  return {
    ...value,
    id,
    name: stringOr(value.name, ''),
    status: stringOr(value.status, 'UNKNOWN'),
    size: numberOr(value.size, 0),
    visibility: stringOr(value.visibility, 'public'),
    container_format: stringOr(value.container_format, 'bare'),
    disk_format: stringOr(value.disk_format, 'qcow2'),
    created_at: stringOr(value.created_at, loadedAt),
  };
}

export function parseImageInput(body: unknown): CreateImageInput {
  const fields = requireBody(body);
  return {
    name: requiredString(fields, 'name'),
    size: optionalInteger(fields, 'size', 0),
    visibility: optionalString(fields, 'visibility', 'private'),
    container_format: optionalString(fields, 'container_format', 'bare'),
    disk_format: optionalString(fields, 'disk_format', 'qcow2'),
  };
}

export function buildImage(id: string, input: CreateImageInput, createdAt: string): Image {
  return {
    id,
    name: input.name,
    status: 'queued',
    size: input.size,
    visibility: input.visibility,
    container_format: input.container_format,
    disk_format: input.disk_format,
    created_at: createdAt,
  };
}

export function toImageListEntry(image: Image): ImageListEntry {
  return { ...image, links: [{ rel: 'self', href: `/v2/images/${image.id}` }] };
}
