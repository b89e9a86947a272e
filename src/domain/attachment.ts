/**
 * Volume attachment domain model.
 *
 * An attachment joins a server and a volume by id. Neither id is checked
 * against the servers or volumes collections; the only enforced rule is
 * one attachment per (serverId, volumeId) pair.
 */

import { isRecord, isString, readId, stringOr } from './guards';
import { ServiceError, validationError } from './errors';

export const DEFAULT_DEVICE = '/dev/vdb';

export interface Attachment {
  id: string;
  serverId: string;
  volumeId: string;
  device: string;
  attached_at: string;
}

export interface AttachVolumeInput {
  volumeId: string;
  device: string;
}

/** Read one stored attachment row; undefined unless all three ids are usable. */
export function readAttachment(value: unknown, loadedAt: string): Attachment | undefined {
  if (!isRecord(value)) return undefined;
  const id = readId(value.id);
  const serverId = readId(value.serverId);
  const volumeId = readId(value.volumeId);
  if (id === undefined || serverId === undefined || volumeId === undefined) return undefined;
  return {
    ...value,
    id,
    serverId,
    volumeId,
    device: stringOr(value.device, DEFAULT_DEVICE),
    attached_at: stringOr(value.attached_at, loadedAt),
  };
}

function nonEmptyString(value: unknown): string | undefined {
  return isString(value) && value.length > 0 ? value : undefined;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Read the volume id from `volumeId`, falling back to `volume_id`. Numeric
 * ids are accepted in their string form. The device defaults to /dev/vdb.
 */
export function parseAttachInput(body: unknown): AttachVolumeInput {
  const fields = isRecord(body) ? body : {};
  const volumeId = readId(fields.volumeId) ?? readId(fields.volume_id);
  if (volumeId === undefined) {
    const supplied = !isBlank(fields.volumeId) || !isBlank(fields.volume_id);
    const message = supplied ? 'volumeId must be a string or number' : 'Missing volumeId';
    throw new ServiceError(validationError(message, { accepted: ['volumeId', 'volume_id'] }));
  }
  const device = nonEmptyString(fields.device) ?? DEFAULT_DEVICE;
  return { volumeId, device };
}

/** True when the attachment joins exactly this server and volume. */
export function joins(attachment: Attachment, serverId: string, volumeId: string): boolean {
  return attachment.serverId === serverId && attachment.volumeId === volumeId;
}
