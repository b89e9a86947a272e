/**
 * Server volume attachments.
 *
 * The duplicate check and the insert run inside one store mutation, so two
 * concurrent attaches of the same pair cannot both succeed.
 */

import { v4 as uuid } from 'uuid';
import { Attachment, AttachVolumeInput, joins } from '../domain/attachment';
import { ServiceError, conflictError, notFoundError } from '../domain/errors';
import { ResourceStore } from '../storage/resource-store';

export class AttachmentService {
  constructor(private store: ResourceStore) {}

  /** Attach a volume to a server. Throws RESOURCE.CONFLICT if the pair is already attached. */
  attach(serverId: string, input: AttachVolumeInput): Promise<Attachment> {
    const attachedAt = new Date().toISOString();
    return this.store.mutate((state) => {
      if (state.attachments.some((existing) => joins(existing, serverId, input.volumeId))) {
        throw new ServiceError(conflictError('Already attached', { serverId, volumeId: input.volumeId }));
      }
      const attachment: Attachment = {
        id: uuid(),
        serverId,
        volumeId: input.volumeId,
        device: input.device,
        attached_at: attachedAt,
      };
      state.attachments.push(attachment);
      return attachment;
    });
  }

  /** Attachments of one server, in insertion order. */
  list(serverId: string): Attachment[] {
    return this.store.read((state) => state.attachments.filter((a) => a.serverId === serverId));
  }

  /** Remove the attachment matching both ids. */
  async detach(serverId: string, attachmentId: string): Promise<void> {
    await this.store.mutate((state) => {
      const index = state.attachments.findIndex((a) => a.serverId === serverId && a.id === attachmentId);
      if (index === -1) {
        throw new ServiceError(notFoundError('Attachment', attachmentId));
      }
      state.attachments.splice(index, 1);
    });
  }
}
