/**
 * Server volume attachment routes, mounted under the servers prefix.
 *
 * POST   /:serverId/os-volume_attachments                Attach (202)
 * GET    /:serverId/os-volume_attachments                List for a server
 * DELETE /:serverId/os-volume_attachments/:attachmentId  Detach (204)
 */

import { Router } from 'express';
import { parseAttachInput } from '../domain/attachment';
import { AttachmentService } from '../services/attachment-service';

export function createAttachmentRoutes(attachments: AttachmentService): Router {
  const router = Router();

  router.post('/:serverId/os-volume_attachments', async (req, res, next) => {
    try {
      const attachment = await attachments.attach(req.params.serverId, parseAttachInput(req.body));
      res.status(202).json({ volumeAttachment: attachment });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:serverId/os-volume_attachments', (req, res, next) => {
    try {
      res.json({ volumeAttachments: attachments.list(req.params.serverId) });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:serverId/os-volume_attachments/:attachmentId', async (req, res, next) => {
    try {
      await attachments.detach(req.params.serverId, req.params.attachmentId);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
