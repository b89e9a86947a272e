/**
 * Express server configuration.
 *
 * Assembles the mocked cloud API: identity, image registry, block storage,
 * compute servers and their volume attachments, all over one resource store.
 */

import express from 'express';
import { CreateServerInput, Server, parseServerInput } from './domain/compute-server';
import { CreateImageInput, Image, parseImageInput, toImageListEntry } from './domain/image';
import { CreateVolumeInput, Volume, parseVolumeInput } from './domain/volume';
import { createAttachmentRoutes } from './api/attachments';
import { createAuthRoutes } from './api/auth';
import { createCollectionRoutes } from './api/collections';
import { errorHandler, requestLogger, requireToken } from './api/middleware';
import { AttachmentService } from './services/attachment-service';
import { IdentityService } from './services/identity-service';
import {
  ResourceCollection,
  imageDescriptor,
  serverDescriptor,
  volumeDescriptor,
} from './services/resource-collection';
import { PersistenceProvider } from './storage/persistence';
import { ResourceStore, ResourceStoreOptions } from './storage/resource-store';

export const SERVICE_VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: ResourceStore;
  identity: IdentityService;
  images: ResourceCollection<Image, CreateImageInput>;
  volumes: ResourceCollection<Volume, CreateVolumeInput>;
  servers: ResourceCollection<Server, CreateServerInput>;
  attachments: AttachmentService;
}

/** Create the application context over an opened store. */
export function createAppContext(store: ResourceStore): AppContext {
  return {
    store,
    identity: new IdentityService(store),
    images: new ResourceCollection(store, imageDescriptor),
    volumes: new ResourceCollection(store, volumeDescriptor),
    servers: new ResourceCollection(store, serverDescriptor),
    attachments: new AttachmentService(store),
  };
}

/** Open the store on `persistence` and build the context around it. */
export async function openAppContext(
  persistence: PersistenceProvider,
  options?: ResourceStoreOptions,
): Promise<AppContext> {
  const store = await ResourceStore.open(persistence, options);
  return createAppContext(store);
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();
  // Parsed per prefix: on protected prefixes the gate runs before the body is read.
  const jsonBody = express.json({ limit: '1mb' });

  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVICE_VERSION,
      uptimeMs: Date.now() - startTime,
      storage: ctx.store.backend,
    });
  });

  // Identity (no token required)
  app.use('/v3/auth', jsonBody, createAuthRoutes(ctx.identity));

  const gate = requireToken(ctx.identity);

  app.use(
    '/v2/images',
    gate,
    jsonBody,
    createCollectionRoutes({
      collection: ctx.images,
      listKey: 'images',
      parse: parseImageInput,
      createdStatus: 201,
      presentListItem: toImageListEntry,
    }),
  );

  app.use(
    '/v3/volumes',
    gate,
    jsonBody,
    createCollectionRoutes({
      collection: ctx.volumes,
      listKey: 'volumes',
      parse: parseVolumeInput,
      createdStatus: 201,
    }),
  );

  app.use(
    '/v2.1/servers',
    gate,
    jsonBody,
    createAttachmentRoutes(ctx.attachments),
    createCollectionRoutes({
      collection: ctx.servers,
      listKey: 'servers',
      parse: parseServerInput,
      createdStatus: 202,
    }),
  );

  app.use(errorHandler);

  return app;
}
