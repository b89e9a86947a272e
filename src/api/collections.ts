/**
 * Collection API routes, shared by images, volumes and servers.
 *
 * GET    /     List, wrapped as `{ <listKey>: [...] }`
 * POST   /     Create; responds with the bare entity
 * GET    /:id  Fetch one entity
 * DELETE /:id  Delete; responds `{ detail: "Deleted" }`
 */

import { Router } from 'express';
import { ResourceCollection } from '../services/resource-collection';

export interface CollectionRouteOptions<T extends { id: string }, I> {
  collection: ResourceCollection<T, I>;
  /** Property wrapping the list response, e.g. "images". */
  listKey: string;
  /** Request body parser; throws a validation error on bad input. */
  parse: (body: unknown) => I;
  /** Status of a successful create (201, or 202 for servers). */
  createdStatus: number;
  /** Optional per-entity decoration for list responses. */
  presentListItem?: (entity: T) => unknown;
}

export function createCollectionRoutes<T extends { id: string }, I>(options: CollectionRouteOptions<T, I>): Router {
  const { collection, listKey, parse, createdStatus, presentListItem } = options;
  const router = Router();

  router.get('/', (_req, res, next) => {
    try {
      const items = collection.list();
      res.json({ [listKey]: presentListItem ? items.map(presentListItem) : items });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', async (req, res, next) => {
    try {
      const created = await collection.create(parse(req.body));
      res.status(createdStatus).json(created);
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', (req, res, next) => {
    try {
      res.json(collection.get(req.params.id));
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', async (req, res, next) => {
    try {
      await collection.delete(req.params.id);
      res.json({ detail: 'Deleted' });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
