/**
 * Generic create/list/get/delete over one store collection.
 *
 * Images, volumes and servers differ only in how an entity is built from its
 * input; the descriptor captures that and which array of the state holds it.
 */

import { v4 as uuid } from 'uuid';
import { Server, CreateServerInput, buildServer } from '../domain/compute-server';
import { ServiceError, notFoundError } from '../domain/errors';
import { CreateImageInput, Image, buildImage } from '../domain/image';
import { CreateVolumeInput, Volume, buildVolume } from '../domain/volume';
import { ResourceStore, StoreState } from '../storage/resource-store';

export interface CollectionDescriptor<T extends { id: string }, I> {
  /** Entity label used in error messages, e.g. "Image". */
  kind: string;
  select(state: StoreState): T[];
  build(id: string, input: I, now: string): T;
}

export class ResourceCollection<T extends { id: string }, I> {
  constructor(
    private store: ResourceStore,
    private descriptor: CollectionDescriptor<T, I>,
  ) {}

  /** All entities, in insertion order. */
  list(): T[] {
    return this.store.read((state) => this.descriptor.select(state));
  }

  /** Build a new entity with a fresh id, append it and flush. */
  create(input: I): Promise<T> {
    const entity = this.descriptor.build(uuid(), input, new Date().toISOString());
    return this.store.mutate((state) => {
      this.descriptor.select(state).push(entity);
      return entity;
    });
  }

  get(id: string): T {
    const entity = this.store.read((state) => this.descriptor.select(state).find((item) => item.id === id));
    if (!entity) {
      throw new ServiceError(notFoundError(this.descriptor.kind, id));
    }
    return entity;
  }

  /** Remove the entity with this id and flush. Nothing is flushed when it does not exist. */
  async delete(id: string): Promise<void> {
    await this.store.mutate((state) => {
      const items = this.descriptor.select(state);
      const index = items.findIndex((item) => item.id === id);
      if (index === -1) {
        throw new ServiceError(notFoundError(this.descriptor.kind, id));
      }
      items.splice(index, 1);
    });
  }
}

export const imageDescriptor: CollectionDescriptor<Image, CreateImageInput> = {
  kind: 'Image',
  select: (state) => state.images,
  build: buildImage,
};

export const volumeDescriptor: CollectionDescriptor<Volume, CreateVolumeInput> = {
  kind: 'Volume',
  select: (state) => state.volumes,
  build: buildVolume,
};

export const serverDescriptor: CollectionDescriptor<Server, CreateServerInput> = {
  kind: 'Server',
  select: (state) => state.servers,
  build: buildServer,
};
