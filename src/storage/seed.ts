/**
 * Default contents for a fresh data directory.
 */

import { v4 as uuid } from 'uuid';
import type { StoreState } from './resource-store';

/** Build the seed state. Ids are generated, timestamps are `now`. */
export function createSeedState(now: string = new Date().toISOString()): StoreState {
  const imageId = uuid();
  return {
    users: {
      admin: { password: 'secret', id: 'user-1', role: 'admin', domain: 'default' },
      demo: { password: 'test', id: 'user-2', role: 'user', domain: 'default' },
    },
    tokens: {},
    images: [
      {
        id: imageId,
        name: 'Cirros',
        status: 'active',
        size: 13287936,
        visibility: 'public',
        container_format: 'bare',
        disk_format: 'qcow2',
        created_at: now,
      },
    ],
    volumes: [{ id: uuid(), name: 'vol-1', size: 1, status: 'available' }],
    servers: [{ id: uuid(), name: 'server-1', status: 'ACTIVE', image_id: imageId, flavor_id: null }],
    attachments: [],
  };
}
