export * from './attachment-service';
export * from './identity-service';
export * from './resource-collection';
