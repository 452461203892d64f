export * from './identity/keypair.js';
export * from './registry/address.js';
export * from './registry/peer.js';
export * from './registry/service-id.js';
export * from './registry/blacklist.js';
export * from './registry/provenance-graph.js';
export * from './registry/peer-store.js';
export * from './registry/service-index.js';
export * from './registry/peer-registry.js';
export * from './rest/network-routes.js';
export * from './config.js';
export * from './utils.js';
