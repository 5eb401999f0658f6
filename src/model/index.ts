export { defineCapability } from './capability.js';
export type { Capability, CapabilityDefinition, CapabilityOperations } from './capability.js';
export { CapabilityRegistry } from './registry.js';
export { buildCapabilityQuery, capabilityFilter } from './search.js';
export { Model } from './model.js';
export type { ModelConfig } from './model.js';
export { ModelEntry } from './model-entry.js';
export { ModelCatalog } from './catalog.js';
