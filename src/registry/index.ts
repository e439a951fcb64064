export { CommandRegistry, RegistryError } from './CommandRegistry.js';
export { DEFAULT_CATALOG, createDefaultRegistry, type CatalogEntry } from './catalog.js';
export { SafetyTier, type CommandDescriptor, type CommandHandler } from './types.js';
