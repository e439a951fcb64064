/**
 * Server-side entry point for host applications embedding the dispatch core.
 */

export { DispatchServer } from './DispatchServer.js';
export type {
  DispatchServerAddresses,
  DispatchServerOptions,
  DispatchServerStats,
} from './DispatchServer.js';
export { ExecutionSerializer, immediateScheduler } from './ExecutionSerializer.js';
export type { ExecutionSerializerOptions, Scheduler, SerializerStats } from './ExecutionSerializer.js';
export { LossyListener } from './LossyListener.js';
export type { LossyListenerOptions, LossyStats } from './LossyListener.js';
export { ReliableListener } from './ReliableListener.js';
export type { ReliableListenerOptions } from './ReliableListener.js';
export type { ConnectionLimits } from './ReliableConnection.js';

export { CommandRegistry, RegistryError, SafetyTier, createDefaultRegistry } from '@/registry/index.js';
export type { CommandDescriptor, CommandHandler } from '@/registry/index.js';
export { MemorySession } from '@/session/index.js';
export type { SessionApi } from '@/session/index.js';
export * from '@/protocol/index.js';
