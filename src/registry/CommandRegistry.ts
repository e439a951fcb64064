/**
 * Command Registry
 *
 * Closed table of every command the server will execute, with its safety tier.
 * Filled at startup, then sealed; after that it is read-only and shared by the
 * listeners and the Serializer without coordination. Transport eligibility is
 * decided here and nowhere else.
 */

import { ClassificationError, ProtocolError, Transport } from '@/protocol/index.js';
import type { Correlation } from '@/protocol/index.js';

import { SafetyTier, type CommandDescriptor, type CommandHandler } from './types.js';

/**
 * Misuse of the registry at startup: duplicate names, late registration.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RegistryError';
  }
}

const NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export class CommandRegistry {
  private readonly descriptors = new Map<string, CommandDescriptor>();
  private sealed = false;

  /**
   * Add a command. Only valid before `seal()`.
   *
   * @throws RegistryError on a sealed registry, a duplicate or a malformed name
   *
   * @example
   * ```typescript
   * registry.register(
   *   'set_track_volume',
   *   (session, params) => session.invoke('set_track_volume', params),
   *   SafetyTier.LossyEligible
   * );
   * ```
   */
  register(
    name: string,
    handler: CommandHandler,
    tier: SafetyTier,
    description: string = ''
  ): this {
    if (this.sealed) {
      throw new RegistryError(`Cannot register ${name}: registry is sealed`);
    }
    if (!NAME_PATTERN.test(name)) {
      throw new RegistryError(`Invalid command name: ${JSON.stringify(name)}`);
    }
    if (this.descriptors.has(name)) {
      throw new RegistryError(`Command already registered: ${name}`);
    }

    this.descriptors.set(name, Object.freeze({ name, handler, tier, description }));
    return this;
  }

  /**
   * Close the table. Called once startup is complete.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.descriptors.size;
  }

  /**
   * Look up a command by name.
   */
  classify(name: string): CommandDescriptor | undefined {
    return this.descriptors.get(name);
  }

  isLossyEligible(name: string): boolean {
    return this.descriptors.get(name)?.tier === SafetyTier.LossyEligible;
  }

  /**
   * Resolve a command for execution on a given transport.
   *
   * @throws ProtocolError (UNKNOWN_COMMAND) for names not in the table
   * @throws ClassificationError for a NeverLossy command on the lossy transport
   */
  admit(name: string, transport: Transport, correlation?: Correlation): CommandDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw ProtocolError.unknownCommand(name, correlation);
    }
    if (transport === Transport.Lossy && descriptor.tier !== SafetyTier.LossyEligible) {
      throw new ClassificationError(name, transport);
    }
    return descriptor;
  }

  /**
   * All descriptors in registration order.
   */
  list(): CommandDescriptor[] {
    return [...this.descriptors.values()];
  }

  names(): string[] {
    return [...this.descriptors.keys()];
  }
}
