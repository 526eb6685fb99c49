/**
 * Quota registry: maps quota keys to their declared definitions.
 * Built once at startup from validated config. Provides O(1) lookup.
 */

import { logger } from '../shared/logger.js';
import { UnknownQuotaError } from '../shared/errors.js';
import type { QuotaDefinition } from '../config/types.js';

/** Registry of quota definitions, keyed by quota key. */
export class QuotaRegistry {
  private readonly definitions: Map<string, QuotaDefinition>;

  constructor(definitions: Map<string, QuotaDefinition>) {
    this.definitions = definitions;
  }

  /**
   * Get a quota definition by key.
   * @throws UnknownQuotaError if the key is not registered.
   */
  get(quotaKey: string): QuotaDefinition {
    const definition = this.definitions.get(quotaKey);
    if (!definition) {
      throw new UnknownQuotaError(quotaKey);
    }
    return definition;
  }

  /** Get all registered quota definitions, in config order. */
  getAll(): QuotaDefinition[] {
    return Array.from(this.definitions.values());
  }

  /** Number of registered quotas. */
  get size(): number {
    return this.definitions.size;
  }
}

/**
 * Build a quota registry from validated config.
 *
 * @param quotas - Array of validated quota definitions.
 * @returns A QuotaRegistry with all quotas registered.
 */
export function buildQuotaRegistry(quotas: QuotaDefinition[]): QuotaRegistry {
  const definitions = new Map<string, QuotaDefinition>();

  for (const definition of quotas) {
    definitions.set(definition.key, definition);
    logger.info(
      { quotaKey: definition.key, kind: definition.kind },
      `Registered quota: ${definition.key} (${definition.kind})`,
    );
  }

  return new QuotaRegistry(definitions);
}
