/**
 * ProviderRegistry - Lookup of expression providers by attribute kind
 */

import { CreatorNotFoundError } from '../errors.js';
import { formatPropertyType } from '../model/types.js';
import type { PropertyDescriptor, PropertyKind } from '../model/types.js';
import type { ExpressionProvider } from './types.js';

export class ProviderRegistry {
  private readonly providers: ReadonlyMap<PropertyKind, ExpressionProvider>;

  /**
   * @param providers - When several providers share a target type, the first one wins
   */
  constructor(providers: Iterable<ExpressionProvider>) {
    const byKind = new Map<PropertyKind, ExpressionProvider>();
    for (const provider of providers) {
      if (!byKind.has(provider.targetType)) {
        byKind.set(provider.targetType, provider);
      }
    }
    this.providers = byKind;
  }

  /**
   * Find the provider for an attribute kind
   * Nullability is not part of the kind, so `number | null` finds the `number` provider.
   */
  find(kind: PropertyKind): ExpressionProvider | null {
    return this.providers.get(kind) ?? null;
  }

  /**
   * Find the provider for a resolved attribute
   *
   * @throws CreatorNotFoundError if no provider handles the attribute's kind
   */
  require(property: PropertyDescriptor<unknown>, modelName: string): ExpressionProvider {
    const provider = this.find(property.type.kind);
    if (provider === null) {
      throw new CreatorNotFoundError(formatPropertyType(property.type), property.name, modelName);
    }
    return provider;
  }
}
