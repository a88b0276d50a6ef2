/**
 * Implementation Registry
 *
 * Immutable lookup from block type identifier to elementary implementation.
 * Every context receives its registry explicitly, so independent engines
 * (e.g., parallel test runs) never share registered implementations.
 */

import type {
  ElementaryDefinition,
  ElementaryFn,
  ImplementationRegistry,
} from './types.js';

class ImplementationRegistryImpl implements ImplementationRegistry {
  private readonly byType: ReadonlyMap<string, ElementaryDefinition>;

  constructor(definitions: Map<string, ElementaryDefinition>) {
    this.byType = definitions;
  }

  get(typeId: string): ElementaryDefinition | undefined {
    return this.byType.get(typeId);
  }

  has(typeId: string): boolean {
    return this.byType.has(typeId);
  }

  typeIds(): string[] {
    return [...this.byType.keys()];
  }

  get size(): number {
    return this.byType.size;
  }
}

/**
 * Create a registry from implementation definitions.
 * Plain functions are accepted for stateless implementations.
 *
 * @example
 * const registry = createImplementationRegistry({
 *   Gain: ({ inputs, parameters }) => ({ y: Number(parameters.k) * Number(inputs.u) }),
 * });
 */
export function createImplementationRegistry(
  definitions: Record<string, ElementaryDefinition | ElementaryFn>
): ImplementationRegistry {
  const byType = new Map<string, ElementaryDefinition>();

  for (const [typeId, entry] of Object.entries(definitions)) {
    if (typeof entry === 'function') {
      byType.set(typeId, Object.freeze({ evaluate: entry }));
      continue;
    }
    if (typeof entry?.evaluate !== 'function') {
      throw new TypeError(
        `Implementation '${typeId}' must be a function or define evaluate()`
      );
    }
    byType.set(typeId, Object.freeze({ ...entry }));
  }

  return new ImplementationRegistryImpl(byType);
}

/**
 * Combine registries; later registries override earlier ones.
 */
export function mergeRegistries(
  ...registries: ImplementationRegistry[]
): ImplementationRegistry {
  const byType = new Map<string, ElementaryDefinition>();
  for (const registry of registries) {
    for (const typeId of registry.typeIds()) {
      const definition = registry.get(typeId);
      if (definition) byType.set(typeId, definition);
    }
  }
  return new ImplementationRegistryImpl(byType);
}
