/**
 * Middleware Chain
 *
 * The composed onion: unit[0] wraps unit[1] wraps ... wraps the view.
 * Built once from the registry and shared, read-only, by every request.
 */

import type { HookName, MiddlewareDescriptor } from './capabilities.ts';
import { HOOKS } from './capabilities.ts';
import type { MiddlewareRegistry, RegisteredMiddleware } from './registry.ts';
import type { MiddlewareUnit } from './types.ts';

export interface ChainLink {
  readonly index: number;
  readonly descriptor: MiddlewareDescriptor;
  readonly unit: MiddlewareUnit;
  /** Next inner link; null for the innermost unit */
  readonly next: ChainLink | null;
}

// Hooks run on the way in; everything else runs on the way out
const INBOUND_HOOKS: ReadonlySet<HookName> = new Set<HookName>(['request', 'view']);

export class Chain {
  readonly head: ChainLink | null;
  readonly length: number;
  private readonly ordered: readonly ChainLink[];
  private readonly byHook: ReadonlyMap<HookName, readonly ChainLink[]>;

  constructor(entries: readonly RegisteredMiddleware[]) {
    let next: ChainLink | null = null;
    const links: ChainLink[] = [];

    for (let index = entries.length - 1; index >= 0; index--) {
      const { unit, descriptor } = entries[index];
      const link: ChainLink = Object.freeze({ index, descriptor, unit, next });
      links.unshift(link);
      next = link;
    }

    this.head = next;
    this.length = links.length;
    this.ordered = Object.freeze(links);

    const byHook = new Map<HookName, readonly ChainLink[]>();
    for (const hook of HOOKS) {
      const implementing = links.filter((link) => link.descriptor.implements(hook));
      byHook.set(hook, Object.freeze(INBOUND_HOOKS.has(hook) ? implementing : implementing.reverse()));
    }
    this.byHook = byHook;

    Object.freeze(this);
  }

  /**
   * Links implementing a hook, in the order the dispatcher calls them
   */
  forHook(hook: HookName): readonly ChainLink[] {
    return this.byHook.get(hook) ?? [];
  }

  /**
   * Links from outermost to innermost
   */
  links(): readonly ChainLink[] {
    return this.ordered;
  }

  names(): string[] {
    return this.ordered.map((link) => link.descriptor.name);
  }
}

/**
 * Compose a registry into its chain, building the registry if needed
 */
export function buildChain(registry: MiddlewareRegistry): Chain {
  return new Chain(registry.build());
}
