/**
 * Capability Descriptors
 *
 * Which hooks a unit implements, probed once at registration.
 */

import type { MiddlewareUnit } from './types.ts';

export const HOOKS = ['request', 'view', 'exception', 'templateResponse', 'response'] as const;

export type HookName = (typeof HOOKS)[number];

export const HOOK_METHODS = {
  request: 'processRequest',
  view: 'processView',
  exception: 'processException',
  templateResponse: 'processTemplateResponse',
  response: 'processResponse',
} as const satisfies Record<HookName, keyof MiddlewareUnit>;

export interface MiddlewareDescriptor {
  readonly name: string;
  /** Position in the registry */
  readonly index: number;
  /** Implemented hooks, in phase order */
  readonly hooks: readonly HookName[];
  implements(hook: HookName): boolean;
}

/**
 * Compute a unit's descriptor
 */
export function describeUnit(unit: MiddlewareUnit, name: string, index: number): MiddlewareDescriptor {
  const hooks = Object.freeze(HOOKS.filter((hook) => typeof unit[HOOK_METHODS[hook]] === 'function'));

  return Object.freeze({
    name: unit.name ?? name,
    index,
    hooks,
    implements: (hook: HookName) => hooks.includes(hook),
  });
}
