/**
 * Capability checks for the engine's entry points.
 *
 * The engine only asks whether a caller holds a capability; who grants it is
 * the host's business. RoleAccessPolicy is the in-process stand-in.
 */

import { AccessDeniedError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export const Capability = {
	/** Pair and group parameter changes */
	Manager: "manager",
	/** Trade open/close notifications */
	Callbacks: "callbacks",
} as const;

export type Capability = (typeof Capability)[keyof typeof Capability];

export interface AccessPolicy {
	hasCapability(caller: string, capability: Capability): boolean;
}

/** Fails with AccessDeniedError unless `caller` holds `capability`. */
export function requireCapability(
	policy: AccessPolicy,
	caller: string,
	capability: Capability,
): Result<void, AccessDeniedError> {
	if (policy.hasCapability(caller, capability)) return ok(undefined);
	return err(new AccessDeniedError(`Caller lacks ${capability} capability`, { caller, capability }));
}

/** Explicit caller → capability grants. */
export class RoleAccessPolicy implements AccessPolicy {
	private readonly grants = new Map<Capability, Set<string>>();

	constructor(initial: Partial<Record<Capability, readonly string[]>> = {}) {
		for (const capability of Object.values(Capability)) {
			this.grants.set(capability, new Set(initial[capability] ?? []));
		}
	}

	grant(caller: string, capability: Capability): void {
		this.grants.get(capability)?.add(caller);
	}

	revoke(caller: string, capability: Capability): void {
		this.grants.get(capability)?.delete(caller);
	}

	hasCapability(caller: string, capability: Capability): boolean {
		return this.grants.get(capability)?.has(caller) ?? false;
	}
}
