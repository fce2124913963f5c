import type { TenantRoute } from "./TenantDirectory";
import type { TenantSessionScope } from "./TenantSessionResolver";
import { AsyncLocalStorage } from "node:async_hooks";

/**
 * The tenant a request was resolved to. Stored in AsyncLocalStorage and available
 * throughout the request lifecycle.
 */
export interface TenantRequestContext {
	readonly subdomain: string;
	readonly tenant: TenantRoute;
	/** Opens sessions on the tenant database */
	readonly session: TenantSessionScope;
}

const tenantContextStorage = new AsyncLocalStorage<TenantRequestContext>();

/**
 * Get the current tenant context, if available.
 * Returns undefined if called outside of a tenant context.
 */
export function getTenantContext(): TenantRequestContext | undefined {
	return tenantContextStorage.getStore();
}

/**
 * Get the current tenant context, throwing if not available.
 * Use this in routes mounted behind the tenant middleware.
 */
export function requireTenantContext(): TenantRequestContext {
	const ctx = tenantContextStorage.getStore();
	if (!ctx) {
		throw new Error("Tenant context not initialized. This route must be mounted behind the tenant middleware.");
	}
	return ctx;
}

/**
 * Run a function within a tenant context.
 * The context will be available to all code executed within the function,
 * including async operations.
 */
export function runWithTenantContext<T>(context: TenantRequestContext, fn: () => T): T {
	return tenantContextStorage.run(context, fn);
}
