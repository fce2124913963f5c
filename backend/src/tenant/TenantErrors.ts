/**
 * Failures of tenant resolution. Each carries a `kind` discriminant and the HTTP status the
 * request layer answers with.
 */
export type TenantResolutionErrorKind =
	| "MissingSubdomain"
	| "TenantNotFound"
	| "ConnectionAcquisitionFailure"
	| "SessionFailure";

export abstract class TenantResolutionError extends Error {
	abstract readonly kind: TenantResolutionErrorKind;
	abstract readonly status: number;
}

/**
 * The Host header carried no tenant label under the configured base domain.
 */
export class MissingSubdomainError extends TenantResolutionError {
	readonly kind = "MissingSubdomain";
	readonly status = 400;

	constructor(readonly baseDomain: string) {
		super(`No subdomain detected. Access the service through {tenant}.${baseDomain}`);
		this.name = "MissingSubdomainError";
	}
}

/**
 * No active tenant owns the subdomain. Unknown and inactive tenants are reported the same way.
 */
export class TenantNotFoundError extends TenantResolutionError {
	readonly kind = "TenantNotFound";
	readonly status = 404;

	constructor(readonly subdomain: string) {
		super(`Tenant '${subdomain}' not found or inactive`);
		this.name = "TenantNotFoundError";
	}
}

/**
 * A pool for the tenant database could not be built or its database is unreachable.
 * `target` is the connection target without credentials.
 */
export class ConnectionAcquisitionError extends TenantResolutionError {
	readonly kind = "ConnectionAcquisitionFailure";
	readonly status = 500;

	constructor(
		readonly target: string,
		options?: ErrorOptions,
	) {
		super(`Unable to connect to tenant database at ${target}`, options);
		this.name = "ConnectionAcquisitionError";
	}
}

/**
 * Work inside a tenant session failed and the session was rolled back. The original failure
 * is kept as `cause`.
 */
export class TenantSessionError extends TenantResolutionError {
	readonly kind = "SessionFailure";
	readonly status = 500;

	constructor(
		readonly subdomain: string,
		options?: ErrorOptions,
	) {
		super(`Tenant session for '${subdomain}' was rolled back`, options);
		this.name = "TenantSessionError";
	}
}

export type TenantError = MissingSubdomainError | TenantNotFoundError | ConnectionAcquisitionError | TenantSessionError;

export function isTenantError(error: unknown): error is TenantError {
	return error instanceof TenantResolutionError;
}

/**
 * Message sent to the client for a tenant error. Server-side failures answer with a fixed
 * message; their detail, such as the connection target, stays in the log.
 */
export function getPublicMessage(error: TenantError): string {
	switch (error.kind) {
		case "ConnectionAcquisitionFailure":
			return "Tenant database unavailable";
		case "SessionFailure":
			return "Tenant session was rolled back";
		default:
			return error.message;
	}
}
