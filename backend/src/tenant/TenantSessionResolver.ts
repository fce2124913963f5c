/**
 * Turns a Host header into a tenant session.
 *
 * A request moves through START -> SUBDOMAIN_EXTRACTED -> TENANT_LOOKED_UP ->
 * CONNECTION_ACQUIRED in resolve(), and through SESSION_OPEN -> COMMITTED | ROLLED_BACK ->
 * RELEASED in TenantSessionScope.run(). Failures before the session opens are returned as
 * values; failures inside the session are thrown as TenantSessionError.
 */

import { getLog } from "../util/Logger";
import { describeConnectionTarget } from "../util/Sequelize";
import { extractSubdomain } from "./DomainUtils";
import type { TenantConnectionCache, TenantConnectionLease } from "./TenantConnectionCache";
import type { TenantDirectory, TenantRoute } from "./TenantDirectory";
import {
	ConnectionAcquisitionError,
	MissingSubdomainError,
	TenantNotFoundError,
	TenantSessionError,
} from "./TenantErrors";
import type { Sequelize, Transaction } from "sequelize";

const log = getLog(import.meta);

/**
 * An open unit of work on the tenant database. Pass `transaction` to every query.
 */
export interface TenantSession {
	readonly subdomain: string;
	readonly sequelize: Sequelize;
	readonly transaction: Transaction;
}

export interface TenantSessionRunOptions {
	/** Aborting rolls the session back even if the work is still running */
	signal?: AbortSignal | undefined;
}

export interface TenantSessionScope {
	/**
	 * Opens a session, runs `work` in it and commits when it resolves. When it rejects, or the
	 * commit fails, or the signal aborts, the session is rolled back and a TenantSessionError
	 * carrying the original failure is thrown. The connection is always returned to the pool.
	 *
	 * @throws ConnectionAcquisitionError when no connection can be taken from the pool
	 */
	run<T>(work: (session: TenantSession) => Promise<T>, options?: TenantSessionRunOptions): Promise<T>;
}

export type TenantResolutionFailure = MissingSubdomainError | TenantNotFoundError | ConnectionAcquisitionError;

export type TenantResolution =
	| { ok: true; subdomain: string; tenant: TenantRoute; session: TenantSessionScope }
	| { ok: false; error: TenantResolutionFailure };

export interface TenantSessionResolver {
	/**
	 * Resolves the tenant a Host header addresses. Errors of the central database lookup
	 * are not caught.
	 */
	resolve(hostHeader: string | undefined): Promise<TenantResolution>;
}

export interface TenantSessionResolverConfig {
	/** Domain tenant subdomains live under, e.g. "example.com" or "localhost" */
	baseDomain: string;
	directory: TenantDirectory;
	connectionCache: TenantConnectionCache;
}

export function createTenantSessionResolver(config: TenantSessionResolverConfig): TenantSessionResolver {
	const { baseDomain, directory, connectionCache } = config;

	async function resolve(hostHeader: string | undefined): Promise<TenantResolution> {
		const subdomain = hostHeader ? extractSubdomain(hostHeader, baseDomain) : undefined;
		if (!subdomain) {
			log.debug("No subdomain in host header: %s", hostHeader);
			return { ok: false, error: new MissingSubdomainError(baseDomain) };
		}

		const tenant = await directory.lookup(subdomain);
		if (!tenant) {
			return { ok: false, error: new TenantNotFoundError(subdomain) };
		}

		try {
			await connectionCache.getOrCreate(tenant.connectionTarget);
		} catch (error) {
			if (error instanceof ConnectionAcquisitionError) {
				log.error(error, "Tenant database unavailable for subdomain: %s", subdomain);
				return { ok: false, error };
			}
			throw error;
		}

		log.debug("Resolved tenant %s", subdomain);
		return { ok: true, subdomain, tenant, session: createSessionScope(subdomain, tenant) };
	}

	function createSessionScope(subdomain: string, tenant: TenantRoute): TenantSessionScope {
		return {
			async run<T>(work: (session: TenantSession) => Promise<T>, options?: TenantSessionRunOptions): Promise<T> {
				const lease = await connectionCache.acquire(tenant.connectionTarget);
				try {
					return await runInTransaction(subdomain, lease, work, options?.signal);
				} finally {
					await lease.release();
				}
			},
		};
	}

	return {
		resolve,
	};
}

async function runInTransaction<T>(
	subdomain: string,
	lease: TenantConnectionLease,
	work: (session: TenantSession) => Promise<T>,
	signal: AbortSignal | undefined,
): Promise<T> {
	const { sequelize, connectionTarget } = lease.handle;

	let transaction: Transaction;
	try {
		transaction = await sequelize.transaction();
	} catch (error) {
		log.error(error, "Unable to open a session for tenant %s", subdomain);
		throw new ConnectionAcquisitionError(describeConnectionTarget(connectionTarget), { cause: error });
	}

	let result: T;
	try {
		result = await untilAborted(work({ subdomain, sequelize, transaction }), signal);
	} catch (error) {
		await rollback(subdomain, transaction);
		log.error(error, "Tenant session rolled back for %s", subdomain);
		throw new TenantSessionError(subdomain, { cause: error });
	}

	try {
		await transaction.commit();
	} catch (error) {
		// A failed commit has already ended the transaction and returned its connection
		log.error(error, "Commit failed for tenant %s", subdomain);
		throw new TenantSessionError(subdomain, { cause: error });
	}
	return result;
}

async function rollback(subdomain: string, transaction: Transaction): Promise<void> {
	try {
		await transaction.rollback();
	} catch (err) {
		log.error(err, "Rollback failed for tenant %s", subdomain);
	}
}

/**
 * Settles with `work`, or rejects with the abort reason as soon as the signal aborts.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
	if (!signal) {
		return work;
	}
	return new Promise<T>((resolve, reject) => {
		const onAbort = (): void => reject(signal.reason);
		if (signal.aborted) {
			onAbort();
		} else {
			signal.addEventListener("abort", onAbort, { once: true });
		}
		work.then(
			value => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}
