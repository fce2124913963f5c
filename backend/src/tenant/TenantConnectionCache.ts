/**
 * TenantConnectionCache - one connection pool per tenant database.
 *
 * Pools are cached by connection target and reused across requests:
 * - Concurrent first requests for the same target share a single pending construction,
 *   which is placed in the cache before anything is awaited
 * - A failed construction is dropped so the next request tries again
 * - LRU eviction removes the least-recently-used pool when the cache is full
 * - TTL eviction removes pools that have been idle longer than ttlMs
 *
 * Sessions hold a lease on their pool. An evicted pool that still has leases is removed
 * from the cache at once but closed only when its last lease is released.
 *
 * @module TenantConnectionCache
 */

import { getLog } from "../util/Logger";
import { describeConnectionTarget, formatConnectionError } from "../util/Sequelize";
import { ConnectionAcquisitionError } from "./TenantErrors";
import { createTenantSequelize, type TenantPoolOptions } from "./TenantSequelizeFactory";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

/**
 * A cached pool for one tenant database. The same handle is returned for a target until
 * the pool is evicted.
 */
export interface TenantConnectionHandle {
	readonly connectionTarget: string;
	readonly sequelize: Sequelize;
}

/**
 * A handle that is kept open until release() is called. release() is idempotent.
 */
export interface TenantConnectionLease {
	readonly handle: TenantConnectionHandle;
	release(): Promise<void>;
}

export interface TenantConnectionCache {
	/**
	 * Returns the cached handle for the target, building and verifying a pool on first use.
	 * @throws ConnectionAcquisitionError when the pool cannot be built or the database is unreachable
	 */
	getOrCreate(connectionTarget: string): Promise<TenantConnectionHandle>;

	/**
	 * Like getOrCreate, but the pool is not closed by eviction until the lease is released.
	 */
	acquire(connectionTarget: string): Promise<TenantConnectionLease>;

	/**
	 * Removes a pool from the cache and closes it once no lease holds it.
	 */
	evict(connectionTarget: string): Promise<void>;

	/**
	 * Removes idle pools that have not been used for longer than ttlMs.
	 */
	evictExpired(): Promise<void>;

	/**
	 * Closes every pool, leased or not, and clears the cache.
	 */
	closeAll(): Promise<void>;

	getCacheSize(): number;
}

export interface TenantConnectionCacheConfig {
	/** Maximum number of cached pools (default: 100) */
	maxConnections?: number | undefined;
	/** Idle time in milliseconds after which a pool expires (default: 30 minutes) */
	ttlMs?: number | undefined;
	/** Baseline connections per pool (default: 5) */
	poolSize?: number | undefined;
	/** Connections a pool may open beyond poolSize (default: 10) */
	poolOverflow?: number | undefined;
	/** Run a connectivity check before caching a new pool (default: true) */
	verifyOnCreate?: boolean | undefined;
	/** Whether to enable Sequelize logging (default: false) */
	logging?: boolean | undefined;
}

/**
 * Internal configuration that allows injecting dependencies for testing.
 */
export interface TenantConnectionCacheInternalConfig extends TenantConnectionCacheConfig {
	/** For testing - factory function to create Sequelize instances */
	createSequelizeFn?: (connectionTarget: string, options: TenantPoolOptions) => Sequelize;
}

interface PendingEntry {
	kind: "pending";
	ready: Promise<ReadyEntry>;
}

interface ReadyEntry {
	kind: "ready";
	handle: TenantConnectionHandle;
	lastUsed: number;
	activeLeases: number;
	/** Removed from the cache; closed when activeLeases reaches zero */
	retired: boolean;
	closed: boolean;
}

type CacheEntry = PendingEntry | ReadyEntry;

export function createTenantConnectionCache(config: TenantConnectionCacheInternalConfig = {}): TenantConnectionCache {
	const maxConnections = config.maxConnections ?? 100;
	const ttlMs = config.ttlMs ?? 30 * 60 * 1000;
	const poolOptions: TenantPoolOptions = {
		poolSize: config.poolSize ?? 5,
		poolOverflow: config.poolOverflow ?? 10,
		logging: config.logging ?? false,
	};
	const verifyOnCreate = config.verifyOnCreate ?? true;
	const createSequelize = config.createSequelizeFn ?? createTenantSequelize;

	const cache = new Map<string, CacheEntry>();
	// Evicted while leased, waiting for the last release
	const retiring = new Set<ReadyEntry>();

	function acquisitionError(error: unknown, connectionTarget: string): ConnectionAcquisitionError {
		const target = describeConnectionTarget(connectionTarget);
		const cause = formatConnectionError(error, connectionTarget);
		log.error(cause, "Unable to open tenant connection pool: %s", target);
		return new ConnectionAcquisitionError(target, { cause });
	}

	function openPool(connectionTarget: string): Sequelize {
		try {
			return createSequelize(connectionTarget, poolOptions);
		} catch (error) {
			throw acquisitionError(error, connectionTarget);
		}
	}

	async function construct(connectionTarget: string): Promise<ReadyEntry> {
		const sequelize = openPool(connectionTarget);
		if (verifyOnCreate) {
			try {
				await sequelize.authenticate();
			} catch (error) {
				await closeSequelize(describeConnectionTarget(connectionTarget), sequelize);
				throw acquisitionError(error, connectionTarget);
			}
		}

		log.info("Created tenant connection pool: %s", describeConnectionTarget(connectionTarget));
		return {
			kind: "ready",
			handle: { connectionTarget, sequelize },
			lastUsed: Date.now(),
			activeLeases: 0,
			retired: false,
			closed: false,
		};
	}

	function beginConstruction(connectionTarget: string): PendingEntry {
		let pending: PendingEntry | undefined;
		const ready = construct(connectionTarget).then(
			entry => {
				// Only replace our own placeholder; it is gone if the target was evicted meanwhile
				if (pending && cache.get(connectionTarget) === pending) {
					cache.set(connectionTarget, entry);
				}
				return entry;
			},
			(error: unknown) => {
				if (pending && cache.get(connectionTarget) === pending) {
					cache.delete(connectionTarget);
				}
				throw error;
			},
		);
		pending = { kind: "pending", ready };
		cache.set(connectionTarget, pending);
		return pending;
	}

	async function closeSequelize(target: string, sequelize: Sequelize): Promise<void> {
		try {
			await sequelize.close();
			log.debug("Closed tenant connection pool: %s", target);
		} catch (err) {
			log.warn(err, "Error closing tenant connection pool: %s", target);
		}
	}

	async function closeEntry(entry: ReadyEntry): Promise<void> {
		if (entry.closed) {
			return;
		}
		entry.closed = true;
		retiring.delete(entry);
		await closeSequelize(describeConnectionTarget(entry.handle.connectionTarget), entry.handle.sequelize);
	}

	/**
	 * The entry must already be out of the cache.
	 */
	async function retire(entry: ReadyEntry): Promise<void> {
		entry.retired = true;
		if (entry.activeLeases === 0) {
			await closeEntry(entry);
			return;
		}
		retiring.add(entry);
		log.info(
			"Deferring close of tenant connection pool %s until %d session(s) finish",
			describeConnectionTarget(entry.handle.connectionTarget),
			entry.activeLeases,
		);
	}

	async function evictLeastRecentlyUsed(): Promise<void> {
		if (cache.size <= maxConnections) {
			return;
		}

		let oldestKey: string | undefined;
		let oldest: ReadyEntry | undefined;
		for (const [key, entry] of cache.entries()) {
			if (entry.kind === "ready" && (!oldest || entry.lastUsed < oldest.lastUsed)) {
				oldestKey = key;
				oldest = entry;
			}
		}

		if (oldestKey !== undefined && oldest) {
			cache.delete(oldestKey);
			log.info("LRU eviction for tenant connection pool: %s", describeConnectionTarget(oldestKey));
			await retire(oldest);
		}
	}

	async function getEntry(connectionTarget: string): Promise<ReadyEntry> {
		const existing = cache.get(connectionTarget);

		if (existing?.kind === "ready") {
			existing.lastUsed = Date.now();
			log.debug("Cache hit for tenant connection pool: %s", describeConnectionTarget(connectionTarget));
			return existing;
		}

		if (existing?.kind === "pending") {
			log.debug("Waiting for tenant connection pool: %s", describeConnectionTarget(connectionTarget));
			const entry = await existing.ready;
			entry.lastUsed = Date.now();
			return entry;
		}

		log.info("Cache miss - creating tenant connection pool: %s", describeConnectionTarget(connectionTarget));
		const pending = beginConstruction(connectionTarget);
		await evictLeastRecentlyUsed();
		return await pending.ready;
	}

	async function getOrCreate(connectionTarget: string): Promise<TenantConnectionHandle> {
		const entry = await getEntry(connectionTarget);
		return entry.handle;
	}

	async function acquire(connectionTarget: string): Promise<TenantConnectionLease> {
		const entry = await getEntry(connectionTarget);
		if (entry.retired) {
			// Evicted between construction and now; a fresh pool is built on the next lookup
			return acquire(connectionTarget);
		}

		entry.activeLeases++;
		let released = false;
		return {
			handle: entry.handle,
			release: async () => {
				if (released) {
					return;
				}
				released = true;
				entry.activeLeases--;
				entry.lastUsed = Date.now();
				if (entry.retired && entry.activeLeases === 0) {
					await closeEntry(entry);
				}
			},
		};
	}

	async function evict(connectionTarget: string): Promise<void> {
		const existing = cache.get(connectionTarget);
		if (!existing) {
			return;
		}
		cache.delete(connectionTarget);
		const target = describeConnectionTarget(connectionTarget);

		if (existing.kind === "pending") {
			let entry: ReadyEntry;
			try {
				entry = await existing.ready;
			} catch (err) {
				log.debug(err, "Evicted tenant connection pool %s failed to open, nothing to close", target);
				return;
			}
			await retire(entry);
		} else {
			await retire(existing);
		}

		log.info("Evicted tenant connection pool: %s", target);
	}

	async function evictExpired(): Promise<void> {
		const now = Date.now();
		const expired: Array<[string, ReadyEntry]> = [];

		for (const [key, entry] of cache.entries()) {
			// Pending and leased pools are in use
			if (entry.kind === "ready" && entry.activeLeases === 0 && now - entry.lastUsed > ttlMs) {
				expired.push([key, entry]);
			}
		}

		if (expired.length === 0) {
			return;
		}

		log.info("Evicting %d expired tenant connection pools", expired.length);
		for (const [key, entry] of expired) {
			cache.delete(key);
			await retire(entry);
		}
	}

	async function closeAll(): Promise<void> {
		log.info("Closing all %d cached tenant connection pools", cache.size);

		const entries = [...cache.values()];
		cache.clear();

		const closing = entries.map(async entry => {
			if (entry.kind === "ready") {
				await closeEntry(entry);
				return;
			}
			try {
				await closeEntry(await entry.ready);
			} catch (err) {
				log.debug(err, "Pending tenant connection pool failed to open, nothing to close");
			}
		});
		for (const entry of retiring) {
			closing.push(closeEntry(entry));
		}

		await Promise.all(closing);
		log.info("All tenant connection pools closed");
	}

	function getCacheSize(): number {
		return cache.size;
	}

	return {
		getOrCreate,
		acquire,
		evict,
		evictExpired,
		closeAll,
		getCacheSize,
	};
}
