import type { TenantDao } from "../dao/TenantDao";
import { type TenantRecord, toTenant } from "../model/Tenant";
import { CreateTenantSchema, UpdateTenantSchema } from "../schemas/TenantSchemas";
import type { TenantConnectionCache } from "../tenant/TenantConnectionCache";
import { getLog } from "../util/Logger";
import { getDriverErrorCode, withDatabaseName } from "../util/Sequelize";
import { randomUUID } from "node:crypto";
import { normalizeSubdomain, type Tenant, type TenantList, toDatabaseName } from "tenant-router-common";

const log = getLog(import.meta);

/** PostgreSQL unique_violation */
const UNIQUE_VIOLATION = "23505";
/** PostgreSQL duplicate_database */
const DUPLICATE_DATABASE = "42P04";

/**
 * Thrown when a tenant with the requested subdomain already exists.
 */
export class TenantConflictError extends Error {
	readonly status = 409;

	constructor(readonly subdomain: string, options?: ErrorOptions) {
		super(`Subdomain '${subdomain}' is already taken`, options);
		this.name = "TenantConflictError";
	}
}

/**
 * Administration of tenant records in the central database.
 * Inputs are validated with the tenant schemas; a failed validation throws a ZodError.
 */
export interface TenantService {
	/**
	 * Creates the tenant's database and then its record. When the record cannot be
	 * inserted the new database is dropped again.
	 */
	createTenant(input: unknown, adminUserId?: string): Promise<Tenant>;
	listTenants(skip?: number, limit?: number): Promise<TenantList>;
	getTenantById(id: string): Promise<Tenant | undefined>;
	getTenantBySubdomain(subdomain: string): Promise<Tenant | undefined>;
	/**
	 * Moving a tenant out of "active" closes its cached pool.
	 */
	updateTenant(id: string, input: unknown): Promise<Tenant | undefined>;
	/**
	 * Soft delete: the record and the database stay, the status becomes "suspended".
	 */
	suspendTenant(id: string): Promise<Tenant | undefined>;
}

export interface TenantServiceConfig {
	tenantDao: TenantDao;
	connectionCache: TenantConnectionCache;
	/** Tenant databases live on the same server as the central database */
	centralDatabaseUrl: string;
}

export function createTenantService(config: TenantServiceConfig): TenantService {
	const { tenantDao, connectionCache, centralDatabaseUrl } = config;

	return {
		createTenant,
		listTenants,
		getTenantById,
		getTenantBySubdomain,
		updateTenant,
		suspendTenant,
	};

	async function createTenant(input: unknown, adminUserId?: string): Promise<Tenant> {
		const { name, subdomain } = CreateTenantSchema.parse(input);

		if (await tenantDao.getTenantBySubdomain(subdomain)) {
			throw new TenantConflictError(subdomain);
		}

		const dbName = toDatabaseName(subdomain);
		try {
			await tenantDao.createDatabase(dbName);
		} catch (error) {
			if (getDriverErrorCode(error) === DUPLICATE_DATABASE) {
				throw new TenantConflictError(subdomain, { cause: error });
			}
			throw error;
		}
		log.info("Created database %s for tenant %s", dbName, subdomain);

		let record: TenantRecord;
		try {
			record = await tenantDao.createTenant({
				id: randomUUID(),
				name,
				subdomain,
				dbName,
				dbUrl: withDatabaseName(centralDatabaseUrl, dbName),
				status: "active",
				adminUserId: adminUserId ?? null,
				createdAt: new Date(),
			});
		} catch (error) {
			log.error(error, "Failed to insert tenant %s, dropping database %s", subdomain, dbName);
			await tenantDao.dropDatabase(dbName);
			if (getDriverErrorCode(error) === UNIQUE_VIOLATION) {
				throw new TenantConflictError(subdomain, { cause: error });
			}
			throw error;
		}

		log.info("Created tenant %s (%s)", subdomain, record.id);
		return toTenant(record);
	}

	async function listTenants(skip = 0, limit = 100): Promise<TenantList> {
		const { tenants, total } = await tenantDao.listTenants(skip, limit);
		return { tenants: tenants.map(toTenant), total };
	}

	async function getTenantById(id: string): Promise<Tenant | undefined> {
		const record = await tenantDao.getTenant(id);
		return record ? toTenant(record) : undefined;
	}

	async function getTenantBySubdomain(subdomain: string): Promise<Tenant | undefined> {
		const record = await tenantDao.getTenantBySubdomain(normalizeSubdomain(subdomain));
		return record ? toTenant(record) : undefined;
	}

	async function updateTenant(id: string, input: unknown): Promise<Tenant | undefined> {
		const update = UpdateTenantSchema.parse(input);
		const record = await tenantDao.updateTenant(id, update);
		if (!record) {
			return;
		}
		if (record.status !== "active") {
			log.info("Tenant %s is %s, closing its cached pool", record.subdomain, record.status);
			await connectionCache.evict(record.dbUrl);
		}
		return toTenant(record);
	}

	function suspendTenant(id: string): Promise<Tenant | undefined> {
		return updateTenant(id, { status: "suspended" });
	}
}
