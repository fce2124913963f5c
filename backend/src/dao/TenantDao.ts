import { defineTenants, type TenantRecord } from "../model/Tenant";
import type { TenantUpdate } from "tenant-router-common";
import type { Sequelize } from "sequelize";

/**
 * Tenant records in the central database.
 */
export interface TenantDao {
	/**
	 * Creates the `tenants` table when it does not exist.
	 */
	sync(): Promise<void>;
	createTenant(tenant: TenantRecord): Promise<TenantRecord>;
	getTenant(id: string): Promise<TenantRecord | undefined>;
	getTenantBySubdomain(subdomain: string): Promise<TenantRecord | undefined>;
	/**
	 * Lists tenants ordered by creation time.
	 * @param skip number of records to skip.
	 * @param limit maximum number of records to return.
	 */
	listTenants(skip: number, limit: number): Promise<{ tenants: Array<TenantRecord>; total: number }>;
	/**
	 * Applies the given fields and returns the updated record, or undefined when no tenant has the id.
	 */
	updateTenant(id: string, update: TenantUpdate): Promise<TenantRecord | undefined>;
	/**
	 * Creates an empty PostgreSQL database. The name must be a valid identifier.
	 */
	createDatabase(dbName: string): Promise<void>;
	dropDatabase(dbName: string): Promise<void>;
}

export function createTenantDao(sequelize: Sequelize): TenantDao {
	const Tenants = defineTenants(sequelize);

	return {
		sync,
		createTenant,
		getTenant,
		getTenantBySubdomain,
		listTenants,
		updateTenant,
		createDatabase,
		dropDatabase,
	};

	async function sync(): Promise<void> {
		await Tenants.sync();
	}

	async function createTenant(tenant: TenantRecord): Promise<TenantRecord> {
		const created = await Tenants.create(tenant);
		return created.get({ plain: true });
	}

	async function getTenant(id: string): Promise<TenantRecord | undefined> {
		const tenant = await Tenants.findByPk(id);
		return tenant ? tenant.get({ plain: true }) : undefined;
	}

	async function getTenantBySubdomain(subdomain: string): Promise<TenantRecord | undefined> {
		const tenant = await Tenants.findOne({ where: { subdomain } });
		return tenant ? tenant.get({ plain: true }) : undefined;
	}

	async function listTenants(
		skip: number,
		limit: number,
	): Promise<{ tenants: Array<TenantRecord>; total: number }> {
		const { rows, count } = await Tenants.findAndCountAll({
			order: [["createdAt", "ASC"]],
			offset: skip,
			limit,
		});
		return { tenants: rows.map(row => row.get({ plain: true })), total: count };
	}

	async function updateTenant(id: string, update: TenantUpdate): Promise<TenantRecord | undefined> {
		const tenant = await Tenants.findByPk(id);
		if (!tenant) {
			return;
		}
		await tenant.update(update);
		return tenant.get({ plain: true });
	}

	async function createDatabase(dbName: string): Promise<void> {
		// CREATE DATABASE cannot run inside a transaction block, so no transaction is passed
		await sequelize.query(`CREATE DATABASE "${dbName}"`);
	}

	async function dropDatabase(dbName: string): Promise<void> {
		await sequelize.query(`DROP DATABASE IF EXISTS "${dbName}"`);
	}
}
