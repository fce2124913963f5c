import type { ModelDef } from "../util/ModelDef";
import type { Tenant, TenantStatus } from "tenant-router-common";
import { DataTypes, type Sequelize } from "sequelize";

/**
 * A row of the central `tenants` table. Unlike the shared `Tenant` type it carries the
 * tenant's connection URL, which never leaves the backend.
 */
export interface TenantRecord {
	readonly id: string;
	readonly name: string;
	readonly subdomain: string;
	readonly dbName: string;
	readonly dbUrl: string;
	readonly status: TenantStatus;
	readonly adminUserId: string | null;
	readonly createdAt: Date;
}

export function defineTenants(sequelize: Sequelize): ModelDef<TenantRecord> {
	return sequelize.define("tenant", schema, { tableName: "tenants", timestamps: false, underscored: true });
}

/**
 * Strips the connection URL.
 */
export function toTenant(record: TenantRecord): Tenant {
	const { id, name, subdomain, dbName, status, adminUserId, createdAt } = record;
	return { id, name, subdomain, dbName, status, adminUserId, createdAt };
}

const schema = {
	id: {
		type: DataTypes.UUID,
		primaryKey: true,
	},
	name: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	subdomain: {
		type: DataTypes.STRING(100),
		allowNull: false,
		unique: true,
	},
	dbName: {
		type: DataTypes.STRING(100),
		allowNull: false,
		unique: true,
	},
	dbUrl: {
		type: DataTypes.STRING(500),
		allowNull: false,
	},
	status: {
		type: DataTypes.STRING(20),
		allowNull: false,
		defaultValue: "active",
	},
	adminUserId: {
		type: DataTypes.UUID,
		allowNull: true,
	},
	createdAt: {
		type: DataTypes.DATE,
		allowNull: false,
		defaultValue: DataTypes.NOW,
	},
};
