export const TENANT_STATUSES = ["active", "paused", "suspended"] as const;

/** Status of a tenant. Tenants are created active; suspension is soft. */
export type TenantStatus = (typeof TENANT_STATUSES)[number];

/**
 * Tenant record stored in the central database, without its connection URL.
 * The backend keeps the URL on its own row type.
 */
export interface Tenant {
	id: string;
	name: string;
	subdomain: string;
	dbName: string;
	status: TenantStatus;
	adminUserId: string | null;
	createdAt: Date;
}

/** Fields an administrator may change after creation */
export interface TenantUpdate {
	name?: string;
	status?: TenantStatus;
}

/** A page of tenants together with the total count */
export interface TenantList {
	tenants: Array<Tenant>;
	total: number;
}

/** Public view of the tenant serving the current request */
export interface CurrentTenantInfo {
	subdomain: string;
	name: string;
}
