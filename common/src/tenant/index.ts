export type { CurrentTenantInfo, Tenant, TenantList, TenantStatus, TenantUpdate } from "./Tenant";
export { TENANT_STATUSES } from "./Tenant";
export {
	isReservedSubdomain,
	normalizeSubdomain,
	RESERVED_SUBDOMAINS,
	SUBDOMAIN_MAX_LENGTH,
	SUBDOMAIN_MIN_LENGTH,
	SUBDOMAIN_PATTERN,
	toDatabaseName,
} from "./SubdomainUtils";
