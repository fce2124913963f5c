/**
 * Subdomain labels that can never be assigned to a tenant.
 */
export const RESERVED_SUBDOMAINS: ReadonlySet<string> = new Set([
	"www",
	"api",
	"admin",
	"app",
	"mail",
	"ftp",
	"localhost",
]);

/** Lowercase alphanumeric runs joined by single hyphens, e.g. "acme" or "acme-west-2" */
export const SUBDOMAIN_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

export const SUBDOMAIN_MIN_LENGTH = 3;
export const SUBDOMAIN_MAX_LENGTH = 100;

/**
 * Subdomains are stored and looked up lowercased.
 */
export function normalizeSubdomain(subdomain: string): string {
	return subdomain.trim().toLowerCase();
}

export function isReservedSubdomain(subdomain: string): boolean {
	return RESERVED_SUBDOMAINS.has(normalizeSubdomain(subdomain));
}

/**
 * Name of the database that holds a tenant's data, e.g. "acme-west" -> "tenant_acme_west".
 * Hyphens are not valid in unquoted PostgreSQL identifiers.
 */
export function toDatabaseName(subdomain: string): string {
	return `tenant_${normalizeSubdomain(subdomain).replace(/-/g, "_")}`;
}
