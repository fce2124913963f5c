import {
	isReservedSubdomain,
	normalizeSubdomain,
	SUBDOMAIN_MAX_LENGTH,
	SUBDOMAIN_MIN_LENGTH,
	SUBDOMAIN_PATTERN,
	TENANT_STATUSES,
} from "tenant-router-common";
import { z } from "zod";

/**
 * A tenant subdomain. Input is trimmed and lowercased before it is checked.
 */
export const SubdomainSchema = z
	.string()
	.transform(normalizeSubdomain)
	.pipe(
		z
			.string()
			.min(SUBDOMAIN_MIN_LENGTH, `Subdomain must be at least ${SUBDOMAIN_MIN_LENGTH} characters`)
			.max(SUBDOMAIN_MAX_LENGTH, `Subdomain must be at most ${SUBDOMAIN_MAX_LENGTH} characters`)
			.regex(
				SUBDOMAIN_PATTERN,
				"Subdomain may only contain lowercase letters, digits and single hyphens between them",
			)
			.refine(subdomain => !isReservedSubdomain(subdomain), {
				message: "Subdomain is reserved",
			}),
	);

const TenantStatusSchema = z.enum(TENANT_STATUSES, {
	errorMap: () => ({ message: `Status must be one of ${TENANT_STATUSES.join(", ")}` }),
});

export const TenantIdSchema = z.string().uuid("Tenant id must be a UUID");

export const CreateTenantSchema = z.object({
	name: z.string().min(1).max(255),
	subdomain: SubdomainSchema,
});

export const UpdateTenantSchema = z.object({
	name: z.string().min(1).max(255).optional(),
	status: TenantStatusSchema.optional(),
});

export const ListTenantsQuerySchema = z.object({
	skip: z.coerce.number().int().min(0).default(0),
	limit: z.coerce.number().int().min(1).max(1000).default(100),
});

/**
 * Joins the issues of a failed parse into a single message, e.g. "subdomain: Subdomain is reserved".
 */
export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}
