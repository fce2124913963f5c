import type { Request } from "express";

/**
 * Read the raw Host header, including any port.
 */
export function getHostHeader(req: Request): string | undefined {
	const host = req.headers.host;
	return host ? host : undefined;
}

/**
 * Extract the tenant subdomain (the leftmost label) from a Host header.
 *
 * The port is stripped and the host lowercased before matching. The host must end with the base domain, and it must
 * carry at least one label more than a bare base domain: two labels in total for "localhost",
 * three otherwise. Only the leftmost label is returned, so "a.b.example.com" yields "a".
 *
 * Examples:
 * - ("acme.example.com", "example.com") -> "acme"
 * - ("example.com", "example.com") -> undefined
 * - ("acme.localhost:8000", "localhost") -> "acme"
 * - ("localhost:8000", "localhost") -> undefined
 * - ("acme.other.com", "example.com") -> undefined
 */
export function extractSubdomain(hostHeader: string, baseDomain: string): string | undefined {
	// Host names are case-insensitive
	const host = hostHeader.split(":")[0].toLowerCase();
	const domain = baseDomain.toLowerCase();
	if (!host.endsWith(domain)) {
		return;
	}

	const labels = host.split(".");
	const minimumLabels = domain === "localhost" ? 2 : 3;
	if (labels.length < minimumLabels) {
		return;
	}

	return labels[0];
}
