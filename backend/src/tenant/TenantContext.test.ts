import { getTenantContext, requireTenantContext, runWithTenantContext, type TenantRequestContext } from "./TenantContext";
import type { TenantSessionScope } from "./TenantSessionResolver";
import { describe, expect, it, vi } from "vitest";

function createContext(subdomain = "acme"): TenantRequestContext {
	const session: TenantSessionScope = { run: vi.fn() };
	return {
		subdomain,
		tenant: { connectionTarget: `postgres://localhost/tenant_${subdomain}`, name: subdomain },
		session,
	};
}

describe("TenantContext", () => {
	it("is undefined outside a tenant context", () => {
		expect(getTenantContext()).toBeUndefined();
	});

	it("throws from requireTenantContext outside a tenant context", () => {
		expect(() => requireTenantContext()).toThrow("Tenant context not initialized");
	});

	it("exposes the context inside runWithTenantContext", () => {
		const context = createContext();

		const result = runWithTenantContext(context, () => {
			expect(getTenantContext()).toBe(context);
			expect(requireTenantContext()).toBe(context);
			return "done";
		});

		expect(result).toBe("done");
		expect(getTenantContext()).toBeUndefined();
	});

	it("keeps the context across awaits", async () => {
		const context = createContext();

		const subdomain = await runWithTenantContext(context, async () => {
			await new Promise(resolve => setTimeout(resolve, 1));
			return getTenantContext()?.subdomain;
		});

		expect(subdomain).toBe("acme");
	});

	it("isolates concurrent contexts", async () => {
		const seen = await Promise.all(
			["acme", "globex"].map(subdomain =>
				runWithTenantContext(createContext(subdomain), async () => {
					await new Promise(resolve => setTimeout(resolve, 1));
					return requireTenantContext().subdomain;
				}),
			),
		);

		expect(seen).toEqual(["acme", "globex"]);
	});
});
