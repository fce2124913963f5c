import { mockTenantRecord } from "../model/Tenant.mock";
import type { TenantDao } from "./TenantDao";
import { vi } from "vitest";

export function mockTenantDao(): TenantDao {
	return {
		sync: vi.fn().mockResolvedValue(undefined),
		createTenant: vi.fn().mockImplementation(record => Promise.resolve(record)),
		getTenant: vi.fn().mockResolvedValue(mockTenantRecord()),
		getTenantBySubdomain: vi.fn().mockResolvedValue(undefined),
		listTenants: vi.fn().mockResolvedValue({ tenants: [mockTenantRecord()], total: 1 }),
		updateTenant: vi.fn().mockResolvedValue(mockTenantRecord()),
		createDatabase: vi.fn().mockResolvedValue(undefined),
		dropDatabase: vi.fn().mockResolvedValue(undefined),
	};
}
