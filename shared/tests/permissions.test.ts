import { describe, expect, test } from "@jest/globals";

import {
  effectivePermissions,
  hasPermission,
  isPermission,
  isStaff,
  permissionsFor,
} from "../permissions";

describe("permissions", () => {
  test("customer gets read and create on quotes only", () => {
    expect([...permissionsFor("customer")].sort()).toEqual(["products:read", "quotes:create", "quotes:read"]);
  });

  test("manager cannot delete quotes but admin can", () => {
    expect(hasPermission({ role: "manager", permissions: [] }, "quotes:delete")).toBe(false);
    expect(hasPermission({ role: "admin", permissions: [] }, "quotes:delete")).toBe(true);
  });

  test("company_admin alone holds company:manage", () => {
    expect(permissionsFor("company_admin").has("company:manage")).toBe(true);
    expect(permissionsFor("admin").has("company:manage")).toBe(false);
  });

  test("unknown role yields no permissions", () => {
    expect(permissionsFor("superuser").size).toBe(0);
  });

  test("custom overrides are unioned with the role table", () => {
    const granted = effectivePermissions({ role: "customer", permissions: ["analytics:read"] });
    expect(granted.has("analytics:read")).toBe(true);
    expect(granted.has("quotes:read")).toBe(true);
    expect(granted.size).toBe(4);
  });

  test("override strings outside the permission set are ignored", () => {
    const granted = effectivePermissions({ role: "customer", permissions: ["quotes:approve_all", "root"] });
    expect(granted.size).toBe(3);
    expect(isPermission("quotes:approve_all")).toBe(false);
  });

  test("staff means admin or manager", () => {
    expect(isStaff({ role: "admin" })).toBe(true);
    expect(isStaff({ role: "manager" })).toBe(true);
    expect(isStaff({ role: "sales_rep" })).toBe(false);
    expect(isStaff({ role: "company_admin" })).toBe(false);
  });
});
