/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - Permission guard per role
 * - Students restricted to their own subject
 * - Unsecured mode headers
 */

import { describe, it, expect } from "vitest";
import type { LedgerEntry, Policy } from "@classbank/types";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { hasPermission } from "../../src/types/auth.js";
import { createTestApp, jsonRequest, readData, readError } from "../setup.js";
import type { TestApp } from "../setup.js";

const KEYS: readonly ApiKeyRecord[] = [
  { key: "teacher-key", role: "teacher", tenantId: "class-a", actorId: "ms-rivera" },
  { key: "student-key", role: "student", tenantId: "class-a", actorId: "student-1" },
  { key: "system-key", role: "system", tenantId: "class-a", actorId: "payroll-job" },
];

function withKey(key: string, path: string, method = "GET", body?: unknown): Request {
  return jsonRequest(path, method, body, { "X-Api-Key": key });
}

async function deposit(t: TestApp, subjectId: string, amount: string): Promise<LedgerEntry> {
  const res = await t.app.request(
    withKey("teacher-key", "/api/v1/ledger/entries", "POST", {
      subjectId,
      amount,
      bucket: "checking",
      kind: "deposit",
    }),
  );
  expect(res.status).toBe(201);
  return readData<LedgerEntry>(res);
}

// =============================================================================
// API keys
// =============================================================================

describe("API key auth", () => {
  it("returns 401 without a key", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const res = await t.app.request("/api/v1/policies");

    expect(res.status).toBe(401);
    expect(await readError(res)).toEqual({
      code: "UNAUTHORIZED",
      message: "Authentication required",
    });
  });

  it("returns 401 for an unknown key", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const res = await t.app.request(withKey("nope", "/api/v1/policies"));

    expect(res.status).toBe(401);
    expect((await readError(res)).message).toBe("Invalid API key");
  });

  it("attributes audit entries to the key's actor", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    await deposit(t, "student-1", "10.00");

    const [entry] = t.economy.auditLog.query();
    expect(entry?.tenantId).toBe("class-a");
    expect(entry?.actor).toBe("ms-rivera");
    expect(entry?.action).toBe("append");
    expect(entry?.detail).toBe("deposit 10.00");
  });
});

// =============================================================================
// Permissions
// =============================================================================

describe("permission guard", () => {
  it("maps roles to permissions", () => {
    expect(hasPermission("teacher", "review")).toBe(true);
    expect(hasPermission("system", "write")).toBe(true);
    expect(hasPermission("system", "file")).toBe(false);
    expect(hasPermission("student", "file")).toBe(true);
    expect(hasPermission("student", "write")).toBe(false);
  });

  it("returns 403 when a student defines a policy", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const res = await t.app.request(
      withKey("student-key", "/api/v1/policies", "POST", { title: "Free Money", premium: "0" }),
    );

    expect(res.status).toBe(403);
    expect(await readError(res)).toEqual({
      code: "FORBIDDEN",
      message: "Role 'student' lacks 'review' permission",
    });
    expect(t.store.rowCounts().policies).toBe(0);
  });

  it("lets the system role append ledger entries", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const res = await t.app.request(
      withKey("system-key", "/api/v1/ledger/entries", "POST", {
        subjectId: "student-1",
        amount: "25.00",
        bucket: "checking",
        kind: "payroll",
      }),
    );

    expect(res.status).toBe(201);
    const entry = await readData<LedgerEntry>(res);
    expect(entry.kind).toBe("payroll");
    expect(entry.amount).toBe("25.00");
  });

  it("refuses claim decisions from the system role", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const res = await t.app.request(
      withKey("system-key", "/api/v1/claims/c-1/decision", "POST", { outcome: "approve" }),
    );

    expect(res.status).toBe(403);
  });
});

// =============================================================================
// Student subject restriction
// =============================================================================

describe("student subject restriction", () => {
  it("lets a student read their own balance", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    await deposit(t, "student-1", "12.50");

    const res = await t.app.request(withKey("student-key", "/api/v1/ledger/balances/student-1"));

    expect(res.status).toBe(200);
    expect(await readData(res)).toEqual({
      subjectId: "student-1",
      bucket: "checking",
      availableOnly: false,
      balance: "12.50",
    });
  });

  it("refuses another student's balance", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const res = await t.app.request(withKey("student-key", "/api/v1/ledger/balances/student-2"));

    expect(res.status).toBe(403);
    expect((await readError(res)).message).toBe(
      "Student 'student-1' cannot act for subject 'student-2'",
    );
  });

  it("narrows entry listings to the student's own entries", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const own = await deposit(t, "student-1", "5.00");
    await deposit(t, "student-2", "7.00");

    const res = await t.app.request(withKey("student-key", "/api/v1/ledger/entries"));
    const entries = await readData<LedgerEntry[]>(res);
    expect(entries.map((e) => e.id)).toEqual([own.id]);

    const other = await t.app.request(
      withKey("student-key", "/api/v1/ledger/entries?subjectId=student-2"),
    );
    expect(other.status).toBe(403);
  });

  it("refuses enrolling another subject", async () => {
    const t = createTestApp({ apiKeys: KEYS });
    const defined = await t.app.request(
      withKey("teacher-key", "/api/v1/policies", "POST", { title: "Lunch Protection", premium: "5.00" }),
    );
    const policy = await readData<Policy>(defined);

    const res = await t.app.request(
      withKey("student-key", "/api/v1/enrollments", "POST", {
        subjectId: "student-2",
        policyId: policy.id,
      }),
    );

    expect(res.status).toBe(403);
    expect(t.store.rowCounts().enrollments).toBe(0);
  });
});

// =============================================================================
// Unsecured mode
// =============================================================================

describe("unsecured mode", () => {
  it("takes tenant and actor from headers", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      jsonRequest(
        "/api/v1/policies",
        "POST",
        { title: "Lunch Protection", premium: "5.00" },
        { "X-Tenant-Id": "class-b", "X-Actor-Id": "mr-okafor" },
      ),
    );

    expect(res.status).toBe(201);
    const policy = await readData<Policy>(res);
    expect(policy.tenantId).toBe("class-b");
    const [entry] = t.economy.auditLog.query();
    expect(entry?.actor).toBe("mr-okafor");
    expect(entry?.tenantId).toBe("class-b");
  });

  it("falls back to the default tenant and an anonymous actor", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      jsonRequest("/api/v1/policies", "POST", { title: "Lunch Protection", premium: "5.00" }),
    );

    const policy = await readData<Policy>(res);
    expect(policy.tenantId).toBe("class-a");
    const [entry] = t.economy.auditLog.query();
    expect(entry?.actor).toBe("anonymous");
  });
});
