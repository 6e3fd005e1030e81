import path from "path";
import { describe, it, expect, vi } from "vitest";
import { createClient } from "@supabase/supabase-js";
import { StoreError } from "../core/errors.js";
import type { EntityRow } from "./types.js";
import { SupabaseEntityStore, toEntity } from "./supabase-store.js";

// --- Test Fixtures ---

function createEntityRow(overrides: Partial<EntityRow> = {}): EntityRow {
  return {
    id: 7,
    name: "Catan",
    name_key: "catan",
    status: "created",
    description: null,
    metadata_json: null,
    created_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
    last_researched_at: null,
    ...overrides,
  };
}

/**
 * Real client whose PostgREST calls are answered in process
 */
function createMockSupabase(status: number, body: unknown) {
  const fetchMock = vi.fn(
    async (_input: RequestInfo | URL, _init?: RequestInit) =>
      new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
  );
  const client = createClient("http://localhost:54321", "test-secret", {
    auth: { autoRefreshToken: false, persistSession: false },
    global: { fetch: fetchMock },
  });
  return { client, fetchMock };
}

describe("toEntity", () => {
  it("derives the store directory from the id", () => {
    const entity = toEntity(createEntityRow({ id: 12 }), "/srv/scout");

    expect(entity.storeDir).toBe(path.join("/srv/scout", "entities", "12"));
    expect(entity.name).toBe("Catan");
    expect(entity.lastResearchedAt).toBeNull();
  });
});

describe("SupabaseEntityStore.createEntity", () => {
  it("creates the entity with a single insert", async () => {
    const { client, fetchMock } = createMockSupabase(201, createEntityRow());
    const store = new SupabaseEntityStore(client, "./data");

    const entity = await store.createEntity("  Catan ");

    expect(entity.id).toBe(7);
    expect(entity.storeDir).toBe(path.join("./data", "entities", "7"));
    expect(fetchMock).toHaveBeenCalledTimes(1);

    const init = fetchMock.mock.calls[0][1];
    expect(init?.method).toBe("POST");
    const inserted: unknown = JSON.parse(String(init?.body));
    expect(inserted).toEqual({
      name: "Catan",
      name_key: "catan",
      status: "created",
      created_at: expect.any(String),
      updated_at: expect.any(String),
    });
  });

  it("reports a duplicate name", async () => {
    const { client } = createMockSupabase(409, {
      code: "23505",
      message: "duplicate key value violates unique constraint",
      details: null,
      hint: null,
    });
    const store = new SupabaseEntityStore(client, "./data");

    const attempt = store.createEntity("Catan");

    await expect(attempt).rejects.toBeInstanceOf(StoreError);
    await expect(attempt).rejects.toThrow('Store createEntity failed: entity "Catan" already exists');
  });
});
