import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const { createClientMock } = vi.hoisted(() => ({
  createClientMock: vi.fn(() => ({ storage: {} })),
}));

vi.mock("@supabase/supabase-js", () => ({
  createClient: createClientMock,
}));

describe("getSupabase", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("fails only when first used without credentials", async () => {
    vi.stubEnv("SUPABASE_URL", "");
    vi.stubEnv("SUPABASE_SERVICE_ROLE_KEY", "");
    const { getSupabase } = await import("../supabaseClient.js");

    expect(() => getSupabase()).toThrow("Missing Supabase env vars");
    expect(createClientMock).not.toHaveBeenCalled();
  });

  it("creates one session-less client and reuses it", async () => {
    vi.stubEnv("SUPABASE_URL", "https://project.example.test");
    vi.stubEnv("SUPABASE_SERVICE_ROLE_KEY", "test-secret");
    const { getSupabase } = await import("../supabaseClient.js");

    const first = getSupabase();
    const second = getSupabase();

    expect(first).toBe(second);
    expect(createClientMock).toHaveBeenCalledTimes(1);
    expect(createClientMock).toHaveBeenCalledWith("https://project.example.test", "test-secret", {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  });
});
