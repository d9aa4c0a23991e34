import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DynamicsApiError, DynamicsClient, parseEntityIdHeader } from "@/lib/crm/dynamics";
import { TENANT } from "../../helpers";

const mockFetch = vi.fn<typeof fetch>();

function tokenResponse(accessToken: string, expiresIn = 3600): Response {
  return Response.json({ access_token: accessToken, expires_in: expiresIn });
}

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.clearAllMocks();
});

describe("parseEntityIdHeader", () => {
  it("reads the id between the trailing parentheses", () => {
    expect(
      parseEntityIdHeader(
        "https://example.crm.dynamics.com/api/data/v9.2/biotrack_animals(0f8fad5b-d9cb-469f-a165-70867728950e)",
      ),
    ).toBe("0f8fad5b-d9cb-469f-a165-70867728950e");
  });

  it("returns undefined for a missing or malformed header", () => {
    expect(parseEntityIdHeader(null)).toBeUndefined();
    expect(parseEntityIdHeader("https://example.crm.dynamics.com/api/data")).toBeUndefined();
  });
});

describe("DynamicsClient.getAccessToken", () => {
  it("requests a client-credentials token scoped to the CRM", async () => {
    mockFetch.mockResolvedValueOnce(tokenResponse("token-1"));
    const client = new DynamicsClient({ ...TENANT.crm, baseUrl: "https://example.crm.dynamics.com/" });

    await expect(client.getAccessToken()).resolves.toBe("token-1");

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe("https://login.microsoftonline.com/test-directory/oauth2/v2.0/token");
    const body = init?.body;
    expect(body).toBeInstanceOf(URLSearchParams);
    if (!(body instanceof URLSearchParams)) return;
    expect(body.get("grant_type")).toBe("client_credentials");
    expect(body.get("client_id")).toBe("test-client-id");
    expect(body.get("client_secret")).toBe("test-secret");
    expect(body.get("scope")).toBe("https://example.crm.dynamics.com/.default");
  });

  it("reuses the cached token until five minutes before expiry", async () => {
    let now = 0;
    mockFetch
      .mockResolvedValueOnce(tokenResponse("token-1", 3600))
      .mockResolvedValueOnce(tokenResponse("token-2", 3600));
    const client = new DynamicsClient(TENANT.crm, () => now);

    await client.getAccessToken();
    now = 3600_000 - 5 * 60_000 - 1;
    await expect(client.getAccessToken()).resolves.toBe("token-1");

    now = 3600_000 - 5 * 60_000;
    await expect(client.getAccessToken()).resolves.toBe("token-2");
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("shares one request between concurrent callers", async () => {
    mockFetch.mockResolvedValueOnce(tokenResponse("token-1"));
    const client = new DynamicsClient(TENANT.crm);

    const tokens = await Promise.all([client.getAccessToken(), client.getAccessToken()]);

    expect(tokens).toEqual(["token-1", "token-1"]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("keeps the shared request alive when one caller gives up", async () => {
    let releaseToken: () => void = () => undefined;
    mockFetch.mockImplementationOnce(
      () =>
        new Promise<Response>((resolve) => {
          releaseToken = () => resolve(tokenResponse("token-1"));
        }),
    );
    mockFetch.mockResolvedValueOnce(Response.json({ id: "rec-b" }, { status: 201 }));
    const client = new DynamicsClient(TENANT.crm);
    const first = new AbortController();
    const second = new AbortController();

    const recordA = client.createRecord("biotrack_animals", {}, first.signal).catch((e: unknown) => e);
    const recordB = client.createRecord("biotrack_animals", {}, second.signal);
    first.abort();
    releaseToken();

    expect(await recordA).toMatchObject({ name: "AbortError" });
    await expect(recordB).resolves.toMatchObject({ id: "rec-b" });
    const [, tokenInit] = mockFetch.mock.calls[0] ?? [];
    expect(tokenInit?.signal).not.toBe(first.signal);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("throws DynamicsApiError when authentication is refused", async () => {
    mockFetch.mockResolvedValueOnce(new Response("invalid_client", { status: 401 }));
    const client = new DynamicsClient(TENANT.crm);

    const err = await client.getAccessToken().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DynamicsApiError);
    expect(err).toMatchObject({
      status: 401,
      operation: "authenticate",
      message: "Dynamics authenticate failed: 401 invalid_client",
    });
  });
});

describe("DynamicsClient.createRecord", () => {
  it("posts the record with OData headers and returns the body id", async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse("token-1"))
      .mockResolvedValueOnce(Response.json({ id: "rec-1", biotrack_name: "12345" }, { status: 201 }));
    const client = new DynamicsClient(TENANT.crm);

    const created = await client.createRecord("biotrack_animals", { biotrack_name: "12345" });

    expect(created).toEqual({ id: "rec-1", data: { id: "rec-1", biotrack_name: "12345" } });
    const [url, init] = mockFetch.mock.calls[1] ?? [];
    expect(url).toBe("https://example.crm.dynamics.com/api/data/v9.2/biotrack_animals");
    expect(init?.body).toBe(JSON.stringify({ biotrack_name: "12345" }));
    expect(init?.headers).toMatchObject({
      Authorization: "Bearer token-1",
      Prefer: "return=representation",
      "OData-Version": "4.0",
    });
  });

  it("falls back to the OData-EntityId header", async () => {
    mockFetch.mockResolvedValueOnce(tokenResponse("token-1")).mockResolvedValueOnce(
      new Response(null, {
        status: 204,
        headers: {
          "OData-EntityId": "https://example.crm.dynamics.com/api/data/v9.2/biotrack_animals(rec-2)",
        },
      }),
    );
    const client = new DynamicsClient(TENANT.crm);

    const created = await client.createRecord("biotrack_animals", {});

    expect(created.id).toBe("rec-2");
  });

  it("throws when no id can be found", async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse("token-1"))
      .mockResolvedValueOnce(new Response(null, { status: 204 }));
    const client = new DynamicsClient(TENANT.crm);

    await expect(client.createRecord("biotrack_animals", {})).rejects.toThrow(
      "Dynamics create failed: 204 response carried no record id",
    );
  });

  it("surfaces the CRM error body", async () => {
    mockFetch
      .mockResolvedValueOnce(tokenResponse("token-1"))
      .mockResolvedValueOnce(new Response("duplicate tag", { status: 412 }));
    const client = new DynamicsClient(TENANT.crm);

    await expect(client.createRecord("biotrack_animals", {})).rejects.toMatchObject({
      status: 412,
      operation: "create",
      message: "Dynamics create failed: 412 duplicate tag",
    });
  });
});
