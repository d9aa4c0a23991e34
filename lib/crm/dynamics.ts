import { log } from "../api/log";
import type { CrmCredentials, ExtractedFields } from "../recordings/types";

const API_VERSION = "v9.2";
/** Tokens are refreshed this long before the provider says they expire. */
const TOKEN_EXPIRY_MARGIN_MS = 5 * 60_000;
const DEFAULT_EXPIRES_IN_SECONDS = 3600;
const TOKEN_REQUEST_TIMEOUT_MS = 30_000;

export class DynamicsApiError extends Error {
  readonly status: number;
  readonly operation: "authenticate" | "create";

  constructor(params: { status: number; operation: "authenticate" | "create"; detail: string }) {
    super(`Dynamics ${params.operation} failed: ${params.status} ${params.detail}`);
    this.name = "DynamicsApiError";
    this.status = params.status;
    this.operation = params.operation;
  }
}

type TokenPayload = {
  access_token?: string;
  expires_in?: number;
};

type CachedToken = { value: string; expiresAt: number };

/** Record id from `OData-EntityId: https://org/api/data/v9.2/things(<id>)`. */
export function parseEntityIdHeader(header: string | null): string | undefined {
  if (!header) return undefined;
  const match = /\(([^()]+)\)\s*$/.exec(header);
  return match?.[1];
}

/** Settle with `promise`, or reject with the signal's reason once it aborts. */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
}

async function readErrorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  return text.slice(0, 300) || response.statusText;
}

/**
 * Dynamics 365 Web API client using the OAuth client-credentials grant.
 * One instance per CRM tenant; the access token is cached on the instance.
 */
export class DynamicsClient {
  private readonly baseUrl: string;
  private token: CachedToken | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(
    private readonly credentials: CrmCredentials,
    private readonly now: () => number = Date.now,
  ) {
    this.baseUrl = credentials.baseUrl.replace(/\/+$/, "");
  }

  /**
   * Concurrent callers share one token request. That request runs under its
   * own timeout; a caller's signal only abandons that caller's wait.
   */
  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.token && this.now() < this.token.expiresAt) return this.token.value;
    if (!this.pendingToken) {
      this.pendingToken = this.authenticate(AbortSignal.timeout(TOKEN_REQUEST_TIMEOUT_MS)).finally(
        () => {
          this.pendingToken = null;
        },
      );
    }
    return untilAborted(this.pendingToken, signal);
  }

  private async authenticate(signal: AbortSignal): Promise<string> {
    const url = `https://login.microsoftonline.com/${encodeURIComponent(
      this.credentials.directoryTenantId,
    )}/oauth2/v2.0/token`;

    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
        scope: `${this.baseUrl}/.default`,
        grant_type: "client_credentials",
      }),
      signal,
    });

    if (!response.ok) {
      throw new DynamicsApiError({
        status: response.status,
        operation: "authenticate",
        detail: await readErrorDetail(response),
      });
    }

    const payload = (await response.json()) as TokenPayload;
    if (!payload.access_token) {
      throw new DynamicsApiError({
        status: response.status,
        operation: "authenticate",
        detail: "token response had no access_token",
      });
    }

    const expiresIn = payload.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
    this.token = {
      value: payload.access_token,
      expiresAt: this.now() + expiresIn * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    log("info", "dynamics_authenticated", { baseUrl: this.baseUrl });
    return payload.access_token;
  }

  async createRecord(
    entitySetName: string,
    data: ExtractedFields,
    signal?: AbortSignal,
  ): Promise<{ id: string; data: Record<string, unknown> }> {
    const token = await this.getAccessToken(signal);
    const response = await fetch(`${this.baseUrl}/api/data/${API_VERSION}/${entitySetName}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${token}`,
        "Content-Type": "application/json",
        "OData-MaxVersion": "4.0",
        "OData-Version": "4.0",
        Accept: "application/json",
        Prefer: "return=representation",
      },
      body: JSON.stringify(data),
      signal,
    });

    if (!response.ok) {
      throw new DynamicsApiError({
        status: response.status,
        operation: "create",
        detail: await readErrorDetail(response),
      });
    }

    const body = (await response.json().catch(() => ({}))) as Record<string, unknown>;
    const id =
      typeof body.id === "string" && body.id
        ? body.id
        : parseEntityIdHeader(response.headers.get("OData-EntityId"));
    if (!id) {
      throw new DynamicsApiError({
        status: response.status,
        operation: "create",
        detail: "response carried no record id",
      });
    }

    log("info", "dynamics_record_created", { entitySetName, recordId: id });
    return { id, data: body };
  }
}
