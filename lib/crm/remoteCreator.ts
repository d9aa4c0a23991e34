import type { CallOptions, RemoteCreator } from "../recordings/ports";
import type { CrmCredentials, ExtractedFields } from "../recordings/types";
import type { TenantRepository } from "../repository/interfaces";
import { DynamicsClient } from "./dynamics";

export class TenantCredentialsMissingError extends Error {
  readonly tenantId: string;

  constructor(tenantId: string) {
    super(`No CRM credentials for tenant '${tenantId}'`);
    this.name = "TenantCredentialsMissingError";
    this.tenantId = tenantId;
  }
}

type ClientFactory = (credentials: CrmCredentials) => DynamicsClient;

/**
 * RemoteCreator backed by Dynamics 365. Keeps one client (and so one cached
 * token) per tenant; a credential change for a tenant replaces its client.
 */
export class DynamicsRemoteCreator implements RemoteCreator {
  private readonly clients = new Map<string, { key: string; client: DynamicsClient }>();

  constructor(
    private readonly tenants: TenantRepository,
    private readonly createClient: ClientFactory = (credentials) => new DynamicsClient(credentials),
  ) {}

  private async clientFor(tenantId: string): Promise<DynamicsClient> {
    const tenant = await this.tenants.findById(tenantId);
    if (!tenant) throw new TenantCredentialsMissingError(tenantId);

    const { baseUrl, clientId, clientSecret, directoryTenantId } = tenant.crm;
    if (!baseUrl || !clientId || !clientSecret || !directoryTenantId) {
      throw new TenantCredentialsMissingError(tenantId);
    }
    const key = [baseUrl, clientId, clientSecret, directoryTenantId].join("\n");
    const cached = this.clients.get(tenantId);
    if (cached && cached.key === key) return cached.client;

    const client = this.createClient(tenant.crm);
    this.clients.set(tenantId, { key, client });
    return client;
  }

  async create(
    params: { tenantId: string; entityName: string; fields: ExtractedFields } & CallOptions,
  ): Promise<{ remoteId: string }> {
    const client = await this.clientFor(params.tenantId);
    const created = await client.createRecord(params.entityName, params.fields, params.signal);
    return { remoteId: created.id };
  }
}
