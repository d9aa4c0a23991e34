import { v } from "convex/values";
import type { Tenant } from "../lib/recordings/types";
import { query, requireServiceKey } from "./model";

export const get = query({
  args: { serviceKey: v.string(), tenantId: v.string() },
  handler: async (ctx, { serviceKey, tenantId }): Promise<Tenant | null> => {
    requireServiceKey(serviceKey);
    const doc = await ctx.db
      .query("tenants")
      .withIndex("by_tenant_id", (q) => q.eq("tenantId", tenantId))
      .unique();
    if (!doc) return null;
    return {
      id: doc.tenantId,
      name: doc.name,
      isActive: doc.isActive,
      crm: {
        baseUrl: doc.crmBaseUrl,
        clientId: doc.crmClientId,
        clientSecret: doc.crmClientSecret,
        directoryTenantId: doc.crmDirectoryTenantId,
      },
    };
  },
});
