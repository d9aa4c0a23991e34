import { v } from "convex/values";
import type { TenantMapping } from "../lib/recordings/types";
import { query, requireServiceKey, type Doc } from "./model";

export function toTenantMapping(doc: Doc<"schemaMappings">): TenantMapping {
  return {
    id: doc._id,
    tenantId: doc.tenantId,
    entityName: doc.entityName,
    remoteEntityName: doc.remoteEntityName,
    fieldMappings: doc.fieldMappings,
    validationRules: doc.validationRules,
    detectionKeywords: doc.detectionKeywords,
    isActive: doc.isActive,
    description: doc.description,
  };
}

export const activeForTenant = query({
  args: { serviceKey: v.string(), tenantId: v.string() },
  handler: async (ctx, { serviceKey, tenantId }): Promise<TenantMapping[]> => {
    requireServiceKey(serviceKey);
    const docs = await ctx.db
      .query("schemaMappings")
      .withIndex("by_tenant_active", (q) => q.eq("tenantId", tenantId).eq("isActive", true))
      .collect();
    return docs
      .sort((a, b) => a.entityName.localeCompare(b.entityName))
      .map(toTenantMapping);
  },
});
