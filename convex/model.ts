/**
 * Typed function builders and document types derived from the schema.
 * Functions import from here so the deployed code carries the same types the
 * server-side helpers in lib/ expect.
 */
import {
  mutationGeneric,
  queryGeneric,
  type DataModelFromSchemaDefinition,
  type DocumentByName,
  type GenericMutationCtx,
  type GenericQueryCtx,
  type MutationBuilder,
  type QueryBuilder,
  type TableNamesInDataModel,
} from "convex/server";
import { ConvexError } from "convex/values";
import schema from "./schema";

export type DataModel = DataModelFromSchemaDefinition<typeof schema>;
export type TableName = TableNamesInDataModel<DataModel>;
export type Doc<T extends TableName> = DocumentByName<DataModel, T>;
export type QueryCtx = GenericQueryCtx<DataModel>;
export type MutationCtx = GenericMutationCtx<DataModel>;

export const query: QueryBuilder<DataModel, "public"> = queryGeneric;
export const mutation: MutationBuilder<DataModel, "public"> = mutationGeneric;

/** Pipeline functions are only callable by the worker holding the shared key. */
export function requireServiceKey(provided: string): void {
  const expected = process.env.PIPELINE_SERVICE_KEY;
  if (!expected || provided !== expected) {
    throw new ConvexError("Unauthorized");
  }
}
