import animalMapping from "./fixtures/animalMapping.json";
import type { ExtractedFields, Tenant, TenantMapping } from "@/lib/recordings/types";

export const ANIMAL_MAPPING: TenantMapping = animalMapping;

export const TENANT: Tenant = {
  id: "tenant-1",
  name: "Demo Farm",
  isActive: true,
  crm: {
    baseUrl: "https://example.crm.dynamics.com",
    clientId: "test-client-id",
    clientSecret: "test-secret",
    directoryTenantId: "test-directory",
  },
};

export const HEIFER_TRANSCRIPT =
  "Add new heifer, ear tag 12345, born 2024-01-15, Hereford, at North Field";

/** Fields an extractor would return for HEIFER_TRANSCRIPT with every required field present. */
export const HEIFER_FIELDS: ExtractedFields = {
  category: "Mature Animal",
  species: "Beef Cattle",
  sex: "Heifer",
  ear_tag: "12345",
  birth_date: "2024-01-15",
  breed_composition: { Hereford: 100 },
  location: "North Field",
  birth_weight: null,
};

export const AUDIO_BYTES = new Uint8Array([1, 2, 3, 4]).buffer;
