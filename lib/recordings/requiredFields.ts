import type { ExtractedFields } from "./types";
import { isBlank } from "./validation";

/**
 * Livestock registration checklist.
 *
 * Applied to every extraction before the tenant mapping is consulted: a record
 * the registry would reject is failed early with a prompt the farmer can act on.
 */

export const ANIMAL_CATEGORIES = ["Newborn Animal", "Mature Animal", "Purchase/Lease"] as const;
export const ANIMAL_SPECIES = ["Beef Cattle", "Sheep", "Goat", "Bison"] as const;
export const ANIMAL_SEXES = [
  "Bull",
  "Steer",
  "Cow",
  "Heifer",
  "Ram",
  "Wether",
  "Ewe",
  "Ewe Lamb",
] as const;

export type RequiredWhen =
  | { kind: "always" }
  | { kind: "never" }
  | { kind: "categoryIs"; category: string }
  | { kind: "fieldPresent"; field: string }
  /** Depends on identification choices the recording cannot express; informational. */
  | { kind: "manual"; condition: string };

export type ChecklistField = {
  name: string;
  description: string;
  requiredWhen: RequiredWhen;
  options?: readonly string[];
};

export type RequiredFieldChecklist = readonly ChecklistField[];

export type MissingField = {
  name: string;
  description: string;
};

const always: RequiredWhen = { kind: "always" };
const never: RequiredWhen = { kind: "never" };

export const LIVESTOCK_CHECKLIST: RequiredFieldChecklist = [
  {
    name: "category",
    description: "Animal category",
    requiredWhen: always,
    options: ANIMAL_CATEGORIES,
  },
  { name: "species", description: "Animal species", requiredWhen: always, options: ANIMAL_SPECIES },
  {
    name: "birth_date",
    description: "Animal's birth date (required, use best guess if unknown)",
    requiredWhen: always,
  },
  { name: "sex", description: "Animal's sex", requiredWhen: always, options: ANIMAL_SEXES },
  {
    name: "breed_composition",
    description: "Breed composition (must sum to 100%)",
    requiredWhen: always,
  },
  {
    name: "ear_tag",
    description: "Animal's ear tag (must be unique)",
    requiredWhen: { kind: "manual", condition: "Bio ID is the primary ID type" },
  },
  {
    name: "rfid",
    description: "Animal's RFID (15-20 digit number)",
    requiredWhen: { kind: "manual", condition: "RFID is the primary ID type" },
  },
  {
    name: "herd_letter",
    description: "Herd letter from account",
    requiredWhen: { kind: "manual", condition: "Bio ID without a one-time herd letter" },
  },
  {
    name: "one_time_herd_letter",
    description: "One-time herd letter for purchased animals",
    requiredWhen: { kind: "manual", condition: "Bio ID and animal not in ownership" },
  },
  {
    name: "birth_season",
    description: "Birth season (e.g., 2022 or January 2022)",
    requiredWhen: { kind: "categoryIs", category: "Newborn Animal" },
  },
  { name: "location", description: "Current location of the animal", requiredWhen: always },
  { name: "birth_weight", description: "Weight at birth", requiredWhen: never },
  {
    name: "birth_weight_uom",
    description: "Unit of measure for birth weight",
    requiredWhen: { kind: "fieldPresent", field: "birth_weight" },
    options: ["kg", "lbs"],
  },
  { name: "dam_id", description: "ID of the animal's dam (mother)", requiredWhen: never },
  { name: "sire_id", description: "ID of the animal's sire (father)", requiredWhen: never },
];

function isRequired(rule: RequiredWhen, fields: ExtractedFields): boolean {
  switch (rule.kind) {
    case "always":
      return true;
    case "categoryIs":
      return fields.category === rule.category;
    case "fieldPresent":
      return !isBlank(fields[rule.field]);
    case "never":
    case "manual":
      return false;
    default: {
      const _exhaustive: never = rule;
      return _exhaustive;
    }
  }
}

export function findMissingRequiredFields(
  fields: ExtractedFields,
  checklist: RequiredFieldChecklist = LIVESTOCK_CHECKLIST,
): MissingField[] {
  return checklist
    .filter((entry) => isRequired(entry.requiredWhen, fields) && isBlank(fields[entry.name]))
    .map((entry) => ({ name: entry.name, description: entry.description }));
}

export function formatMissingFieldsPrompt(missing: MissingField[]): string {
  if (missing.length === 0) return "";

  const lines = missing.map((field) => `- ${field.description}`);
  return [
    "The following required information is missing from your recording:",
    "",
    ...lines,
    "",
    "Please provide these details.",
  ].join("\n");
}
