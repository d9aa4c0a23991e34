import type { TenantMapping } from "../recordings/types";

export const EXTRACTION_SYSTEM_PROMPT_HEADER = `You are an assistant for an agricultural data management system.
Your job is to extract structured data from voice transcriptions about farm animals and operations.`;

export function describeMappings(mappings: TenantMapping[]): string {
  return mappings
    .map((mapping) => {
      const fields = Object.keys(mapping.fieldMappings).join(", ");
      const keywords = mapping.detectionKeywords.length
        ? mapping.detectionKeywords.join(", ")
        : "N/A";
      const lines = [`Entity: ${mapping.entityName}`, `Fields: ${fields}`, `Keywords: ${keywords}`];
      if (mapping.description) lines.push(`Description: ${mapping.description}`);
      return lines.join("\n");
    })
    .join("\n\n");
}

export function buildExtractionSystemPrompt(mappings: TenantMapping[]): string {
  return `${EXTRACTION_SYSTEM_PROMPT_HEADER}

Available entity types and their fields:

${describeMappings(mappings)}

Your task:
1. Identify which entity type this transcription is about
2. Extract all relevant data fields
3. Return the data in JSON format
4. Provide a confidence score (HIGH, MEDIUM, LOW)

Rules:
- Only extract information that is explicitly mentioned
- Use null for missing fields
- Be precise with numbers, dates, and identifiers
- If the transcription doesn't match any entity type, return entity_type: "unknown"`;
}

export function buildExtractionUserPrompt(transcript: string, mappings: TenantMapping[]): string {
  const entityNames = [...mappings.map((mapping) => mapping.entityName), "unknown"].join("|");
  return `Transcription:
"${transcript}"

Extract the data and return ONLY a JSON object with this structure:
{
  "entity_type": "${entityNames}",
  "confidence": "HIGH|MEDIUM|LOW",
  "extracted_data": {
    "field_name": "value"
  },
  "notes": "any additional context or uncertainties"
}`;
}
