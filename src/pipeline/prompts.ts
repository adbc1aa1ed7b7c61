import type { DecisionTable } from '../types.js';

/**
 * Default prompt for turning a rate-sheet image into records.
 * Segment names are steered towards the labels the decision table uses.
 */
export const DEFAULT_EXTRACTION_PROMPT = `
  You are extracting insurance commission data from an image of a rate sheet.
  Return a JSON array. Each element has exactly these keys:
  segment, policy_type, location, payin, remark.

  Vehicle category:
  - 2W, MC, MCY, SC, Scooter, EV two wheeler -> two wheeler
  - PVT CAR, Car, 4W, PCI -> private car
  - CV, GVW, PCV, GCV, tonnage, 3W auto -> commercial vehicle
  - Bus -> bus, Taxi -> taxi
  - Tractor, Ambulance, Misd -> miscellaneous

  Policy type:
  - 1+1, Comp, Package, SAOD columns -> "Comp"
  - SATP, TP columns -> "TP"
  - When a row has values under both, emit one record per column.

  Fields:
  - location: cluster, region or agency name, "N/A" if absent
  - payin: the CD2 value (or the only commission value) as a number, 63.0 not "63.0%"
  - remark: any qualifier as a string (make, fuel, vehicle age, tonnage)
  - When one cell lists several rates (e.g. "Tata 30%; others 28%/26%"), emit one
    record per make, using the lowest rate for "others" and naming the make in remark.
  - When a table has sub-columns (e.g. SAOD > Petrol / Diesel), emit one record per
    sub-column value and name the sub-column in remark.

  Return ONLY the JSON array, no markdown.
`;

/**
 * Extraction prompt with the table's segment labels appended, so the model
 * can copy them verbatim.
 */
export function buildExtractionPrompt(table?: DecisionTable): string {
  if (!table) return DEFAULT_EXTRACTION_PROMPT;

  const labels = [...new Set(table.rules.map((rule) => rule.segmentPattern))];
  return `${DEFAULT_EXTRACTION_PROMPT}
  Use one of these segment labels whenever the row fits one:
  ${labels.map((label) => `- ${label}`).join('\n  ')}
`;
}
