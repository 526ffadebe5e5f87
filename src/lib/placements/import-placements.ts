// lib/placements/import-placements.ts
import { z } from "zod";
import type { SourcingStore } from "../db/store";
import { placementRecordSchema, type PlacementRecord } from "../validations/extraction";

const cell = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value).trim() || null));

/**
 * Spreadsheet-export rows ("Name", "Job Title", "Position Id", ...) mapped
 * onto the record shape. Already camelCased records pass through unchanged.
 */
const spreadsheetRowSchema = z
  .object({
    Name: cell,
    Company: cell,
    "Job Title": cell,
    "Position Id": cell,
    "Placement Type": cell,
    "Date Posted": cell,
    "Placement Date": cell,
    "Start Date": cell,
  })
  .transform((row) => ({
    name: row.Name ?? "",
    company: row.Company ?? "",
    jobTitle: row["Job Title"] ?? "",
    positionId: row["Position Id"],
    placementType: row["Placement Type"],
    datePosted: row["Date Posted"],
    placementDate: row["Placement Date"],
    startDate: row["Start Date"],
  }));

export const placementInputSchema = z.union([placementRecordSchema, spreadsheetRowSchema.pipe(placementRecordSchema)]);

export interface ImportPlacementsResult {
  imported: number;
  rejected: number;
}

export function parsePlacementRecords(input: unknown[]): { records: PlacementRecord[]; rejected: number } {
  const records: PlacementRecord[] = [];
  let rejected = 0;

  input.forEach((row, index) => {
    const parsed = placementInputSchema.safeParse(row);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      rejected++;
      console.warn(`⚠️ Placement row ${index + 1} rejected: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
  });

  return { records, rejected };
}

export async function importPlacements(store: SourcingStore, input: unknown[]): Promise<ImportPlacementsResult> {
  const { records, rejected } = parsePlacementRecords(input);
  const imported = await store.insertPlacements(records);
  console.log(`📥 Imported ${imported} placements (${rejected} rejected)`);
  return { imported, rejected };
}
