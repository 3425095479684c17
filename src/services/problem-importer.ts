import { parse } from "csv-parse/sync";
import { z } from "zod";
import { Problem, TrainerRepository } from "../types";
import * as fsUtils from "../utils/fs-utils";

const rowSchema = z.object({
  // Contest ids name a workspace directory
  contest: z
    .string()
    .min(1, "contest is required")
    .refine(
      (value) => !/[\\/]/.test(value) && value !== "." && value !== "..",
      "contest must be a plain name without path separators"
    ),
  title: z.string().min(1, "title is required"),
  body: z.string().default(""),
  id: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined))
    .pipe(z.coerce.number().int().positive().optional()),
});

export interface SkippedRow {
  row: number;
  reason: string;
}

export interface ImportResult {
  imported: Problem[];
  skipped: SkippedRow[];
}

/**
 * Parse problem rows from CSV text. The header names the columns
 * (contest, title, body and an optional id); header case and surrounding
 * spaces are ignored.
 */
export function parseProblemCsv(csvContent: string): {
  rows: Array<z.infer<typeof rowSchema>>;
  skipped: SkippedRow[];
} {
  const records: unknown[] = parse(csvContent, {
    columns: (header: string[]) =>
      header.map((col) => col.trim().toLowerCase()),
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });

  const rows: Array<z.infer<typeof rowSchema>> = [];
  const skipped: SkippedRow[] = [];

  records.forEach((record, index) => {
    const parsed = rowSchema.safeParse(record);
    if (parsed.success) {
      rows.push(parsed.data);
    } else {
      skipped.push({
        row: index + 1,
        reason: parsed.error.issues.map((issue) => issue.message).join(", "),
      });
    }
  });

  return { rows, skipped };
}

/**
 * Import problems from a CSV file into the repository
 */
export async function importProblems(
  csvPath: string,
  repository: TrainerRepository
): Promise<ImportResult> {
  const csvContent = await fsUtils.readFile(csvPath);
  const { rows, skipped } = parseProblemCsv(csvContent);

  const imported: Problem[] = [];
  for (const row of rows) {
    imported.push(
      await repository.saveProblem({
        id: row.id,
        contestId: row.contest,
        title: row.title,
        body: row.body,
      })
    );
  }

  for (const skip of skipped) {
    console.warn(`Skipping row ${skip.row}: ${skip.reason}`);
  }
  console.log(`Imported ${imported.length} problem(s) from ${csvPath}`);

  return { imported, skipped };
}
