import { parse } from "csv-parse/sync";
import {
  RAW_TRIP_COLUMNS,
  rawTripRecordSchema,
  type RawTripRecord,
  type RejectedRow,
} from "@repo/types";
import { z, type ZodIssue } from "zod";
import { InputError } from "../util/errors";

export interface ParsedTrips {
  records: RawTripRecord[];
  rejected: RejectedRow[];
}

function describeIssue(issue: ZodIssue): string {
  const column = issue.path.join(".");
  return column ? `${column} ${issue.message}` : issue.message;
}

const csvRowsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  }),
);

type CsvRow = z.infer<typeof csvRowsSchema>[number];

function parseCsvRows(text: string): CsvRow[] {
  try {
    return csvRowsSchema.parse(
      parse(text, {
        bom: true,
        trim: true,
        info: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError("malformed_csv", `Trip file is not valid CSV: ${reason}`, {
      cause: error,
    });
  }
}

/**
 * Parses the raw trip CSV. Rows with a missing or malformed value are rejected
 * with their line number; structural problems with the file are fatal.
 */
export function parseTripCsv(text: string): ParsedTrips {
  const [headerRow, ...rows] = parseCsvRows(text);
  if (!headerRow) {
    throw new InputError("empty_source", "Trip file has no header row");
  }

  const header = headerRow.record;
  const missing = RAW_TRIP_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new InputError(
      "missing_columns",
      `Trip file is missing required columns: ${missing.join(", ")}`,
      { details: { missing } },
    );
  }

  const repeated = RAW_TRIP_COLUMNS.filter(
    (column) => header.indexOf(column) !== header.lastIndexOf(column),
  );
  if (repeated.length > 0) {
    throw new InputError(
      "malformed_csv",
      `Trip file repeats columns: ${repeated.join(", ")}`,
      { details: { repeated } },
    );
  }

  const records: RawTripRecord[] = [];
  const rejected: RejectedRow[] = [];

  for (const { record: cells, info } of rows) {
    const raw: Record<string, string> = {};
    header.forEach((column, position) => {
      const cell = cells[position];
      if (cell !== undefined) {
        raw[column] = cell;
      }
    });

    const parsed = rawTripRecordSchema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      rejected.push({
        line: info.lines,
        reason: parsed.error.issues.map(describeIssue).join("; "),
      });
    }
  }

  return { records, rejected };
}
