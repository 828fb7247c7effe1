import { InputError } from "../util/errors";
import { logger } from "../util/logger";
import { parseTripCsv, type ParsedTrips } from "./parseTrips";
import { readSource } from "./readSource";

export { parseTripCsv, type ParsedTrips } from "./parseTrips";
export { readSource, resolveSourceLocation } from "./readSource";

const MAX_LOGGED_REJECTIONS = 20;

export async function extractTrips(
  uri: string,
  read: (uri: string) => Promise<string> = readSource,
): Promise<ParsedTrips> {
  const text = await read(uri);
  const parsed = parseTripCsv(text);

  if (parsed.rejected.length > 0) {
    logger.warn(
      {
        rejected: parsed.rejected.length,
        sample: parsed.rejected.slice(0, MAX_LOGGED_REJECTIONS),
      },
      "Rejected malformed trip rows",
    );
  }

  if (parsed.records.length === 0) {
    throw new InputError(
      "no_valid_rows",
      `Trip source "${uri}" contains no valid rows`,
      { details: { rejected: parsed.rejected.length } },
    );
  }

  logger.info(
    { source: uri, rows: parsed.records.length },
    "Extracted trip records",
  );
  return parsed;
}
