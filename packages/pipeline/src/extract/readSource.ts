import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import axios from "axios";
import { InputError } from "../util/errors";
import { logger } from "../util/logger";

const SOURCE_FETCH_TIMEOUT_MS = 60_000;

export type SourceLocation =
  | { kind: "file"; path: string }
  | { kind: "http"; url: string };

/**
 * Resolves a source URI to something readable. `gs://bucket/object` maps to the
 * public storage.googleapis.com endpoint for that object.
 */
export function resolveSourceLocation(uri: string): SourceLocation {
  const trimmed = uri.trim();
  if (!trimmed) {
    throw new InputError("source_unreadable", "Source location is empty");
  }

  if (trimmed.startsWith("gs://")) {
    const objectPath = trimmed.slice("gs://".length);
    const slash = objectPath.indexOf("/");
    if (slash <= 0 || slash === objectPath.length - 1) {
      throw new InputError(
        "source_unreadable",
        `Invalid blob location "${trimmed}": expected gs://bucket/object`,
      );
    }
    const bucket = objectPath.slice(0, slash);
    const object = objectPath
      .slice(slash + 1)
      .split("/")
      .map(encodeURIComponent)
      .join("/");
    return {
      kind: "http",
      url: `https://storage.googleapis.com/${bucket}/${object}`,
    };
  }

  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    return { kind: "http", url: trimmed };
  }

  if (trimmed.startsWith("file://")) {
    return { kind: "file", path: fileURLToPath(trimmed) };
  }

  return { kind: "file", path: trimmed };
}

export async function readSource(uri: string): Promise<string> {
  const location = resolveSourceLocation(uri);

  try {
    if (location.kind === "file") {
      logger.debug({ path: location.path }, "Reading trip file");
      return await readFile(location.path, "utf-8");
    }

    logger.debug({ url: location.url }, "Downloading trip file");
    const response = await axios.get<string>(location.url, {
      responseType: "text",
      timeout: SOURCE_FETCH_TIMEOUT_MS,
    });
    return response.data;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(
      "source_unreadable",
      `Unable to read trip source "${uri}": ${reason}`,
      { cause: error },
    );
  }
}
