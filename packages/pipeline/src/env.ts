import "dotenv/config";
import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";
import { PipelineError } from "./util/errors";

export const WAREHOUSE_DIALECTS = ["postgresql", "bigquery"] as const;

export type WarehouseDialect = (typeof WAREHOUSE_DIALECTS)[number];

const booleanFlag = z
  .enum(["true", "false"])
  .default("true")
  .transform((value) => value === "true");

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const credentialsObject = z.record(z.unknown());

function decodeCredentials(text: string): Record<string, unknown> | undefined {
  try {
    const parsed = credentialsObject.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function credentialsVariable(name: string, encoding: "json" | "base64") {
  return optionalText.transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    const text =
      encoding === "base64"
        ? Buffer.from(value, "base64").toString("utf8")
        : value;
    const credentials = decodeCredentials(text);
    if (!credentials) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid ${name} value. Expected a valid JSON object.`,
      });
      return z.NEVER;
    }
    return credentials;
  });
}

function positiveIntegerVariable(name: string) {
  return optionalText.transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : 0;
    if (parsed <= 0 || !Number.isSafeInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${name} must be a positive integer when provided`,
      });
      return z.NEVER;
    }
    return parsed;
  });
}

interface EnvIssue {
  readonly path?: ReadonlyArray<PropertyKey | { readonly key: PropertyKey }>;
}

function formatIssuePath(issue: EnvIssue): string {
  return (issue.path ?? [])
    .map((segment) =>
      String(typeof segment === "object" ? segment.key : segment),
    )
    .join(".");
}

export function createPipelineEnv(
  runtimeEnv: Record<string, string | undefined> = process.env,
) {
  return createEnv({
    server: {
      WAREHOUSE_DIALECT: z.enum(WAREHOUSE_DIALECTS),
      WAREHOUSE_DATABASE_URL: z.string().optional(),
      WAREHOUSE_SCHEMA: optionalText,
      NODE_ENV: z
        .enum(["development", "production", "test"])
        .default("development"),
      TRIP_SOURCE_URI: z.string().optional(),
      LOAD_BATCH_SIZE: z.coerce.number().int().positive().default(500),
      WAREHOUSE_PARTITIONING: booleanFlag,
      BIGQUERY_PROJECT_ID: z.string().optional(),
      BIGQUERY_DATASET: z.string().optional(),
      BIGQUERY_LOCATION: z.string().optional(),
      BIGQUERY_CREDENTIALS_JSON: credentialsVariable(
        "BIGQUERY_CREDENTIALS_JSON",
        "json",
      ),
      BIGQUERY_CREDENTIALS_BASE64: credentialsVariable(
        "BIGQUERY_CREDENTIALS_BASE64",
        "base64",
      ),
      BIGQUERY_KEYFILE: optionalText,
      BIGQUERY_MAX_BYTES_BILLED: positiveIntegerVariable(
        "BIGQUERY_MAX_BYTES_BILLED",
      ),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: (issues) => {
      const summary = issues
        .map((issue) => `${formatIssuePath(issue)}: ${issue.message}`)
        .join("; ");
      throw new PipelineError(
        "configuration",
        "invalid_configuration",
        `Invalid environment variables: ${summary}`,
        { details: issues },
      );
    },
    createFinalSchema: (shape) => {
      const base = z.object(shape);
      const postgresSchema = base.extend({
        WAREHOUSE_DIALECT: z.literal("postgresql"),
        WAREHOUSE_DATABASE_URL: z.string(),
      });
      const bigQuerySchema = base.extend({
        WAREHOUSE_DIALECT: z.literal("bigquery"),
        BIGQUERY_PROJECT_ID: z.string(),
        BIGQUERY_DATASET: z.string(),
        BIGQUERY_LOCATION: z.string(),
      });

      return z
        .discriminatedUnion("WAREHOUSE_DIALECT", [
          bigQuerySchema,
          postgresSchema,
        ])
        .superRefine((value, ctx) => {
          if (
            value.WAREHOUSE_DIALECT === "bigquery" &&
            !value.BIGQUERY_CREDENTIALS_JSON &&
            !value.BIGQUERY_CREDENTIALS_BASE64 &&
            !value.BIGQUERY_KEYFILE
          ) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["BIGQUERY_CREDENTIALS_JSON"],
              message:
                "Provide BIGQUERY_CREDENTIALS_JSON, BIGQUERY_CREDENTIALS_BASE64 or BIGQUERY_KEYFILE",
            });
          }
        });
    },
  });
}

export type PipelineEnv = ReturnType<typeof createPipelineEnv>;

let cachedEnv: PipelineEnv | undefined;

/** Validated process environment, parsed on first use. */
export function getEnv(): PipelineEnv {
  cachedEnv ??= createPipelineEnv();
  return cachedEnv;
}
