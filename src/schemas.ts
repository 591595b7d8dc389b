import { z } from "zod";
import { ValidationError } from "./errors.js";

/** Parse `value` with `schema` or throw a ValidationError listing every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, context: string): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const issues = result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
  throw new ValidationError(`Invalid ${context}: ${issues.join("; ")}`, issues);
}

const emptyToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const intString = (min: number) => z.preprocess(emptyToUndefined, z.coerce.number().int().min(min));

const boolString = z
  .preprocess(
    (v) => (typeof v === "string" ? emptyToUndefined(v.toLowerCase()) : v),
    z.enum(["true", "false", "1", "0", "yes", "no"]),
  )
  .transform((v) => v === "true" || v === "1" || v === "yes");

/** Homebrew formula or cask name, optionally tap-qualified (`user/tap/name`). */
export const PackageNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9@._+-]*(\/[A-Za-z0-9][A-Za-z0-9@._+-]*){0,2}$/, "not a valid package name");

/** `true`/`cask` select a cask; `false`/`formula` or no variant select a formula. */
export const VariantSchema = z
  .preprocess(
    (v) => (v === undefined ? "formula" : typeof v === "string" ? v.trim().toLowerCase() : v),
    z.enum(["true", "cask", "false", "formula"]),
  )
  .transform((v) => (v === "true" || v === "cask" ? ("cask" as const) : ("formula" as const)));

export const REQUIRED_CONFIG_KEYS = ["REQUIRED_VERSION", "MAX_RETRIES", "RETRY_DELAY"] as const;

/** Settings as read from the config file and environment, all values still strings. */
export const ConfigFileSchema = z.object({
  REQUIRED_VERSION: z.string().trim().regex(/^\d+(\.\d+)*$/, "expected a version like 13.0"),
  MAX_RETRIES: intString(0),
  RETRY_DELAY: intString(0),
  MAX_PARALLEL_JOBS: intString(1).optional(),
  RETRY_JITTER: intString(0).optional(),
  BACKOFF: z.preprocess(emptyToUndefined, z.enum(["linear", "exponential", "constant"]).optional()),
  DRY_RUN: boolString.optional(),
  VERBOSE_MODE: boolString.optional(),
  LOG_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
  APPS_FILE: z.preprocess(emptyToUndefined, z.string().optional()),
});

export type ConfigFileValues = z.output<typeof ConfigFileSchema>;

export const CONFIG_KEYS = ConfigFileSchema.keyof().options;
