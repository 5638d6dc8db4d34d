import { z } from "zod";
import { DateParseError } from "./errors";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default("silent"),
});

/** Process-level settings, read once at load. */
export const env = Object.freeze(
  EnvSchema.parse({
    LOG_LEVEL: normalizeLevel(process.env.DATESIFT_LOG_LEVEL),
  }),
);

function normalizeLevel(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const level = raw.trim().toLowerCase();
  return LogLevelSchema.safeParse(level).success ? level : undefined;
}

export const ResolverConfigSchema = z
  .object({
    dayfirst: z.boolean().default(false),
    yearfirst: z.boolean().default(false),
    fuzzy: z.boolean().default(false),
    fuzzyWithTokens: z.boolean().default(false),
    now: z.date().optional(),
  })
  .strict()
  .refine((c) => !c.fuzzyWithTokens || c.fuzzy, {
    message: "fuzzyWithTokens requires fuzzy",
    path: ["fuzzyWithTokens"],
  });

export type ResolverOptions = z.input<typeof ResolverConfigSchema>;

export interface ResolverConfig {
  readonly dayfirst: boolean;
  readonly yearfirst: boolean;
  readonly fuzzy: boolean;
  readonly fuzzyWithTokens: boolean;
  /** Reference instant for the two-digit-year window. */
  readonly now: Date;
}

export const IsoConfigSchema = z
  .object({
    sep: z.string().length(1, "separator must be exactly one character").default("T"),
  })
  .strict();

export type IsoOptions = z.input<typeof IsoConfigSchema>;

export interface IsoConfig {
  readonly sep: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function resolveConfig(options: ResolverOptions = {}): ResolverConfig {
  const parsed = ResolverConfigSchema.safeParse(options);
  if (!parsed.success) throw DateParseError.config(describeIssues(parsed.error));
  const { now, ...flags } = parsed.data;
  return Object.freeze({ ...flags, now: now ?? new Date() });
}

export function resolveIsoConfig(options: IsoOptions = {}): IsoConfig {
  const parsed = IsoConfigSchema.safeParse(options);
  if (!parsed.success) throw DateParseError.config(describeIssues(parsed.error));
  return Object.freeze({ ...parsed.data });
}
