import { readFile } from "node:fs/promises";
import { z } from "zod";
import { splitList, type FlagSet } from "./cli/flags.ts";
import { ConfigError, errorMessage } from "./lib/errors.ts";

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const BOOLEAN_STRINGS = new Map<string, boolean>([
  ["1", true],
  ["true", true],
  ["yes", true],
  ["on", true],
  ["0", false],
  ["false", false],
  ["no", false],
  ["off", false],
]);

// Unrecognised strings are left as-is so z.boolean() reports them
const booleanish = z.preprocess(
  (value) =>
    typeof value === "string" ? (BOOLEAN_STRINGS.get(value.trim().toLowerCase()) ?? value) : value,
  z.boolean({
    invalid_type_error: `expected one of ${[...BOOLEAN_STRINGS.keys()].join(", ")}`,
  }),
);

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const configSchema = z
  .object({
    org: z.string().min(1, "GITHUB_ORG or --organization is required"),
    project: z.string().min(1, "GITHUB_PROJECT or --project is required"),
    githubToken: optionalString,
    githubAppId: optionalString,
    githubPrivateKey: optionalString,
    githubInstallationId: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
    mungers: z.array(z.string().min(1)),
    dryRun: booleanish,
    once: booleanish,
    periodMs: z.coerce.number().int().positive(),
    mergeabilityDelayMs: z.coerce.number().int().nonnegative(),
    mergeabilityRetries: z.coerce.number().int().nonnegative(),
    concurrency: z.coerce.number().int().positive(),
    minPrNumber: z.coerce.number().int().nonnegative(),
    maxPrNumber: z.coerce.number().int().positive(),
    perPage: z.coerce.number().int().min(1).max(100),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
  })
  .superRefine((config, ctx) => {
    const hasApp = Boolean(
      config.githubAppId && config.githubPrivateKey && config.githubInstallationId,
    );
    if (!config.githubToken && !hasApp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["githubToken"],
        message:
          "GITHUB_TOKEN (or --token) is required unless GITHUB_APP_ID, GITHUB_PRIVATE_KEY and GITHUB_INSTALLATION_ID are all set",
      });
    }
    if (config.minPrNumber > config.maxPrNumber) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minPrNumber"],
        message: "must not be greater than maxPrNumber",
      });
    }
  });

export type AppConfig = z.infer<typeof configSchema>;

export const DEFAULT_PERIOD_MS = 30 * 60 * 1000;
export const DEFAULT_MERGEABILITY_DELAY_MS = 2000;

/** Reads flag values (falling back to the environment) into unvalidated config input. */
export type ConfigReader = (env: NodeJS.ProcessEnv) => Record<keyof AppConfig, unknown>;

/**
 * Declare the core flags on the shared flag set. A flag given on the command
 * line wins over its environment variable, which wins over the flag default.
 */
export function defineConfigFlags(flags: FlagSet): ConfigReader {
  const org = flags.string("organization", "", "GitHub organization or owner of the repository");
  const project = flags.string("project", "", "Repository name within the organization");
  const token = flags.string("token", "", "GitHub token (prefer GITHUB_TOKEN)");
  const mungers = flags.stringList("pr-mungers", [], "Comma-separated list of mungers to activate, in order");
  const dryRun = flags.bool("dry-run", true, "Log write operations instead of performing them");
  const once = flags.bool("once", false, "Run a single cycle and exit");
  const periodMs = flags.int("period-ms", DEFAULT_PERIOD_MS, "Pause between cycles in milliseconds");
  const mergeabilityDelayMs = flags.int(
    "mergeability-delay-ms",
    DEFAULT_MERGEABILITY_DELAY_MS,
    "Pause before re-checking unknown mergeability",
  );
  const mergeabilityRetries = flags.int("mergeability-retries", 1, "Re-checks of unknown mergeability per item");
  const concurrency = flags.int("concurrency", 1, "Items processed in parallel within a cycle");
  const minPrNumber = flags.int("min-pr-number", 0, "Ignore issues numbered below this");
  const maxPrNumber = flags.int("max-pr-number", Number.MAX_SAFE_INTEGER, "Ignore issues numbered above this");
  const perPage = flags.int("per-page", 100, "Page size for GitHub list calls (1-100)");
  const logLevel = flags.string("log-level", "info", "pino log level");

  // A blank environment entry counts as unset
  function pick<T>(name: string, getter: () => T, envValue: string | undefined): unknown {
    if (flags.isSet(name) || blankToUndefined(envValue) === undefined) return getter();
    return envValue;
  }

  return (env) => ({
    org: pick("organization", org, env.GITHUB_ORG),
    project: pick("project", project, env.GITHUB_PROJECT),
    githubToken: pick("token", token, env.GITHUB_TOKEN),
    githubAppId: env.GITHUB_APP_ID,
    githubPrivateKey: env.GITHUB_PRIVATE_KEY,
    githubInstallationId: env.GITHUB_INSTALLATION_ID,
    mungers:
      flags.isSet("pr-mungers") || env.PR_MUNGERS === undefined || env.PR_MUNGERS.trim() === ""
        ? mungers()
        : splitList(env.PR_MUNGERS),
    dryRun: pick("dry-run", dryRun, env.DRY_RUN),
    once: once(),
    periodMs: pick("period-ms", periodMs, env.PERIOD_MS),
    mergeabilityDelayMs: mergeabilityDelayMs(),
    mergeabilityRetries: mergeabilityRetries(),
    concurrency: concurrency(),
    minPrNumber: minPrNumber(),
    maxPrNumber: maxPrNumber(),
    perPage: perPage(),
    logLevel: pick("log-level", logLevel, env.LOG_LEVEL),
  });
}

/** Accepts an inline PEM string, a file path, or base64-encoded PEM. */
export async function loadPrivateKey(raw: string | undefined): Promise<string | undefined> {
  if (raw === undefined || raw.trim() === "") return undefined;

  if (raw.startsWith("-----BEGIN")) {
    return raw;
  }

  if (raw.startsWith("/") || raw.startsWith("./")) {
    try {
      return await readFile(raw, "utf8");
    } catch (err) {
      throw new ConfigError([`githubPrivateKey: failed to read private key from file "${raw}": ${errorMessage(err)}`]);
    }
  }

  const decoded = Buffer.from(raw, "base64").toString("utf8");
  if (!decoded.startsWith("-----BEGIN")) {
    throw new ConfigError([
      "githubPrivateKey: GITHUB_PRIVATE_KEY is not a valid PEM string, file path, or base64-encoded value",
    ]);
  }
  return decoded;
}

export async function loadConfig(
  read: ConfigReader,
  env: NodeJS.ProcessEnv = process.env,
): Promise<AppConfig> {
  const input = read(env);
  const privateKey = await loadPrivateKey(env.GITHUB_PRIVATE_KEY);

  const result = configSchema.safeParse({ ...input, githubPrivateKey: privateKey });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}
