/**
 * Error types for the munger lifecycle.
 *
 * Three families matter to callers:
 * - startup-fatal: registration, activation and initialization failures
 * - cycle-fatal: an `eachLoop` hook failed, the current cycle is abandoned
 * - per-item: enrichment failed, only that item is abandoned
 */

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class DuplicateMungerError extends Error {
  readonly mungerName: string;

  constructor(mungerName: string) {
    super(`a munger with that name (${mungerName}) already exists`);
    this.name = "DuplicateMungerError";
    this.mungerName = mungerName;
  }
}

export class MungerNotFoundError extends Error {
  readonly mungerName: string;

  constructor(mungerName: string) {
    super(`couldn't find a munger named: ${mungerName}`);
    this.name = "MungerNotFoundError";
    this.mungerName = mungerName;
  }
}

export class RegistryLifecycleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryLifecycleError";
  }
}

export class MungerInitializeError extends Error {
  readonly mungerName: string;

  constructor(mungerName: string, cause: unknown) {
    super(`munger ${mungerName} failed to initialize: ${errorMessage(cause)}`, { cause });
    this.name = "MungerInitializeError";
    this.mungerName = mungerName;
  }
}

export class EachLoopError extends Error {
  readonly mungerName: string;

  constructor(mungerName: string, cause: unknown) {
    super(`munger ${mungerName} failed its cycle hook: ${errorMessage(cause)}`, { cause });
    this.name = "EachLoopError";
    this.mungerName = mungerName;
  }
}

export type EnrichmentStage = "commits" | "events";

export class EnrichmentError extends Error {
  readonly stage: EnrichmentStage;
  readonly issueNumber: number;

  constructor(stage: EnrichmentStage, issueNumber: number, cause: unknown) {
    super(`failed to fetch ${stage} for #${issueNumber}: ${errorMessage(cause)}`, { cause });
    this.name = "EnrichmentError";
    this.stage = stage;
    this.issueNumber = issueNumber;
  }
}

export class FlagError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FlagError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  ${issue}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** True for errors that must end the process before the first cycle. */
export function isStartupFatal(err: unknown): boolean {
  return (
    err instanceof DuplicateMungerError ||
    err instanceof MungerNotFoundError ||
    err instanceof RegistryLifecycleError ||
    err instanceof MungerInitializeError ||
    err instanceof ConfigError ||
    err instanceof FlagError
  );
}
