import type { Logger } from "pino";
import type { FlagSet } from "../cli/flags.ts";
import type { GitHubClient } from "../github/client.ts";
import type { PullRequestObject } from "../github/types.ts";
import {
  DuplicateMungerError,
  EachLoopError,
  MungerInitializeError,
  MungerNotFoundError,
  RegistryLifecycleError,
} from "../lib/errors.ts";
import type { PRMunger } from "./types.ts";

export interface MungerRegistry {
  /** Make a munger available by name. Rejects duplicates; the first registration stays. */
  register(munger: PRMunger): void;
  /** Same as register, but a failure ends the process. */
  registerOrExit(munger: PRMunger): void;
  /** Every registered munger, independent of what was requested at runtime. */
  getAll(): PRMunger[];
  /** Mungers that were both registered and requested, in request order. */
  getActive(): readonly PRMunger[];
  /** Let every registered munger declare its flags. */
  addFlags(flags: FlagSet): void;
  /** Resolve the requested names, then initialize each in order. */
  activate(requestedNames: string[], client: GitHubClient): Promise<void>;
  /** Run the per-cycle hook of every active munger, stopping at the first failure. */
  runEachLoop(client: GitHubClient): Promise<void>;
  /** Hand an enriched pull request to every active munger, in order. */
  mungeAll(client: GitHubClient, obj: PullRequestObject): Promise<void>;
}

type RegistryPhase = "registering" | "activating" | "active";

export function createMungerRegistry(deps: {
  logger: Logger;
  exit?: (code: number) => never;
}): MungerRegistry {
  const { logger } = deps;
  const exit = deps.exit ?? ((code: number): never => process.exit(code));

  const mungerMap = new Map<string, PRMunger>();
  const active: PRMunger[] = [];
  let phase: RegistryPhase = "registering";

  function register(munger: PRMunger): void {
    if (phase !== "registering") {
      throw new RegistryLifecycleError(`cannot register munger ${munger.name} after activation has started`);
    }
    if (mungerMap.has(munger.name)) {
      throw new DuplicateMungerError(munger.name);
    }
    mungerMap.set(munger.name, munger);
    logger.info({ munger: munger.name }, "Registered munger");
  }

  return {
    register,

    registerOrExit(munger: PRMunger): void {
      try {
        register(munger);
      } catch (err) {
        logger.fatal({ err, munger: munger.name }, "Failed to register munger");
        exit(1);
      }
    },

    getAll(): PRMunger[] {
      return [...mungerMap.values()];
    },

    getActive(): readonly PRMunger[] {
      return active;
    },

    addFlags(flags: FlagSet): void {
      for (const munger of mungerMap.values()) {
        munger.addFlags(flags);
      }
    },

    async activate(requestedNames: string[], client: GitHubClient): Promise<void> {
      if (phase !== "registering") {
        throw new RegistryLifecycleError("mungers have already been activated");
      }
      phase = "activating";

      // Resolve everything first so an unknown name initializes nothing
      const resolved: PRMunger[] = [];
      const seen = new Set<string>();
      for (const name of requestedNames) {
        const munger = mungerMap.get(name);
        if (!munger) {
          throw new MungerNotFoundError(name);
        }
        if (seen.has(name)) {
          throw new DuplicateMungerError(name);
        }
        seen.add(name);
        resolved.push(munger);
      }

      for (const munger of resolved) {
        active.push(munger);
        try {
          await munger.initialize(client);
        } catch (err) {
          throw new MungerInitializeError(munger.name, err);
        }
      }

      phase = "active";
      logger.info({ mungers: active.map((m) => m.name) }, `Activated ${active.length} munger(s)`);
    },

    async runEachLoop(client: GitHubClient): Promise<void> {
      for (const munger of active) {
        try {
          await munger.eachLoop(client);
        } catch (err) {
          throw new EachLoopError(munger.name, err);
        }
      }
    },

    async mungeAll(client: GitHubClient, obj: PullRequestObject): Promise<void> {
      for (const munger of active) {
        try {
          await munger.mungePullRequest(client, obj);
        } catch (err) {
          logger.error(
            { err, munger: munger.name, issueNumber: obj.issue.number },
            "Munger failed on pull request, continuing with next munger",
          );
        }
      }
    },
  };
}
