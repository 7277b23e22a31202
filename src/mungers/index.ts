import type { Logger } from "pino";
import { createLgtmAfterCommitMunger } from "./lgtm-after-commit.ts";
import { createNeedsRebaseMunger } from "./needs-rebase.ts";
import type { MungerRegistry } from "./registry.ts";
import { createSizeMunger } from "./size.ts";

export { createMungerRegistry, type MungerRegistry } from "./registry.ts";
export { createItemProcessor, type ItemProcessor, type ProcessOutcome } from "./processor.ts";
export type { PRMunger } from "./types.ts";

/** Make every munger shipped with the project available by name. */
export function registerBuiltinMungers(registry: MungerRegistry, logger: Logger): void {
  registry.registerOrExit(createNeedsRebaseMunger({ logger }));
  registry.registerOrExit(createSizeMunger({ logger }));
  registry.registerOrExit(createLgtmAfterCommitMunger({ logger }));
}
