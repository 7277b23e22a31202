import { createFlagSet } from "./cli/flags.ts";
import { defineConfigFlags, loadConfig, type AppConfig } from "./config.ts";
import { createOctokit } from "./github/auth.ts";
import { createGitHubClient } from "./github/client.ts";
import { errorMessage, isStartupFatal } from "./lib/errors.ts";
import { createLogger } from "./lib/logger.ts";
import { fixedDelayPolicy } from "./lib/retry-policy.ts";
import { createPoller } from "./loop/poller.ts";
import { createItemProcessor, createMungerRegistry, registerBuiltinMungers } from "./mungers/index.ts";

// Registration happens before flags are parsed so every munger can declare its own.
// The configured level is applied to this same logger once config is loaded.
const logger = createLogger();
const flags = createFlagSet();
const registry = createMungerRegistry({ logger });
registerBuiltinMungers(registry, logger);
registry.addFlags(flags);
const readConfig = defineConfigFlags(flags);

let config: AppConfig;
try {
  const { help } = flags.parse(process.argv.slice(2));
  if (help) {
    console.log(flags.usage());
    process.exit(0);
  }
  config = await loadConfig(readConfig);
} catch (err) {
  // Fail fast on missing or invalid config
  console.error(`FATAL: ${errorMessage(err)}`);
  console.error(flags.usage());
  process.exit(1);
}

logger.level = config.logLevel;
const octokit = createOctokit(config, logger);
const client = createGitHubClient({
  octokit,
  org: config.org,
  project: config.project,
  logger,
  dryRun: config.dryRun,
  perPage: config.perPage,
  minPrNumber: config.minPrNumber,
  maxPrNumber: config.maxPrNumber,
});

if (config.mungers.length === 0) {
  logger.warn("No mungers requested (--pr-mungers), cycles will only resolve pull requests");
}

try {
  await registry.activate(config.mungers, client);
} catch (err) {
  logger.fatal({ err, startupFatal: isStartupFatal(err) }, "Failed to activate mungers");
  process.exit(1);
}

const processor = createItemProcessor({
  registry,
  logger,
  retryPolicy: fixedDelayPolicy(config.mergeabilityDelayMs, config.mergeabilityRetries),
});
const poller = createPoller({
  registry,
  processor,
  client,
  logger,
  concurrency: config.concurrency,
  periodMs: config.periodMs,
});

const shutdown = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "Shutdown signal received, stopping after current cycle");
    shutdown.abort();
  });
}

logger.info(
  { org: config.org, project: config.project, dryRun: config.dryRun, once: config.once },
  "pr-munger started",
);

try {
  await poller.run({ once: config.once, signal: shutdown.signal });
  process.exit(0);
} catch (err) {
  logger.fatal({ err }, "Polling loop crashed");
  process.exit(1);
}
