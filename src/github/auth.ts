import { Octokit } from "@octokit/rest";
import { createAppAuth } from "@octokit/auth-app";
import type { Logger } from "pino";
import type { AppConfig } from "../config.ts";

/**
 * Build the Octokit client for the configured repository. A personal token
 * wins when present; otherwise authenticate as a GitHub App installation.
 * auth-app handles installation token caching and refresh internally.
 */
export function createOctokit(
  config: Pick<
    AppConfig,
    "githubToken" | "githubAppId" | "githubPrivateKey" | "githubInstallationId"
  >,
  logger: Logger,
): Octokit {
  if (config.githubToken) {
    logger.debug("Authenticating with personal access token");
    return new Octokit({ auth: config.githubToken });
  }

  if (config.githubAppId && config.githubPrivateKey && config.githubInstallationId) {
    logger.debug(
      { appId: config.githubAppId, installationId: config.githubInstallationId },
      "Authenticating as GitHub App installation",
    );
    return new Octokit({
      authStrategy: createAppAuth,
      auth: {
        appId: config.githubAppId,
        privateKey: config.githubPrivateKey,
        installationId: config.githubInstallationId,
      },
    });
  }

  throw new Error("No GitHub credentials configured");
}
