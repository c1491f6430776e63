import { ConfigError } from "@weekreport/core";
import type { WeekreportOptions } from "./config.js";

export interface AuthLogger {
  error: (message: string) => void;
}

export interface LoginDetector {
  getAuthenticatedLogin: () => Promise<string>;
}

export type Env = Record<string, string | undefined>;

export interface TokenResolution {
  token?: string;
  source: "flag" | "env" | "none";
}

export interface UsernameResolution {
  username: string;
  source: "flag" | "env" | "token";
}

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/** Flag first, then $GITHUB_TOKEN; without either the run continues unauthenticated. */
export function resolveToken(options: WeekreportOptions, env: Env, logger: AuthLogger): TokenResolution {
  if (options.token) {
    logger.error("Using GitHub personal access token provided via -token flag.");
    return { token: options.token, source: "flag" };
  }

  const fromEnv = readEnv(env, "GITHUB_TOKEN");
  if (fromEnv) {
    logger.error("Using GitHub personal access token found in $GITHUB_TOKEN.");
    return { token: fromEnv, source: "env" };
  }

  logger.error(
    "$GITHUB_TOKEN or -token flag not set - GitHub may rate-limit these queries, " +
      "and private repository activity will not be reported."
  );
  return { source: "none" };
}

/**
 * Flag first, then $GITHUB_USERNAME, then the login behind the token.
 * `detector` is only consulted when a token is available.
 */
export async function resolveUsername(
  options: WeekreportOptions,
  env: Env,
  detector: LoginDetector | undefined,
  logger: AuthLogger
): Promise<UsernameResolution> {
  if (options.user) {
    logger.error(`User identified as ${options.user} via -user flag.`);
    return { username: options.user, source: "flag" };
  }

  const fromEnv = readEnv(env, "GITHUB_USERNAME");
  if (fromEnv) {
    logger.error(`User identified as ${fromEnv} via $GITHUB_USERNAME.`);
    return { username: fromEnv, source: "env" };
  }

  if (!detector) {
    throw new ConfigError(
      "MissingUser",
      "GitHub username not provided via -user flag or $GITHUB_USERNAME, and no access token is available to detect it."
    );
  }

  logger.error("User not specified via flag or environment variable, detecting it from the access token.");
  const login = await detector.getAuthenticatedLogin();
  logger.error(`User identified as ${login}.`);
  return { username: login, source: "token" };
}
