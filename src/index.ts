#!/usr/bin/env node
/**
 * relget - fetch GitHub release binaries
 *
 * Picks the release asset built for this OS and architecture, downloads it,
 * checks it against the release's checksum manifest and saves it.
 */

import { BinaryManager, createDefaultConfig } from './binary-manager.js';
import { buildConfigOverrides, isDebugEnabled, parseArgs, validateOptions, VERSION } from './cli.js';
import { describeError } from './errors.js';
import { GitHubReleaseSource } from './github-client.js';
import { createLogger } from './logger.js';
import { detectPlatform } from './platform.js';
import { spinnerProgress } from './progress.js';

/**
 * Main entry point, resolving to the process exit code
 */
async function main(): Promise<number> {
  const options = parseArgs();
  const logger = createLogger({ verbose: options.verbose || isDebugEnabled() });

  try {
    const ref = validateOptions(options);

    const host = detectPlatform();
    logger.debug(`Platform: ${host.os}-${host.arch}${host.packageFamily ? ` (${host.packageFamily} packages)` : ''}`);

    const config = createDefaultConfig(buildConfigOverrides(options));
    const source = new GitHubReleaseSource({
      token: config.token,
      userAgent: `relget/${VERSION}`,
      logger,
    });
    const manager = new BinaryManager(config, { source, host, logger, progress: spinnerProgress });

    const controller = new AbortController();
    const onInterrupt = () => {
      logger.warn('Interrupted, cancelling download...');
      controller.abort();
    };
    process.once('SIGINT', onInterrupt);

    try {
      logger.debug(`Installing ${manager.describe(ref)}`);
      const installed = await manager.install(ref, controller.signal);
      logger.info(`Saved ${installed.name} (${installed.tagName}) to ${installed.path}`);
      if (installed.verification !== 'verified') {
        logger.debug(`Checksum verification: ${installed.verification}`);
      }
    } finally {
      process.off('SIGINT', onInterrupt);
    }
    return 0;
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[relget] Error: ${describeError(error)}`);
    process.exitCode = 1;
  }
);
