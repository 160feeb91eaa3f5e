import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import { isSupportedAlgorithm, supportedAlgorithms } from './hash.js';
import { parseRepositoryReference } from './repository-ref.js';
import type { BinaryManagerConfig, CLIOptions, RepositoryReference } from './types.js';

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Package version, read from package.json
 */
export const VERSION = readPackageVersion();

/**
 * Version line printed by -V: package version, Node version and host platform
 */
export function buildVersion(): string {
  return `relget ${VERSION} (node ${process.version}, ${process.platform}/${process.arch})`;
}

/**
 * Whether RELGET_DEBUG asks for verbose logging
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.RELGET_DEBUG?.trim().toLowerCase();
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

/**
 * Parse command line arguments and return CLI options
 */
export function parseArgs(argv: string[] = process.argv): CLIOptions {
  const program = new Command();

  program
    .name('relget')
    .description('Download the GitHub release asset built for this platform and verify its checksum')
    .version(buildVersion(), '-V, --version')
    .argument('<repository>', 'owner/repo, optionally followed by @version (defaults to latest)')
    .option('-b, --binName <name>', 'Name to save the binary as')
    .option('-p, --path <dir>', 'Directory to save the binary to (default: $XDG_BIN_HOME or ~/.local/bin)')
    .option('-s, --sha <algorithm>', `Checksum algorithm (one of: ${supportedAlgorithms().join(', ')})`)
    .option('-v, --verbose', 'Enable verbose logging', false)
    .parse(argv);

  const opts = program.opts<{ binName?: string; path?: string; sha?: string; verbose: boolean }>();

  return {
    repository: program.args[0] ?? '',
    binName: opts.binName,
    path: opts.path,
    sha: opts.sha,
    verbose: opts.verbose,
  };
}

/**
 * Validate CLI options and return the repository they name
 * @throws InvalidArgumentFormatError for a malformed repository argument
 * @throws Error for any other invalid option
 */
export function validateOptions(options: CLIOptions): RepositoryReference {
  const ref = parseRepositoryReference(options.repository);

  if (options.sha !== undefined && !isSupportedAlgorithm(options.sha)) {
    throw new Error(`Unsupported checksum algorithm: ${options.sha} (supported: ${supportedAlgorithms().join(', ')})`);
  }

  if (options.binName !== undefined) {
    if (options.binName.trim() === '') {
      throw new Error('Binary name must not be empty (--binName)');
    }
    if (/[\\/]/.test(options.binName)) {
      throw new Error(`Binary name must not contain a path separator: ${options.binName}`);
    }
  }

  return ref;
}

/**
 * Map CLI options onto binary manager configuration
 */
export function buildConfigOverrides(options: CLIOptions, cwd: string = process.cwd()): Partial<BinaryManagerConfig> {
  const overrides: Partial<BinaryManagerConfig> = { checksumDir: cwd };

  if (options.path) {
    overrides.binDir = options.path === '.' ? cwd : path.resolve(cwd, options.path);
  }
  if (options.binName) {
    overrides.binName = options.binName;
  }
  if (options.sha) {
    overrides.algorithmOverride = options.sha.toLowerCase();
  }

  return overrides;
}
