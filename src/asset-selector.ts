import type { PlatformMatcher } from './asset-matcher.js';
import { NoSuitableAssetError } from './errors.js';
import type { HashEngine } from './hash.js';
import { silentLogger, type Logger } from './logger.js';
import type { NamedAsset, PackageFamily, ReleaseAsset, SelectionResult } from './types.js';

export interface AssetSelectorOptions {
  hashEngine: HashEngine;
  matcher: PlatformMatcher;
  /** Host package format; assets carrying its extension take precedence */
  packageFamily?: PackageFamily;
  logger?: Logger;
}

function isNamedAsset(asset: ReleaseAsset): asset is NamedAsset {
  return asset.name !== undefined && asset.name !== '' && asset.id !== undefined;
}

/**
 * Choose the main asset and at most one checksum manifest from a release.
 *
 * Assets are scanned once, in order. The first checksum manifest wins. Among
 * platform matches, one carrying the host's package extension replaces one
 * that does not; otherwise the first match wins.
 *
 * @throws NoSuitableAssetError if no asset matches the platform
 */
export function selectAssets(
  assets: readonly ReleaseAsset[],
  options: AssetSelectorOptions
): SelectionResult {
  const { hashEngine, matcher, packageFamily } = options;
  const logger = options.logger ?? silentLogger;
  const hasPackageExtension = (name: string) =>
    packageFamily !== undefined && name.toLowerCase().endsWith(`.${packageFamily}`);

  let mainAsset: NamedAsset | undefined;
  let checksumAsset: NamedAsset | undefined;

  logger.debug(`Scanning ${assets.length} assets to find matching binary/archive and checksum file...`);

  for (const asset of assets) {
    if (!isNamedAsset(asset)) {
      logger.debug('Skipping asset with missing name or ID.');
      continue;
    }

    if (hashEngine.isChecksumManifestName(asset.name)) {
      if (checksumAsset === undefined) {
        logger.debug(`Found potential checksum file: ${asset.name}`);
        checksumAsset = asset;
      } else {
        logger.warn(`Found multiple checksum files. Using '${checksumAsset.name}', ignoring '${asset.name}'.`);
      }
      continue;
    }

    if (!matcher.matches(asset.name)) {
      continue;
    }

    if (mainAsset === undefined) {
      logger.debug(`Found potential main asset: ${asset.name}`);
      mainAsset = asset;
    } else if (!hasPackageExtension(mainAsset.name) && hasPackageExtension(asset.name)) {
      logger.debug(`Preferring native package '${asset.name}' over '${mainAsset.name}'`);
      mainAsset = asset;
    } else {
      logger.warn(`Found multiple matching assets. Using '${mainAsset.name}', ignoring '${asset.name}'.`);
    }
  }

  if (mainAsset === undefined) {
    logger.error('No asset matching OS/Arch found.');
    throw new NoSuitableAssetError();
  }

  return checksumAsset === undefined ? { mainAsset } : { mainAsset, checksumAsset };
}
