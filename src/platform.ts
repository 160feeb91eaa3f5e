import { readFileSync } from 'node:fs';
import type { Arch, HostPlatform, OS, PackageFamily } from './types.js';

const OS_TOKENS: Partial<Record<NodeJS.Platform, OS>> = {
  darwin: 'darwin',
  linux: 'linux',
  win32: 'windows',
  freebsd: 'freebsd',
  openbsd: 'openbsd',
  netbsd: 'netbsd',
  sunos: 'solaris',
  aix: 'aix',
};

const ARCH_TOKENS: Partial<Record<string, Arch>> = {
  x64: 'amd64',
  ia32: '386',
  arm64: 'arm64',
  arm: 'arm',
  ppc64: 'ppc64',
  s390x: 's390x',
  riscv64: 'riscv64',
};

/**
 * Distribution IDs (from os-release ID / ID_LIKE) and their package format
 */
const PACKAGE_FAMILIES: ReadonlyArray<[string, PackageFamily]> = [
  ['debian', 'deb'],
  ['ubuntu', 'deb'],
  ['rhel', 'rpm'],
  ['fedora', 'rpm'],
  ['centos', 'rpm'],
  ['suse', 'rpm'],
  ['opensuse', 'rpm'],
  ['alpine', 'apk'],
];

/**
 * Detect the current platform in release naming terms (e.g. linux/amd64).
 * Unknown platforms map to empty tokens.
 */
export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): HostPlatform {
  const os = OS_TOKENS[platform] ?? '';
  // Node reports little-endian POWER as ppc64
  const archToken = arch === 'ppc64' && os === 'linux' ? 'ppc64le' : ARCH_TOKENS[arch] ?? '';
  const info: HostPlatform = { os, arch: archToken };

  if (os === 'linux') {
    const packageFamily = detectPackageFamily();
    if (packageFamily !== undefined) {
      info.packageFamily = packageFamily;
    }
  }
  return info;
}

/**
 * Determine the native package format from the contents of /etc/os-release.
 */
export function packageFamilyFromOsRelease(contents: string): PackageFamily | undefined {
  const ids: string[] = [];
  for (const line of contents.split('\n')) {
    const match = /^(ID|ID_LIKE)=(.*)$/.exec(line.trim());
    if (match?.[2] !== undefined) {
      ids.push(...match[2].replace(/["']/g, '').toLowerCase().split(/\s+/));
    }
  }

  for (const id of ids) {
    const family = PACKAGE_FAMILIES.find(([name]) => name === id);
    if (family) {
      return family[1];
    }
  }
  return undefined;
}

export function detectPackageFamily(osReleasePath = '/etc/os-release'): PackageFamily | undefined {
  let contents: string;
  try {
    contents = readFileSync(osReleasePath, 'utf8');
  } catch {
    // Not every Linux system ships os-release; no family then
    return undefined;
  }
  return packageFamilyFromOsRelease(contents);
}

/**
 * Extensions of native system packages
 */
export const SYSTEM_PACKAGE_EXTENSIONS: readonly string[] = ['.deb', '.rpm', '.apk'];

export function isSystemPackage(filename: string): boolean {
  const lower = filename.toLowerCase();
  return SYSTEM_PACKAGE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}
