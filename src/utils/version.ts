import { readFileSync } from 'fs';
import { join } from 'path';

interface PackageJson {
  name: string;
  version: string;
}

let packageJson: PackageJson | undefined;

/**
 * Reads "package.json" from project root and returns its contents.
 */
export function getPackage(): PackageJson {
  if (!packageJson) {
    const raw: unknown = JSON.parse(
      readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8')
    );
    // Sanity check
    if (
      typeof raw !== 'object' ||
      raw === null ||
      !('name' in raw) ||
      !('version' in raw) ||
      typeof raw.name !== 'string' ||
      typeof raw.version !== 'string'
    ) {
      throw new Error('Invalid package.json: name or version is missing!');
    }
    packageJson = { name: raw.name, version: raw.version };
  }
  return packageJson;
}

/**
 * Reads the package's version from "package.json".
 */
export function getPackageVersion(): string {
  return getPackage().version;
}
