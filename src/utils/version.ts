import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Reads the package version from the package.json next to the build output,
 * falling back to the working directory when run from sources.
 */
function getPackageVersion(): string {
  const candidates = [join(__dirname, '..', '..', 'package.json'), join(process.cwd(), 'package.json')];

  for (const packagePath of candidates) {
    try {
      const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch {
      // try the next location
    }
  }

  return '0.1.0';
}

// Export as constant so it's only read once
export const PACKAGE_VERSION = getPackageVersion();
