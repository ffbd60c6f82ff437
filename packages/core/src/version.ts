/**
 * Reliquary version constants.
 */

/** Full Reliquary version string (e.g., "0.3.0-beta") */
export const RELIQUARY_VERSION = '0.3.0';

/**
 * Extract major.minor.patch from a version string, stripping pre-release tags.
 *
 * "0.3.0-beta" → "0.3.0"
 * "1.0.0-alpha.1" → "1.0.0"
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
