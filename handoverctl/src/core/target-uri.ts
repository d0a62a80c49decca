import { IntakeValidationError } from "../errors.js";

/**
 * Database name carried in the path of a database URI.
 *
 * mysql://user@host:3306/homo_sapiens_core_99_38 → homo_sapiens_core_99_38
 * sqlite:///data/test.db → data/test.db (relative)
 * sqlite:////data/test.db → /data/test.db (absolute)
 */
export function databaseName(uri: string): string {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    throw new IntakeValidationError(`Not a database URI: ${uri}`);
  }
  return decodeURIComponent(url.pathname.replace(/^\//, ""));
}

/** Staging location concatenated with the source database name. */
export function deriveTargetUri(sourceUri: string, stagingUri: string): string {
  const name = databaseName(sourceUri);
  if (!name) {
    throw new IntakeValidationError(`No database name in ${sourceUri}`);
  }
  return `${stagingUri}${name}`;
}
