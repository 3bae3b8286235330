import { ValidationError } from "../types/errors.js";

const BUILD_URI_PATTERN = /^vstfs:\/\/\/Build\/Build\/(\d+)$/i;

/**
 * Extracts the numeric build id from a `vstfs:///Build/Build/<id>` URI
 * or a bare id.
 */
export function parseBuildId(buildUri: string): number {
  const trimmed = buildUri.trim();
  const match = BUILD_URI_PATTERN.exec(trimmed);
  const digits = match?.[1] ?? (/^\d+$/.test(trimmed) ? trimmed : undefined);
  if (digits === undefined) {
    throw new ValidationError(
      `Invalid build URI "${buildUri}". Expected vstfs:///Build/Build/<id> or a numeric build id`,
    );
  }
  return Number(digits);
}
