import * as crypto from 'crypto';

/**
 * Hidden marker embedded in a topic's first post so the topic can be found again.
 *
 * Format: <!-- ICSUID:<uid> --> with the uid percent-encoded, so the token has no
 * whitespace and the uid can never close the HTML comment early.
 * Older posts may carry a hashed token (ICSUID: + 16 hex chars); those are still
 * stripped before comparing bodies.
 */

const MARKER_PREFIX = 'ICSUID:';
const MARKER_PATTERN = /<!--\s*ICSUID:(\S+?)\s*-->/i;
const MARKER_STRIP_PATTERN = /<!--\s*ICSUID:\S+?\s*-->\s*/gi;

/** The searchable token, e.g. ICSUID:evt-1 */
export function buildMarker(uid: string): string {
  return `${MARKER_PREFIX}${encodeURIComponent(uid)}`;
}

/** The marker as it appears in the post */
export function markerComment(uid: string): string {
  return `<!-- ${buildMarker(uid)} -->`;
}

/**
 * Extract the event UID from a post's raw text.
 * @returns The decoded UID, or null when the post carries no readable marker
 */
export function extractUid(raw: string): string | null {
  const match = raw.match(MARKER_PATTERN);
  if (!match) return null;

  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
}

/** Remove every marker (current or legacy) and the whitespace after it */
export function stripMarker(raw: string): string {
  return raw.replace(MARKER_STRIP_PATTERN, '');
}

/**
 * Short, stable tag derived from the UID.
 * Discourse limits tag length, so the UID is hashed rather than used verbatim.
 */
export function uidTag(uid: string): string {
  const hash = crypto.createHash('sha1').update(uid, 'utf8').digest('hex');
  return `ics-${hash.substring(0, 10)}`;
}
