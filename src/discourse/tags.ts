// Characters Discourse removes from tag names
const TAG_FILTER = /[\/?#[\]@!$&'()*+,;=.%\\`^\s|{}"<>]+/g;

/**
 * Normalize a tag name the way Discourse stores it (with force_lowercase_tags on, the default):
 * lowercased, whitespace runs turned into a dash, reserved characters dropped.
 * "Team Events" is stored as "team-events".
 */
export function normalizeTag(tag: string): string {
  return tag
    .toLowerCase()
    .trim()
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(TAG_FILTER, '');
}
