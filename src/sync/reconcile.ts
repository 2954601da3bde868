import { renderBody } from '../discourse/bodyRenderer';
import { stripMarker, uidTag } from '../discourse/marker';
import { normalizeTag } from '../discourse/tags';
import { Action, CalendarEvent, ForumTopic } from './types';

export interface ReconcileOptions {
  category: number;
  staticTags: string[];
  defaultTags: string[];
  enableUidTag: boolean;
  siteTimezone: string;
}

/**
 * Compare two tag lists as sets: order and duplicates do not matter.
 */
export function tagsEqual(a: string[], b: string[]): boolean {
  const setA = new Set(a);
  const setB = new Set(b);
  return setA.size === setB.size && [...setA].every(tag => setB.has(tag));
}

/**
 * Compare two first-post bodies, ignoring the marker and surrounding whitespace.
 */
export function bodiesEqual(a: string, b: string): boolean {
  return stripMarker(a).trim() === stripMarker(b).trim();
}

/**
 * Tags the sync wants on every topic of this event, spelled as Discourse stores them
 */
export function desiredTags(event: CalendarEvent, options: ReconcileOptions): string[] {
  const configured = [...options.defaultTags, ...options.staticTags, ...event.staticTags].map(normalizeTag);
  const tags = new Set(configured.filter(tag => tag !== ''));
  if (options.enableUidTag) {
    tags.add(uidTag(event.uid));
  }
  return [...tags].sort();
}

/**
 * Union of the tags already on the topic and the desired ones.
 * Nothing already present is ever dropped: moderator tags survive every sync.
 */
export function mergeTags(existing: string[], desired: string[]): string[] {
  return [...new Set([...existing, ...desired])].sort();
}

/**
 * Pure reconciliation of one event against the topic found for its UID.
 *
 * - No topic: create one with the event title, configured category and desired tags.
 * - Topic found: rewrite the first post only if its content changed, and add any
 *   missing desired tags. Title and category are never touched after creation,
 *   even if a human renamed the topic or moved it to another category.
 * - Nothing to change: noop.
 */
export function reconcile(event: CalendarEvent, existing: ForumTopic | null, options: ReconcileOptions): Action {
  const body = renderBody(event, options.siteTimezone);
  const tags = desiredTags(event, options);

  if (existing === null) {
    return {
      type: 'create',
      category: options.category,
      title: event.title,
      body,
      tags,
    };
  }

  const bodyChanged = !bodiesEqual(existing.bodyContent, body);
  const merged = mergeTags(existing.tags, tags);
  const tagsChanged = !tagsEqual(merged, existing.tags);

  if (!bodyChanged && !tagsChanged) {
    return { type: 'noop', topicId: existing.id };
  }

  return {
    type: 'update',
    topicId: existing.id,
    firstPostId: existing.firstPostId,
    body: bodyChanged ? body : null,
    tags: tagsChanged ? merged : null,
  };
}
