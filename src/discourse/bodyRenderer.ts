import { DateTime } from 'luxon';
import * as Mustache from 'mustache';
import { RRule } from 'rrule';
import { CalendarEvent } from '../sync/types';
import { markerComment } from './marker';
import { EVENT_BODY_TEMPLATE } from './templates';

const EVENT_TIME_FORMAT = 'yyyy-MM-dd HH:mm';

/**
 * Render the first post for an event: marker line, then the [event] block.
 * The output is deterministic for a given event and timezone, which is what
 * lets reconciliation detect "no change" by comparing strings.
 */
export function renderBody(event: CalendarEvent, siteTimezone: string): string {
  const view = {
    marker: markerComment(event.uid),
    start: formatEventTime(event.start, event.allDay, siteTimezone),
    end: event.end ? formatEventTime(event.end, event.allDay, siteTimezone) : '',
    name: attributeValue(event.title),
    location: event.location ? attributeValue(event.location) : '',
    timezone: siteTimezone,
    details: renderDetails(event),
  };

  return Mustache.render(EVENT_BODY_TEMPLATE, view);
}

/**
 * Format a point in time as the [event] block expects it, in the site timezone.
 * All-day values are dates, not instants: they render as midnight of that date.
 */
export function formatEventTime(value: DateTime, allDay: boolean, siteTimezone: string): string {
  if (allDay) {
    return `${value.toFormat('yyyy-MM-dd')} 00:00`;
  }
  return value.setZone(siteTimezone).toFormat(EVENT_TIME_FORMAT);
}

/**
 * Human readable recurrence, e.g. "every week on Monday".
 * Returns null when the rule cannot be parsed.
 */
export function describeRecurrence(rrule: string): string | null {
  try {
    const rule = RRule.fromString(`RRULE:${rrule}`);
    return rule.toText();
  } catch {
    return null;
  }
}

function renderDetails(event: CalendarEvent): string {
  const lines: string[] = [];

  if (event.location) {
    lines.push(`**Location:** ${event.location}`);
  }
  if (event.url) {
    lines.push(`**Link:** ${event.url}`);
  }
  const repeats = event.recurrence ? describeRecurrence(event.recurrence) : null;
  if (repeats) {
    lines.push(`**Repeats:** ${repeats}`);
  }
  if (event.description) {
    lines.push('');
    lines.push(event.description);
  }

  return lines.join('\n');
}

// A double quote would end the BBCode attribute early
function attributeValue(text: string): string {
  return text.replace(/"/g, "'").replace(/\s*\n\s*/g, ' ');
}
