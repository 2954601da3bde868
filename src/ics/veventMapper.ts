import { DateTime, Duration } from 'luxon';
import { FeedParseError } from '../errors';
import { CalendarEvent } from '../sync/types';

/**
 * One content line of an iCalendar object, e.g.
 * DTSTART;TZID=Europe/Berlin:20250106T100000 -> { name: 'DTSTART', params: { TZID: 'Europe/Berlin' }, value: '20250106T100000' }
 */
export interface ContentLine {
  name: string;
  params: Record<string, string>;
  value: string;
}

/**
 * The top-level properties of one VEVENT (nested VALARMs are left out)
 */
export interface VEventBlock {
  properties: ContentLine[];
  line: number; // 1-based line of BEGIN:VEVENT after unfolding
}

interface ParsedDate {
  value: DateTime;
  allDay: boolean;
}

/**
 * Maps raw iCalendar text to CalendarEvents
 */
export class VEventMapper {
  /**
   * Unfold continuation lines (RFC 5545 §3.1) and split into logical lines
   */
  unfold(text: string): string[] {
    return text
      .replace(/^\uFEFF/, '')
      .replace(/\r?\n[ \t]/g, '')
      .split(/\r?\n/);
  }

  /**
   * Parse a content line into name, parameters and value.
   * The value starts at the first colon outside a quoted parameter value.
   */
  parseContentLine(line: string): ContentLine | null {
    let inQuotes = false;
    let colonIndex = -1;
    for (let i = 0; i < line.length; i++) {
      const ch = line[i];
      if (ch === '"') inQuotes = !inQuotes;
      if (ch === ':' && !inQuotes) {
        colonIndex = i;
        break;
      }
    }
    if (colonIndex <= 0) return null;

    const head = line.substring(0, colonIndex);
    const value = line.substring(colonIndex + 1);
    const [name, ...paramParts] = head.split(/;(?=(?:[^"]*"[^"]*")*[^"]*$)/);

    const params: Record<string, string> = {};
    for (const part of paramParts) {
      const eq = part.indexOf('=');
      if (eq <= 0) continue;
      params[part.substring(0, eq).toUpperCase()] = part.substring(eq + 1).replace(/^"|"$/g, '');
    }

    return { name: name.trim().toUpperCase(), params, value };
  }

  /**
   * Walk the unfolded lines and yield every VEVENT block.
   * An unterminated VEVENT is yielded as a FeedParseError and scanning resumes after it.
   */
  *blocks(lines: string[]): Generator<VEventBlock | FeedParseError> {
    let current: VEventBlock | null = null;
    let nested = 0;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line === '') continue;
      const upper = line.toUpperCase();

      if (upper === 'BEGIN:VEVENT') {
        if (current) {
          yield this.unterminated(current);
        }
        current = { properties: [], line: i + 1 };
        nested = 0;
        continue;
      }

      if (!current) continue;

      if (upper === 'END:VEVENT' && nested === 0) {
        yield current;
        current = null;
        continue;
      }

      if (upper === 'END:VCALENDAR') {
        yield this.unterminated(current);
        current = null;
        continue;
      }

      if (upper.startsWith('BEGIN:')) {
        nested++;
        continue;
      }
      if (upper.startsWith('END:')) {
        nested = Math.max(0, nested - 1);
        continue;
      }
      if (nested > 0) continue;

      const parsed = this.parseContentLine(line);
      if (parsed) {
        current.properties.push(parsed);
      }
    }

    if (current) {
      yield this.unterminated(current);
    }
  }

  /**
   * Convert a VEVENT block to a CalendarEvent.
   * @throws FeedParseError when UID or DTSTART is missing, or a date cannot be read
   */
  toCalendarEvent(block: VEventBlock, staticTags: string[]): CalendarEvent {
    const uid = this.extractProperty(block, 'UID')?.value.trim() ?? '';
    if (!uid) {
      throw new FeedParseError(`VEVENT at line ${block.line} has no UID`);
    }

    const dtstart = this.extractProperty(block, 'DTSTART');
    const start = dtstart ? this.parseDate(dtstart) : null;
    if (!start) {
      throw new FeedParseError(`Event ${uid}: missing or invalid DTSTART`, uid);
    }

    const end = this.extractEnd(block, uid, start);

    return {
      uid,
      title: this.extractText(block, 'SUMMARY') ?? 'Untitled event',
      start: start.value,
      end,
      allDay: start.allDay,
      location: this.extractText(block, 'LOCATION'),
      description: this.extractText(block, 'DESCRIPTION'),
      url: this.extractProperty(block, 'URL')?.value.trim() || null,
      recurrence: this.extractProperty(block, 'RRULE')?.value.trim() || null,
      staticTags: [...staticTags],
    };
  }

  /**
   * Whether the block overrides one occurrence of a recurring series
   */
  isRecurrenceOverride(block: VEventBlock): boolean {
    return this.extractProperty(block, 'RECURRENCE-ID') !== null;
  }

  /**
   * Extract UID without validating the rest of the block
   */
  extractUID(block: VEventBlock): string | null {
    return this.extractProperty(block, 'UID')?.value.trim() || null;
  }

  /**
   * Parse a DATE or DATE-TIME value.
   * - YYYYMMDD (or VALUE=DATE): all-day, kept as a UTC date
   * - YYYYMMDDTHHMMSSZ: UTC
   * - YYYYMMDDTHHMMSS with TZID: local time in that zone
   * - YYYYMMDDTHHMMSS without TZID (floating): treated as UTC
   */
  parseDate(line: ContentLine): ParsedDate | null {
    const value = line.value.trim();

    if (line.params.VALUE === 'DATE' || /^\d{8}$/.test(value)) {
      const date = DateTime.fromFormat(value, 'yyyyMMdd', { zone: 'UTC' });
      return date.isValid ? { value: date, allDay: true } : null;
    }

    if (/^\d{8}T\d{6}Z$/.test(value)) {
      const date = DateTime.fromFormat(value, "yyyyMMdd'T'HHmmss'Z'", { zone: 'UTC' });
      return date.isValid ? { value: date, allDay: false } : null;
    }

    if (/^\d{8}T\d{6}$/.test(value)) {
      const zone = line.params.TZID?.replace(/^\//, '') ?? 'UTC';
      let date = DateTime.fromFormat(value, "yyyyMMdd'T'HHmmss", { zone });
      if (!date.isValid && date.invalidReason === 'unsupported zone') {
        // Non-IANA TZIDs (e.g. Windows zone names) fall back to floating time
        console.warn(`[Feed] Unknown TZID '${zone}', reading ${value} as UTC`);
        date = DateTime.fromFormat(value, "yyyyMMdd'T'HHmmss", { zone: 'UTC' });
      }
      return date.isValid ? { value: date, allDay: false } : null;
    }

    return null;
  }

  /**
   * Unescape special characters from iCalendar text
   */
  unescapeText(text: string): string {
    return text.replace(/\\([\\;,nN])/g, (_match, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch));
  }

  private extractEnd(block: VEventBlock, uid: string, start: ParsedDate): DateTime | null {
    const dtend = this.extractProperty(block, 'DTEND');
    if (dtend) {
      const end = this.parseDate(dtend);
      if (!end) {
        throw new FeedParseError(`Event ${uid}: invalid DTEND '${dtend.value}'`, uid);
      }
      return end.value;
    }

    const duration = this.extractProperty(block, 'DURATION');
    if (duration) {
      const parsed = Duration.fromISO(duration.value.trim());
      if (!parsed.isValid) {
        throw new FeedParseError(`Event ${uid}: invalid DURATION '${duration.value}'`, uid);
      }
      return start.value.plus(parsed);
    }

    return null;
  }

  private extractProperty(block: VEventBlock, name: string): ContentLine | null {
    return block.properties.find(p => p.name === name) ?? null;
  }

  /**
   * Extract a TEXT property, unescaped and trimmed; empty values count as absent
   */
  private extractText(block: VEventBlock, name: string): string | null {
    const property = this.extractProperty(block, name);
    if (!property) return null;
    const text = this.unescapeText(property.value).trim();
    return text === '' ? null : text;
  }

  private unterminated(block: VEventBlock): FeedParseError {
    const uid = this.extractUID(block);
    const label = uid ? `Event ${uid}` : `VEVENT at line ${block.line}`;
    return new FeedParseError(`${label} is not terminated by END:VEVENT`, uid);
  }
}
