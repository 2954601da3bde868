import { promises as fs } from 'fs';
import { FeedFetchError, FeedParseError, errorMessage } from '../errors';
import { HttpClient, HttpResponse } from '../http/httpClient';
import { CalendarEvent } from '../sync/types';
import { VEventMapper, VEventBlock } from './veventMapper';

export interface FeedReaderOptions {
  staticTags?: string[];
  /** Called for every malformed entry; the entry is skipped and parsing continues */
  onSkip?: (error: FeedParseError) => void;
}

/**
 * Reads an ICS feed from a URL or a local path and parses it into CalendarEvents.
 *
 * Only a failure to read the feed, or input that is not iCalendar data at all,
 * is fatal. A single bad VEVENT is reported through onSkip and left out.
 */
export class FeedReader {
  private httpClient: HttpClient;
  private mapper: VEventMapper;
  private staticTags: string[];
  private onSkip: (error: FeedParseError) => void;

  constructor(httpClient: HttpClient, options: FeedReaderOptions = {}, mapper?: VEventMapper) {
    this.httpClient = httpClient;
    this.mapper = mapper ?? new VEventMapper();
    this.staticTags = options.staticTags ?? [];
    this.onSkip = options.onSkip ?? ((error) => console.warn(`[Feed] Skipping entry: ${error.message}`));
  }

  /**
   * Fetch and parse in one go
   */
  async load(source: string): Promise<Iterable<CalendarEvent>> {
    const text = await this.read(source);
    return this.parse(text);
  }

  /**
   * Read the raw feed text. http(s) and webcal URLs are fetched, anything else is a file path.
   * @throws FeedFetchError on network, IO or HTTP status failure
   */
  async read(source: string): Promise<string> {
    const url = source.replace(/^webcal:\/\//i, 'https://');

    if (!/^https?:\/\//i.test(url)) {
      try {
        return await fs.readFile(source, 'utf-8');
      } catch (error: unknown) {
        throw new FeedFetchError(source, errorMessage(error), { cause: error });
      }
    }

    console.log(`[Feed] Fetching ${url}`);
    let response: HttpResponse;
    try {
      response = await this.httpClient.request({
        url,
        method: 'GET',
        headers: { 'Accept': 'text/calendar, */*;q=0.5' },
      });
    } catch (error: unknown) {
      throw new FeedFetchError(source, errorMessage(error), { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FeedFetchError(source, `HTTP ${response.status}`);
    }

    return response.text;
  }

  /**
   * Parse feed text into a lazy, restartable sequence of events.
   * Every iteration re-parses the same text and yields the same events.
   * @throws FeedParseError when the text has no VCALENDAR envelope
   */
  parse(text: string): Iterable<CalendarEvent> {
    const lines = this.mapper.unfold(text);
    this.assertCalendar(lines);

    return {
      [Symbol.iterator]: () => this.events(lines),
    };
  }

  private *events(lines: string[]): Generator<CalendarEvent> {
    for (const block of this.mapper.blocks(lines)) {
      if (block instanceof FeedParseError) {
        this.onSkip(block);
        continue;
      }

      if (this.mapper.isRecurrenceOverride(block)) {
        // The series master already stands for this UID
        console.log(`[Feed] Ignoring override of recurring event ${this.describe(block)}`);
        continue;
      }

      let event: CalendarEvent;
      try {
        event = this.mapper.toCalendarEvent(block, this.staticTags);
      } catch (error: unknown) {
        if (!(error instanceof FeedParseError)) throw error;
        this.onSkip(error);
        continue;
      }
      yield event;
    }
  }

  private assertCalendar(lines: string[]): void {
    const normalized = lines.map(line => line.trim().toUpperCase());
    const begin = normalized.indexOf('BEGIN:VCALENDAR');
    const end = normalized.lastIndexOf('END:VCALENDAR');

    if (begin === -1) {
      throw new FeedParseError('Feed is not iCalendar data: missing BEGIN:VCALENDAR');
    }
    if (end < begin) {
      throw new FeedParseError('Feed is not iCalendar data: missing END:VCALENDAR');
    }
  }

  private describe(block: VEventBlock): string {
    return this.mapper.extractUID(block) ?? `at line ${block.line}`;
  }
}
