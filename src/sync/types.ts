import { DateTime } from 'luxon';

export interface CalendarEvent {
  uid: string;
  title: string;
  start: DateTime;
  end: DateTime | null;
  allDay: boolean;              // start/end carry a calendar date only (VALUE=DATE)
  location: string | null;
  description: string | null;
  url: string | null;
  recurrence: string | null;    // RRULE value without the 'RRULE:' prefix
  staticTags: string[];
}

export interface ForumTopic {
  id: number;
  firstPostId: number;
  category: number;
  title: string;
  bodyMarkerUid: string | null;
  tags: string[];
  bodyContent: string;          // first post raw, marker removed
}

export interface CreateAction {
  type: 'create';
  category: number;
  title: string;
  body: string;
  tags: string[];
}

// No title or category here: both are owned by humans once the topic exists
export interface UpdateAction {
  type: 'update';
  topicId: number;
  firstPostId: number;
  body: string | null;          // null = leave the first post alone
  tags: string[] | null;        // null = tags already cover the desired set
}

export interface NoOpAction {
  type: 'noop';
  topicId: number;
}

export type Action = CreateAction | UpdateAction | NoOpAction;

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type EventResult = Result<Action> & { uid: string };

export interface SyncReport {
  results: EventResult[];
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  skipped: number;              // malformed feed entries
}
