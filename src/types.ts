// Settings for one sync run, built once at startup and passed to every component
export interface SyncSettings {
  feedUrl: string;
  forumBaseUrl: string;
  apiKey: string;
  apiUsername: string;
  category: number; // Used on create only; updates never move a topic
  defaultTags: string[];
  staticTags: string[];
  enableUidTag: boolean;
  siteTimezone: string;
  httpTimeoutMs: number;
  maxAttempts: number;
}

export const DEFAULT_SYNC_SETTINGS: Omit<SyncSettings, 'feedUrl' | 'forumBaseUrl' | 'apiKey' | 'category'> = {
  apiUsername: 'system',
  defaultTags: [],
  staticTags: [],
  enableUidTag: true,
  siteTimezone: 'Europe/London',
  httpTimeoutMs: 30_000,
  maxAttempts: 5,
};
