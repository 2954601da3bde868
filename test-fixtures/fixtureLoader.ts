/**
 * Test fixture loader.
 *
 * Feeds in feeds/ are complete iCalendar files; each one exercises a
 * particular shape (folding, time zones, malformed entries, overrides).
 */
import * as fs from 'fs';
import * as path from 'path';
import { SyncSettings } from '../src/types';

// ── Directory paths ──

const FEEDS_DIR = path.join(__dirname, 'feeds');

// ── Server constants ──

export const FIXTURE_FORUM = {
	baseUrl: 'https://forum.example.com',
	apiKey: 'test-secret',
	apiUsername: 'system',
	category: 7,
};

export const FIXTURE_FEED_URL = 'https://calendar.example.com/team.ics';

// ── Feed loading ──

/** Absolute path of feeds/{name}.ics */
export function feedPath(name: string): string {
	return path.join(FEEDS_DIR, `${name}.ics`);
}

/** Read feeds/{name}.ics as text */
export function loadFeed(name: string): string {
	return fs.readFileSync(feedPath(name), 'utf-8');
}

/** Wrap VEVENT lines in a minimal VCALENDAR envelope */
export function buildFeed(...events: string[][]): string {
	const lines = ['BEGIN:VCALENDAR', 'VERSION:2.0'];
	for (const event of events) {
		lines.push('BEGIN:VEVENT', ...event, 'END:VEVENT');
	}
	lines.push('END:VCALENDAR');
	return lines.join('\r\n') + '\r\n';
}

// ── Settings ──

export function makeSettings(overrides: Partial<SyncSettings> = {}): SyncSettings {
	return {
		feedUrl: FIXTURE_FEED_URL,
		forumBaseUrl: FIXTURE_FORUM.baseUrl,
		apiKey: FIXTURE_FORUM.apiKey,
		apiUsername: FIXTURE_FORUM.apiUsername,
		category: FIXTURE_FORUM.category,
		defaultTags: [],
		staticTags: [],
		enableUidTag: false,
		siteTimezone: 'UTC',
		httpTimeoutMs: 1000,
		maxAttempts: 5,
		...overrides,
	};
}
