import { EXIT_CONFIG, EXIT_FAILED, EXIT_OK, run, RunDependencies } from './main';
import { uidTag } from './src/discourse/marker';
import { FIXTURE_FEED_URL, FIXTURE_FORUM, feedPath, loadFeed } from './test-fixtures/fixtureLoader';
import { MockDiscourseServer } from './test-fixtures/mockDiscourseServer';

const env = {
	ICS_FEED_URL: FIXTURE_FEED_URL,
	DISCOURSE_BASE_URL: FIXTURE_FORUM.baseUrl,
	DISCOURSE_API_KEY: FIXTURE_FORUM.apiKey,
	DISCOURSE_CATEGORY_ID: '7',
};

describe('run', () => {
	let server: MockDiscourseServer;
	let deps: RunDependencies;

	beforeEach(() => {
		jest.spyOn(console, 'log').mockImplementation(() => undefined);
		jest.spyOn(console, 'warn').mockImplementation(() => undefined);
		jest.spyOn(console, 'error').mockImplementation(() => undefined);
		server = new MockDiscourseServer();
		server.setFeed(FIXTURE_FEED_URL, loadFeed('basic'));
		deps = {
			httpClient: () => server,
			discourse: { sleep: async () => undefined },
		};
	});

	afterEach(() => {
		jest.restoreAllMocks();
	});

	it('should exit 0 when every event synced', async () => {
		expect(await run([], env, deps)).toBe(EXIT_OK);
		expect(server.topicCount).toBe(2);
		expect(server.findTopicByTitle('Standup')?.tags).toEqual([uidTag('evt-1')]);
	});

	it('should exit 2 on invalid configuration before any request', async () => {
		expect(await run([], { ICS_FEED_URL: FIXTURE_FEED_URL }, deps)).toBe(EXIT_CONFIG);
		expect(server.requests).toHaveLength(0);
		expect(console.error).toHaveBeenCalledWith(
			'[CLI] Invalid configuration:\n' +
			'  - DISCOURSE_BASE_URL: forum base URL is required\n' +
			'  - DISCOURSE_API_KEY: API key is required\n' +
			'  - --category-id / DISCOURSE_CATEGORY_ID: category id is required'
		);
	});

	it('should exit 2 on an unknown flag before any request', async () => {
		expect(await run(['--bogus'], env, deps)).toBe(EXIT_CONFIG);
		expect(server.requests).toHaveLength(0);
		expect(console.error).toHaveBeenCalledWith("[CLI] error: unknown option '--bogus'");
	});

	it('should exit 2 when a flag is missing its value', async () => {
		expect(await run(['--ics'], env, deps)).toBe(EXIT_CONFIG);
		expect(server.requests).toHaveLength(0);
	});

	it('should exit 1 when the category cannot be listed', async () => {
		server.failNext('GET', '/c/7.json', { status: 403, text: 'forbidden', headers: {} });

		expect(await run(['--no-uid-tag'], env, deps)).toBe(EXIT_FAILED);
		expect(server.topicCount).toBe(0);
		expect(console.error).toHaveBeenCalledWith('[CLI] GET /c/7.json?page=0 failed: 403 forbidden');
	});

	it('should exit 1 when an event fails', async () => {
		server.failNext('POST', '/posts.json', { status: 422, text: '{"errors":["invalid"]}', headers: {} });

		expect(await run([], env, deps)).toBe(EXIT_FAILED);
		expect(server.topicCount).toBe(1);
		expect(console.error).toHaveBeenCalledWith('[CLI] 1 event(s) failed: evt-1');
	});

	it('should exit 1 when the feed cannot be fetched', async () => {
		expect(await run(['--ics', 'https://calendar.example.com/gone.ics'], env, deps)).toBe(EXIT_FAILED);
		expect(console.error).toHaveBeenCalledWith('[CLI] Could not read feed https://calendar.example.com/gone.ics: HTTP 404');
	});

	it('should exit 1 when the feed is not a calendar', async () => {
		expect(await run(['--ics', feedPath('not-calendar')], env, deps)).toBe(EXIT_FAILED);
		expect(console.error).toHaveBeenCalledWith('[CLI] Feed is not iCalendar data: missing BEGIN:VCALENDAR');
	});

	it('should exit 0 when only malformed entries were skipped', async () => {
		expect(await run(['--ics', feedPath('one-malformed')], env, deps)).toBe(EXIT_OK);
		expect(server.topicCount).toBe(5);
	});

	it('should apply command line flags', async () => {
		const code = await run([
			'--ics', feedPath('basic'),
			'--category-id', '12',
			'--static-tags', 'events,sync',
			'--no-uid-tag',
		], env, deps);

		expect(code).toBe(EXIT_OK);
		const topic = server.findTopicByTitle('Standup');
		expect(topic?.categoryId).toBe(12);
		expect(topic?.tags).toEqual(['events', 'sync']);
	});
});
