import { ApiError } from '../errors';
import { HttpResponse } from '../http/httpClient';
import { makeSettings } from '../../test-fixtures/fixtureLoader';
import { MockDiscourseServer } from '../../test-fixtures/mockDiscourseServer';
import { SyncSettings } from '../types';
import { DiscourseClient } from './discourseClient';
import { uidTag } from './marker';

const EVT_1_BODY = '<!-- ICSUID:evt-1 -->\n[event start="2025-01-06 09:00" status="public" name="Standup" timezone="UTC"]\n[/event]\n';

function status(code: number, headers: Record<string, string> = {}): HttpResponse {
  return { status: code, text: `{"errors":["status ${code}"]}`, headers };
}

describe('DiscourseClient', () => {
  let server: MockDiscourseServer;
  let sleeps: number[];

  function makeClient(overrides: Partial<SyncSettings> = {}): DiscourseClient {
    return new DiscourseClient(makeSettings(overrides), server, {
      sleep: async (ms) => {
        sleeps.push(ms);
      },
      random: () => 0.5,
    });
  }

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    server = new MockDiscourseServer();
    sleeps = [];
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('findTopicByUid', () => {
    it('should find a topic through search', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY, tags: ['sync'] });

      const topic = await makeClient().findTopicByUid('evt-1');

      expect(topic).toEqual({
        id: 100,
        firstPostId: 1000,
        category: 7,
        title: 'Standup',
        bodyMarkerUid: 'evt-1',
        tags: ['sync'],
        bodyContent: '[event start="2025-01-06 09:00" status="public" name="Standup" timezone="UTC"]\n[/event]\n',
      });
    });

    it('should only accept an exact marker match', async () => {
      server.addTopic({ title: 'Standup 10', raw: '<!-- ICSUID:evt-10 -->\n[event]\n[/event]\n' });
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });

      const topic = await makeClient().findTopicByUid('evt-1');

      expect(topic?.id).toBe(101);
      expect(server.requestsTo('GET', '/t/100.json')).toHaveLength(1);
    });

    it('should return null when only similar topics exist', async () => {
      server.addTopic({ title: 'Standup 10', raw: '<!-- ICSUID:evt-10 -->\n[event]\n[/event]\n' });

      expect(await makeClient().findTopicByUid('evt-1')).toBeNull();
    });

    it('should fall back to the uid tag when search cannot see markers', async () => {
      server = new MockDiscourseServer({ searchIndexesRaw: false });
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY, tags: [uidTag('evt-1')] });

      const topic = await makeClient({ enableUidTag: true }).findTopicByUid('evt-1');

      expect(topic?.id).toBe(100);
      expect(server.requests.map(req => new URL(req.url).pathname)).toEqual([
        '/search.json',
        `/tag/${uidTag('evt-1')}.json`,
        '/t/100.json',
      ]);
    });

    it('should not read a topic twice when search and tag agree', async () => {
      server.addTopic({ title: 'Standup 10', raw: '<!-- ICSUID:evt-10 -->\n', tags: [uidTag('evt-1')] });

      expect(await makeClient({ enableUidTag: true }).findTopicByUid('evt-1')).toBeNull();
      expect(server.requestsTo('GET', '/t/100.json')).toHaveLength(1);
    });

    it('should treat an unknown uid tag as no match', async () => {
      server = new MockDiscourseServer({ searchIndexesRaw: false });

      expect(await makeClient({ enableUidTag: true }).findTopicByUid('evt-1')).toBeNull();
    });

    it('should skip a candidate that was deleted', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });
      server.failNext('GET', '/t/100.json', status(404));

      expect(await makeClient().findTopicByUid('evt-1')).toBeNull();
      expect(console.warn).toHaveBeenCalledWith('[Discourse] Candidate topic 100 for UID=evt-1 no longer exists');
    });

    it('should read tags sent as objects', async () => {
      server = new MockDiscourseServer({ tagObjects: true });
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY, tags: ['meeting', 'sync'] });

      const topic = await makeClient().findTopicByUid('evt-1');

      expect(topic?.tags).toEqual(['meeting', 'sync']);
    });
  });

  describe('indexCategory', () => {
    beforeEach(() => {
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    it('should index marked topics across every page of the category', async () => {
      server = new MockDiscourseServer({ pageSize: 2, searchIndexesRaw: false });
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });
      server.addTopic({ title: 'Retro', raw: '<!-- ICSUID:evt-2 -->\n[event]\n[/event]\n' });
      server.addTopic({ title: 'Welcome', raw: 'Hand written topic' });
      server.addTopic({ title: 'Elsewhere', raw: '<!-- ICSUID:evt-3 -->\n', categoryId: 8 });

      const index = await makeClient().indexCategory(7);

      expect([...index.keys()]).toEqual(['evt-1', 'evt-2']);
      expect(index.get('evt-2')?.id).toBe(101);
      expect(server.requestsTo('GET', '/c/7.json')).toHaveLength(2);
      expect(console.log).toHaveBeenCalledWith('[Discourse] Indexed 2 event topics in category 7');
    });

    it('should keep the first topic seen for a uid', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });
      server.addTopic({ title: 'Standup copy', raw: EVT_1_BODY });

      const index = await makeClient().indexCategory(7);

      expect(index.get('evt-1')?.id).toBe(100);
    });

    it('should skip a listed topic that was deleted', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });
      server.failNext('GET', '/t/100.json', status(404));

      expect((await makeClient().indexCategory(7)).size).toBe(0);
    });
  });

  describe('createTopic', () => {
    it('should create a topic with title, body, category and tags', async () => {
      const topic = await makeClient().createTopic(7, 'Standup', EVT_1_BODY, ['calendar', 'sync']);

      expect(topic.id).toBe(100);
      expect(topic.firstPostId).toBe(1000);
      expect(topic.bodyMarkerUid).toBe('evt-1');

      const stored = server.getTopic(100);
      expect(stored?.title).toBe('Standup');
      expect(stored?.categoryId).toBe(7);
      expect(stored?.tags).toEqual(['calendar', 'sync']);
      expect(stored?.posts[0].raw).toBe(EVT_1_BODY);
    });

    it('should authenticate and send a form', async () => {
      await makeClient().createTopic(7, 'Standup', EVT_1_BODY, ['sync']);

      const [request] = server.requestsTo('POST', '/posts.json');
      expect(request.headers).toEqual({
        'Api-Key': 'test-secret',
        'Api-Username': 'system',
        'Accept': 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      });
      const form = new URLSearchParams(request.body);
      expect(form.get('title')).toBe('Standup');
      expect(form.get('category')).toBe('7');
      expect(form.get('tags[0]')).toBe('sync');
    });

    it('should retry through rate limiting', async () => {
      server.failNext('POST', '/posts.json', status(429), status(429), status(429));

      const topic = await makeClient().createTopic(7, 'Standup', EVT_1_BODY, []);

      expect(topic.id).toBe(100);
      expect(server.requestsTo('POST', '/posts.json')).toHaveLength(4);
      expect(sleeps).toEqual([500, 1000, 2000]);
      expect(server.topicCount).toBe(1);
    });

    it('should wait as long as Retry-After asks', async () => {
      server.failNext('POST', '/posts.json', status(429, { 'retry-after': '3' }));

      await makeClient().createTopic(7, 'Standup', EVT_1_BODY, []);

      expect(sleeps).toEqual([3000]);
    });

    it('should not wait longer than the backoff cap', async () => {
      server.failNext('POST', '/posts.json', status(429, { 'retry-after': '86400' }));

      await makeClient().createTopic(7, 'Standup', EVT_1_BODY, []);

      expect(sleeps).toEqual([8000]);
    });

    it('should not resend a create after a server error', async () => {
      server.failNext('POST', '/posts.json', status(503));

      await expect(makeClient().createTopic(7, 'Standup', EVT_1_BODY, [])).rejects.toMatchObject({ status: 503 });
      expect(server.requestsTo('POST', '/posts.json')).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

    it('should not resend a create after a network failure', async () => {
      server.failNext('POST', '/posts.json', new Error('ETIMEDOUT'));

      await expect(makeClient().createTopic(7, 'Standup', EVT_1_BODY, [])).rejects.toThrow('ETIMEDOUT');
      expect(server.requestsTo('POST', '/posts.json')).toHaveLength(1);
    });

    it('should not retry a client error', async () => {
      server.failNext('POST', '/posts.json', status(422));

      await expect(makeClient().createTopic(7, 'Standup', EVT_1_BODY, []))
        .rejects.toThrow(new ApiError('POST', '/posts.json', 422, '{"errors":["status 422"]}'));
      expect(server.requestsTo('POST', '/posts.json')).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

  });

  describe('updates', () => {
    it('should replace the first post', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });

      await makeClient().updateTopicBody(100, '<!-- ICSUID:evt-1 -->\nnew body\n', 1000);

      expect(server.getTopic(100)?.posts[0].raw).toBe('<!-- ICSUID:evt-1 -->\nnew body\n');
      expect(server.requestsTo('GET', '/t/100.json')).toHaveLength(0);
    });

    it('should look up the first post when its id is not given', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });

      await makeClient().updateTopicBody(100, 'new body');

      expect(server.getTopic(100)?.posts[0].raw).toBe('new body');
      expect(server.requestsTo('PUT', '/posts/1000.json')).toHaveLength(1);
    });

    it('should replace the tag set', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY, tags: ['meeting'] });

      await makeClient().updateTopicTags(100, ['meeting', 'sync']);

      expect(server.getTopic(100)?.tags).toEqual(['meeting', 'sync']);
    });

    it('should store tags the way Discourse normalizes them', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });

      await makeClient().updateTopicTags(100, ['Team Events', 'team-events']);

      expect(server.getTopic(100)?.tags).toEqual(['team-events']);
    });

    it('should retry a network failure', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY, tags: ['meeting'] });
      server.failNext('PUT', '/t/100.json', new Error('ECONNRESET'));

      await makeClient().updateTopicTags(100, ['meeting', 'sync']);

      expect(server.getTopic(100)?.tags).toEqual(['meeting', 'sync']);
      expect(sleeps).toEqual([500]);
    });

    it('should give up after the configured number of attempts', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY });
      server.failNext('PUT', '/t/100.json', status(503), status(503), status(503));

      const promise = makeClient({ maxAttempts: 3 }).updateTopicTags(100, ['sync']);

      await expect(promise).rejects.toBeInstanceOf(ApiError);
      await expect(promise).rejects.toMatchObject({ status: 503 });
      expect(server.requestsTo('PUT', '/t/100.json')).toHaveLength(3);
      expect(sleeps).toEqual([500, 1000]);
      expect(server.getTopic(100)?.tags).toEqual([]);
    });

    it('should clear tags with an empty list', async () => {
      server.addTopic({ title: 'Standup', raw: EVT_1_BODY, tags: ['meeting'] });

      await makeClient().updateTopicTags(100, []);

      expect(server.getTopic(100)?.tags).toEqual([]);
    });
  });

  describe('responses', () => {
    it('should reject a response of the wrong shape', async () => {
      server.failNext('GET', '/search.json', { status: 200, text: '{"topics":"none"}', headers: {} });

      await expect(makeClient().findTopicByUid('evt-1')).rejects.toBeInstanceOf(ApiError);
      expect(server.requestsTo('GET', '/search.json')).toHaveLength(1);
    });

    it('should reject a response that is not JSON', async () => {
      server.failNext('GET', '/search.json', { status: 200, text: '<html>maintenance</html>', headers: {} });

      await expect(makeClient().findTopicByUid('evt-1'))
        .rejects.toThrow('failed: 200 Invalid JSON: <html>maintenance</html>');
    });

    it('should fail on a bad API key without retrying', async () => {
      const client = new DiscourseClient(makeSettings({ apiKey: 'wrong-key' }), server);

      await expect(client.findTopicByUid('evt-1')).rejects.toMatchObject({ status: 403 });
      expect(server.requests).toHaveLength(1);
    });
  });

  describe('parseRetryAfter', () => {
    it('should read seconds', () => {
      expect(DiscourseClient.parseRetryAfter('5')).toBe(5000);
    });

    it('should read an HTTP date', () => {
      const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
      expect(DiscourseClient.parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', now)).toBe(30000);
      expect(DiscourseClient.parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
    });

    it('should ignore a missing or unreadable header', () => {
      expect(DiscourseClient.parseRetryAfter(undefined)).toBeNull();
      expect(DiscourseClient.parseRetryAfter('soon')).toBeNull();
    });
  });
});
