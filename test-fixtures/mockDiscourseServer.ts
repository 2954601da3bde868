/**
 * Stateful mock Discourse server behind the HttpClient interface.
 *
 * Routes requests to in-memory topics without any real HTTP. Creating a
 * post or editing tags changes state, so later reads reflect it.
 * Feeds can be served from the same client, and failures can be queued
 * per endpoint to exercise retries.
 */
import { normalizeTag } from '../src/discourse/tags';
import { HttpClient, HttpRequest, HttpResponse } from '../src/http/httpClient';
import { FIXTURE_FORUM } from './fixtureLoader';

interface MockConfig {
	baseUrl?: string;
	apiKey?: string;
	/**
	 * Whether search finds text inside the raw post. Real Discourse indexes the
	 * cooked HTML, where HTML comments are gone, so markers are not searchable.
	 */
	searchIndexesRaw?: boolean;
	/** Return tags as { name } objects, as newer Discourse versions do */
	tagObjects?: boolean;
	/** Topics per page of a category listing */
	pageSize?: number;
}

export interface StoredPost {
	id: number;
	postNumber: number;
	raw: string;
}

export interface StoredTopic {
	id: number;
	title: string;
	categoryId: number;
	tags: string[];
	posts: StoredPost[];
}

interface QueuedFailure {
	method: string;
	path: string;
	outcome: HttpResponse | Error;
}

export class MockDiscourseServer implements HttpClient {
	readonly requests: HttpRequest[] = [];

	private baseUrl: string;
	private apiKey: string;
	private searchIndexesRaw: boolean;
	private tagObjects: boolean;
	private pageSize: number;

	private topics: Map<number, StoredTopic> = new Map();
	private feeds: Map<string, string> = new Map();
	private failures: QueuedFailure[] = [];
	private nextTopicId = 100;
	private nextPostId = 1000;

	constructor(config: MockConfig = {}) {
		this.baseUrl = config.baseUrl ?? FIXTURE_FORUM.baseUrl;
		this.apiKey = config.apiKey ?? FIXTURE_FORUM.apiKey;
		this.searchIndexesRaw = config.searchIndexesRaw ?? true;
		this.tagObjects = config.tagObjects ?? false;
		this.pageSize = config.pageSize ?? 30;
	}

	// ── Setup ──

	/** Seed a topic as if a previous run (or a human) had created it */
	addTopic(topic: { title: string; raw: string; categoryId?: number; tags?: string[] }): StoredTopic {
		return this.storeTopic(topic.title, topic.raw, topic.categoryId ?? FIXTURE_FORUM.category, topic.tags ?? []);
	}

	/** Serve `text` for GET requests to `url` */
	setFeed(url: string, text: string): void {
		this.feeds.set(url, text);
	}

	/**
	 * Queue outcomes for the next requests to `method path` (pathname only).
	 * Each queued outcome is used once, in order; an Error is thrown as a network failure.
	 */
	failNext(method: string, path: string, ...outcomes: Array<HttpResponse | Error>): void {
		for (const outcome of outcomes) {
			this.failures.push({ method, path, outcome });
		}
	}

	// ── Inspection ──

	getTopic(id: number): StoredTopic | undefined {
		return this.topics.get(id);
	}

	findTopicByTitle(title: string): StoredTopic | undefined {
		return [...this.topics.values()].find(topic => topic.title === title);
	}

	get topicCount(): number {
		return this.topics.size;
	}

	/** Requests sent to `method path`, matched on the pathname */
	requestsTo(method: string, path: string): HttpRequest[] {
		return this.requests.filter(req => req.method === method && new URL(req.url).pathname === path);
	}

	// ── Core request handler ──

	async request(params: HttpRequest): Promise<HttpResponse> {
		this.requests.push(params);
		const url = new URL(params.url);
		const method = params.method.toUpperCase();

		const queued = this.failures.findIndex(f => f.method === method && f.path === url.pathname);
		if (queued !== -1) {
			const [failure] = this.failures.splice(queued, 1);
			if (failure.outcome instanceof Error) throw failure.outcome;
			return failure.outcome;
		}

		const feed = this.feeds.get(params.url);
		if (feed !== undefined && method === 'GET') {
			return { status: 200, text: feed, headers: { 'content-type': 'text/calendar; charset=utf-8' } };
		}

		if (url.origin !== this.baseUrl) {
			return { status: 404, text: 'Not Found', headers: {} };
		}

		if (params.headers?.['Api-Key'] !== this.apiKey) {
			return this.respondJson(403, { errors: ['You are not permitted to view the requested resource.'] });
		}

		return this.route(method, url, new URLSearchParams(params.body ?? ''));
	}

	private route(method: string, url: URL, form: URLSearchParams): HttpResponse {
		const path = url.pathname;

		if (method === 'GET' && path === '/search.json') {
			return this.handleSearch(url.searchParams.get('q') ?? '');
		}

		const tagMatch = path.match(/^\/tag\/([^/]+)\.json$/);
		if (method === 'GET' && tagMatch) {
			return this.handleTag(decodeURIComponent(tagMatch[1]));
		}

		const categoryMatch = path.match(/^\/c\/(\d+)\.json$/);
		if (method === 'GET' && categoryMatch) {
			return this.handleCategory(Number(categoryMatch[1]), Number(url.searchParams.get('page') ?? '0'));
		}

		const topicMatch = path.match(/^\/t\/(\d+)\.json$/);
		if (topicMatch && method === 'GET') {
			return this.handleReadTopic(Number(topicMatch[1]), url.searchParams.get('include_raw') === 'true');
		}
		if (topicMatch && method === 'PUT') {
			return this.handleUpdateTopic(Number(topicMatch[1]), form);
		}

		if (method === 'POST' && path === '/posts.json') {
			return this.handleCreatePost(form);
		}

		const postMatch = path.match(/^\/posts\/(\d+)\.json$/);
		if (method === 'PUT' && postMatch) {
			return this.handleUpdatePost(Number(postMatch[1]), form);
		}

		return this.notFound();
	}

	// ── Handlers ──

	private handleSearch(query: string): HttpResponse {
		const term = query.replace(/^"|"$/g, '');
		const hits = this.searchIndexesRaw && term !== ''
			? [...this.topics.values()].filter(topic => topic.posts[0].raw.includes(term))
			: [];

		return this.respondJson(200, {
			posts: hits.map(topic => ({ id: topic.posts[0].id, topic_id: topic.id })),
			topics: hits.map(topic => ({ id: topic.id, title: topic.title })),
		});
	}

	private handleTag(tag: string): HttpResponse {
		const tagged = [...this.topics.values()].filter(topic => topic.tags.includes(tag));
		if (tagged.length === 0) {
			return this.notFound();
		}
		return this.respondJson(200, {
			topic_list: { topics: tagged.map(topic => ({ id: topic.id, title: topic.title })) },
		});
	}

	private handleCategory(categoryId: number, page: number): HttpResponse {
		const listed = [...this.topics.values()].filter(topic => topic.categoryId === categoryId);
		const start = page * this.pageSize;
		const more = start + this.pageSize < listed.length;

		return this.respondJson(200, {
			topic_list: {
				topics: listed.slice(start, start + this.pageSize).map(topic => ({ id: topic.id, title: topic.title })),
				...(more ? { more_topics_url: `/c/${categoryId}.json?page=${page + 1}` } : {}),
			},
		});
	}

	private handleReadTopic(id: number, includeRaw: boolean): HttpResponse {
		const topic = this.topics.get(id);
		if (!topic) return this.notFound();

		return this.respondJson(200, {
			id: topic.id,
			title: topic.title,
			category_id: topic.categoryId,
			tags: this.tagObjects ? topic.tags.map(name => ({ id: name, name })) : topic.tags,
			post_stream: {
				posts: topic.posts.map(post => ({
					id: post.id,
					post_number: post.postNumber,
					...(includeRaw ? { raw: post.raw } : {}),
				})),
			},
		});
	}

	private handleCreatePost(form: URLSearchParams): HttpResponse {
		const title = form.get('title') ?? '';
		const raw = form.get('raw') ?? '';
		if (title === '' || raw === '') {
			return this.respondJson(422, { errors: ['Title and body are required'] });
		}

		const topic = this.storeTopic(title, raw, Number(form.get('category')), this.tagsFrom(form));
		return this.respondJson(200, { id: topic.posts[0].id, topic_id: topic.id, post_number: 1 });
	}

	private handleUpdatePost(postId: number, form: URLSearchParams): HttpResponse {
		const post = [...this.topics.values()].flatMap(topic => topic.posts).find(p => p.id === postId);
		if (!post) return this.notFound();

		post.raw = form.get('post[raw]') ?? post.raw;
		return this.respondJson(200, { post: { id: post.id, raw: post.raw } });
	}

	private handleUpdateTopic(id: number, form: URLSearchParams): HttpResponse {
		const topic = this.topics.get(id);
		if (!topic) return this.notFound();

		topic.tags = this.tagsFrom(form);
		return this.respondJson(200, { basic_topic: { id: topic.id, title: topic.title } });
	}

	// ── Helpers ──

	private storeTopic(title: string, raw: string, categoryId: number, tags: string[]): StoredTopic {
		const topic: StoredTopic = {
			id: this.nextTopicId++,
			title,
			categoryId,
			tags: [...tags],
			posts: [{ id: this.nextPostId++, postNumber: 1, raw }],
		};
		this.topics.set(topic.id, topic);
		return topic;
	}

	// Discourse stores tags normalized and drops duplicates
	private tagsFrom(form: URLSearchParams): string[] {
		const tags = new Set<string>();
		form.forEach((value, key) => {
			const tag = normalizeTag(value);
			if (/^tags\[\d*\]$/.test(key) && tag !== '') tags.add(tag);
		});
		return [...tags];
	}

	private respondJson(status: number, body: unknown): HttpResponse {
		return {
			status,
			text: JSON.stringify(body),
			headers: { 'content-type': 'application/json; charset=utf-8' },
		};
	}

	private notFound(): HttpResponse {
		return this.respondJson(404, { errors: ['The requested URL or resource could not be found.'] });
	}
}
