import { DiscourseClient } from '../discourse/discourseClient';
import { errorMessage, FeedParseError } from '../errors';
import { HttpClient } from '../http/httpClient';
import { FeedReader } from '../ics/feedReader';
import { SyncSettings } from '../types';
import { reconcile, ReconcileOptions } from './reconcile';
import { Action, CalendarEvent, EventResult, ForumTopic, SyncReport } from './types';

/**
 * Sync Engine
 *
 * One run:
 * 1. Read and parse the feed (fatal on failure)
 * 2. For each event, in order: find its topic, reconcile, apply the action
 * 3. Report one result per event
 *
 * A failing event is logged and recorded; it never stops the events after it.
 * Runs are assumed to be serialized by whatever schedules them.
 */
export class SyncEngine {
    private settings: SyncSettings;
    private feedReader: FeedReader;
    private client: DiscourseClient;
    private skipped = 0;
    // Category index by UID, built per run when UID tags are off
    private knownTopics: Map<string, ForumTopic> | null = null;

    /**
     * @param httpClient used to fetch the feed when it is a URL
     */
    constructor(settings: SyncSettings, client: DiscourseClient, httpClient: HttpClient) {
        this.settings = settings;
        this.client = client;
        this.feedReader = new FeedReader(httpClient, {
            staticTags: settings.staticTags,
            onSkip: (error) => this.recordSkip(error),
        });
    }

    /**
     * Perform a sync.
     * @throws FeedFetchError / FeedParseError when the feed cannot be read at all,
     * ApiError when the category scan (UID tags off) fails
     */
    async sync(): Promise<SyncReport> {
        console.log(`[Sync] Starting sync of ${this.settings.feedUrl}`);
        this.skipped = 0;

        const events = await this.feedReader.load(this.settings.feedUrl);
        this.knownTopics = await this.indexTopics();

        const results: EventResult[] = [];
        for (const event of events) {
            results.push(await this.syncEvent(event));
        }

        const report = this.summarize(results);
        console.log(`[Sync] Done. Processed ${results.length} events: ${report.created} created, ${report.updated} updated, ${report.unchanged} unchanged, ${report.failed} failed, ${report.skipped} skipped`);
        return report;
    }

    /**
     * Sync a single event. Never throws: failures come back as { ok: false }.
     */
    async syncEvent(event: CalendarEvent): Promise<EventResult> {
        let operation = 'lookup';
        try {
            const existing = this.knownTopics?.get(event.uid) ?? await this.client.findTopicByUid(event.uid);

            operation = 'reconcile';
            const action = reconcile(event, existing, this.reconcileOptions());

            operation = action.type;
            await this.apply(event, action);

            return { uid: event.uid, ok: true, value: action };
        } catch (error: unknown) {
            console.error(`[Sync] Failed to sync UID=${event.uid} during ${operation}: ${errorMessage(error)}`);
            return {
                uid: event.uid,
                ok: false,
                error: error instanceof Error ? error : new Error(String(error)),
            };
        }
    }

    /**
     * Without UID tags, search is the only other lookup and Discourse search cannot see
     * the hidden marker. Scan the category once instead, so no event gets a second topic.
     */
    private async indexTopics(): Promise<Map<string, ForumTopic> | null> {
        if (this.settings.enableUidTag) {
            return null;
        }
        console.warn(`[Sync] UID tags are disabled, scanning category ${this.settings.category} for existing topics`);
        return this.client.indexCategory(this.settings.category);
    }

    private recordSkip(error: FeedParseError): void {
        this.skipped++;
        console.warn(`[Sync] Skipped malformed entry: ${error.message}`);
    }

    private async apply(event: CalendarEvent, action: Action): Promise<void> {
        switch (action.type) {
            case 'create': {
                const topic = await this.client.createTopic(action.category, action.title, action.body, action.tags);
                this.knownTopics?.set(event.uid, topic);
                console.log(`[Sync] Created topic ${topic.id} for UID=${event.uid}`);
                break;
            }
            case 'update': {
                if (action.body !== null) {
                    await this.client.updateTopicBody(action.topicId, action.body, action.firstPostId);
                    console.log(`[Sync] Updated first post of topic ${action.topicId}`);
                }
                if (action.tags !== null) {
                    await this.client.updateTopicTags(action.topicId, action.tags);
                    console.log(`[Sync] Merged tags on topic ${action.topicId} -> ${action.tags.join(', ')}`);
                }
                break;
            }
            case 'noop': {
                console.log(`[Sync] No change for topic ${action.topicId}`);
                break;
            }
        }
    }

    private reconcileOptions(): ReconcileOptions {
        return {
            category: this.settings.category,
            staticTags: this.settings.staticTags,
            defaultTags: this.settings.defaultTags,
            enableUidTag: this.settings.enableUidTag,
            siteTimezone: this.settings.siteTimezone,
        };
    }

    private summarize(results: EventResult[]): SyncReport {
        const report: SyncReport = { results, created: 0, updated: 0, unchanged: 0, failed: 0, skipped: this.skipped };

        for (const result of results) {
            if (!result.ok) {
                report.failed++;
                continue;
            }
            switch (result.value.type) {
                case 'create':
                    report.created++;
                    break;
                case 'update':
                    report.updated++;
                    break;
                case 'noop':
                    report.unchanged++;
                    break;
            }
        }

        return report;
    }
}
