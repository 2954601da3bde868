#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { CliOptions, loadSettings } from './src/config/settingsLoader';
import { DiscourseClient, DiscourseClientOptions } from './src/discourse/discourseClient';
import { ApiError, ConfigError, FeedFetchError, FeedParseError, errorMessage } from './src/errors';
import { FetchHttpClient, HttpClient } from './src/http/httpClient';
import { SyncEngine } from './src/sync/syncEngine';
import { SyncSettings } from './src/types';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG = 2;

export interface RunDependencies {
	// Builds the transport for both the feed and the forum
	httpClient?: (settings: SyncSettings) => HttpClient;
	discourse?: DiscourseClientOptions;
}

function buildProgram(): Command {
	return new Command()
		.name('ics-discourse-sync')
		.description('Mirror an ICS calendar feed into Discourse topics, one topic per event UID')
		.option('--ics <source>', 'feed URL (http, https, webcal) or file path')
		.option('--category-id <id>', 'category for newly created topics')
		.option('--site-tz <zone>', 'IANA timezone events are displayed in')
		.option('--static-tags <tags>', 'comma separated tags added to every topic')
		.option('--uid-tag', 'tag each topic with a tag derived from the event UID')
		.option('--no-uid-tag', 'do not add UID tags')
		.option('--timeout <ms>', 'HTTP timeout in milliseconds')
		.option('--max-attempts <n>', 'attempts per API call before giving up')
		.exitOverride()
		.configureOutput({
			writeErr: (text) => console.error(`[CLI] ${text.trimEnd()}`),
		});
}

/**
 * Run one sync and map its outcome to a process exit code:
 * 0 when every event synced, 1 when any event failed or the feed or forum could not be read,
 * 2 when the arguments or the configuration are invalid.
 *
 * @param argv - Arguments after the executable and script name
 */
export async function run(argv: string[], env: Record<string, string | undefined>, deps: RunDependencies = {}): Promise<number> {
	const program = buildProgram();
	try {
		program.parse(argv, { from: 'user' });
	} catch (error: unknown) {
		// Commander has already printed the usage error, or the help text
		if (error instanceof CommanderError) {
			return error.exitCode === 0 ? EXIT_OK : EXIT_CONFIG;
		}
		throw error;
	}

	let settings: SyncSettings;
	try {
		settings = loadSettings(program.opts<CliOptions>(), env);
	} catch (error: unknown) {
		if (error instanceof ConfigError) {
			console.error(`[CLI] ${error.message}`);
			return EXIT_CONFIG;
		}
		throw error;
	}

	const httpClient = deps.httpClient?.(settings) ?? new FetchHttpClient(settings.httpTimeoutMs);
	const client = new DiscourseClient(settings, httpClient, deps.discourse);
	const engine = new SyncEngine(settings, client, httpClient);

	try {
		const report = await engine.sync();
		if (report.failed > 0) {
			const uids = report.results.filter(result => !result.ok).map(result => result.uid);
			console.error(`[CLI] ${report.failed} event(s) failed: ${uids.join(', ')}`);
			return EXIT_FAILED;
		}
		return EXIT_OK;
	} catch (error: unknown) {
		if (error instanceof FeedFetchError || error instanceof FeedParseError || error instanceof ApiError) {
			console.error(`[CLI] ${error.message}`);
			return EXIT_FAILED;
		}
		throw error;
	}
}

if (require.main === module) {
	loadDotenv();
	run(process.argv.slice(2), process.env)
		.then((code) => {
			process.exitCode = code;
		})
		.catch((error: unknown) => {
			console.error(`[CLI] Unexpected failure: ${errorMessage(error)}`);
			process.exitCode = EXIT_FAILED;
		});
}
