/**
 * Assistants-compatible API with a queue-driven run execution engine
 * Wires storage, services, the engine and the HTTP router together
 */

import type { Kysely } from 'kysely';
import type { Config } from './modules/config';
import { createHealthCheckHandler, createLogger, type LogSink, type Logger } from './modules/monitoring';
import { createProviderRegistry, type ModelClient } from './modules/openai-wrapper';
import { RunQueueConsumer, SqlRunQueue, type RunQueue } from './modules/queue';
import { createRouter, type Router } from './modules/routing';
import {
	DefaultIdGenerator,
	RunExecutionEngine,
	RunStateManager,
	ServiceFactory,
	ToolDispatcher,
	systemClock,
	type Clock,
	type IdGenerator,
	type Services,
} from './modules/services';
import {
	EntityStore,
	LocalBlobStore,
	createDatabase,
	migrate,
	type BlobStore,
	type Database,
} from './modules/storage';
import {
	ChunkRetriever,
	DocumentTextExtractor,
	HttpActionCaller,
	HttpSandbox,
	type ActionCaller,
	type Retriever,
	type Sandbox,
	type TextExtractor,
} from './modules/tools';

/**
 * Collaborators that can be swapped out, mostly for tests
 */
export interface AppOverrides {
	model?: ModelClient;
	retriever?: Retriever;
	sandbox?: Sandbox;
	actionCaller?: ActionCaller;
	extractor?: TextExtractor;
	blobs?: BlobStore;
	clock?: Clock;
	ids?: IdGenerator;
	logSink?: LogSink;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface App {
	config: Config;
	logger: Logger;
	db: Kysely<Database>;
	store: EntityStore;
	queue: RunQueue;
	services: Services;
	engine: RunExecutionEngine;
	consumer: RunQueueConsumer;
	router: Router;
	close(): Promise<void>;
}

/**
 * Build the application. The database schema is created if missing.
 */
export async function createApp(config: Config, overrides: AppOverrides = {}): Promise<App> {
	const logger = createLogger(config, overrides.logSink);
	const clock = overrides.clock ?? systemClock;
	const ids = overrides.ids ?? new DefaultIdGenerator();

	const db = createDatabase(config.DATABASE_PATH);
	await migrate(db);
	const store = new EntityStore(db);
	const queue = new SqlRunQueue(db, { clock, pollIntervalMs: config.QUEUE_POLL_INTERVAL_MS });
	const blobs = overrides.blobs ?? new LocalBlobStore(config.BLOB_DIR);

	const model = overrides.model ?? createProviderRegistry(config);
	const extractor = overrides.extractor ?? new DocumentTextExtractor();

	const stateManager = new RunStateManager(clock, logger);
	const services = new ServiceFactory(
		{ store, queue, blobs, model, extractor, config, logger, clock, ids },
		stateManager
	).createAllServices();

	const dispatcher = new ToolDispatcher({
		retriever: overrides.retriever ?? new ChunkRetriever(store),
		sandbox: overrides.sandbox ?? new HttpSandbox(config.SANDBOX_URL),
		actionCaller: overrides.actionCaller ?? new HttpActionCaller(),
		config,
		sleep: overrides.sleep,
	});
	const engine = new RunExecutionEngine({
		store,
		model,
		dispatcher,
		stateManager,
		logger,
		clock,
		ids,
		config,
		sleep: overrides.sleep,
	});
	const consumer = new RunQueueConsumer(queue, engine, logger, {
		concurrency: config.WORKER_CONCURRENCY,
		leaseMs: config.QUEUE_LEASE_MS,
		waitMs: config.QUEUE_WAIT_MS,
		sweepIntervalMs: config.SWEEP_INTERVAL_MS,
	}, engine);

	const health = createHealthCheckHandler(logger, { database: () => store.ping() }, async () => ({
		queue_depth: await queue.depth(),
		workers: consumer.getStats(),
	}));
	const router = createRouter({ config, logger, services, health });

	return {
		config,
		logger,
		db,
		store,
		queue,
		services,
		engine,
		consumer,
		router,
		async close() {
			await consumer.stop();
			await db.destroy();
		},
	};
}

export { loadConfig, getDefaultConfig, type Config } from './modules/config';
