/**
 * Process entry point. ROLE selects the HTTP API, the run workers, or both.
 */

import type { Server } from 'node:http';
import { createApp } from './index';
import { ConfigUtils, loadConfig } from './modules/config';
import { startHttpServer } from './modules/routing';

async function main(): Promise<void> {
	const config = loadConfig();
	const app = await createApp(config);
	const { logger } = app;

	let server: Server | undefined;
	if (ConfigUtils.runsApi(config)) {
		server = await startHttpServer(app.router, config.PORT, logger);
	}
	if (ConfigUtils.runsWorkers(config)) {
		app.consumer.start();
	}
	logger.info('Service started', { role: config.ROLE, environment: config.NODE_ENV });

	let stopping = false;
	const shutdown = async (signal: string) => {
		if (stopping) return;
		stopping = true;
		logger.info('Shutting down', { signal });

		if (server) {
			const listening = server;
			await new Promise<void>(resolve => listening.close(() => resolve()));
		}
		await app.close();
		logger.info('Shutdown complete');
	};

	for (const signal of ['SIGINT', 'SIGTERM'] as const) {
		process.once(signal, () => {
			shutdown(signal).then(
				() => process.exit(0),
				(error: unknown) => {
					logger.error('Shutdown failed', { signal }, error);
					process.exit(1);
				}
			);
		});
	}
}

main().catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : error);
	process.exit(1);
});
