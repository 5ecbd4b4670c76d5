import { MeasurementStore, openDb } from "@measurement-hub/store";

import { createApp } from "./http/app";
import { closeServer, listen } from "./http/listen";
import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/log";
import { SensorReader } from "./sensor-reader";

async function main(): Promise<void> {
	const config = loadConfig();

	const logger = createLogger({
		name: "measurement-hub",
		dir: config.paths.logDir,
		level: config.logLevel
	});

	logger.info("STARTUP: db=%s port=%d reader=%s", config.paths.sqlite, config.http.port, String(config.reader.enabled));

	// One store for the whole process, handed to every caller
	const handle = openDb(config.paths.sqlite);
	try {
		const store = new MeasurementStore({ db: handle.db, logger });
		const reader = new SensorReader({ store, logger, sensors: config.sensors });

		const server = await listen(createApp({ store, logger }), config.http.port);
		logger.info("HTTP API listening on port %d", config.http.port);

		if (config.reader.enabled) {
			reader.start();
		}

		try {
			await new Promise<void>((resolve, reject) => {
				server.once("error", reject);
				const stop = (signal: string) => {
					logger.info("SHUTDOWN: signal=%s", signal);
					resolve();
				};
				process.once("SIGINT", () => stop("SIGINT"));
				process.once("SIGTERM", () => stop("SIGTERM"));
			});
		} finally {
			reader.stop();
			if (server.listening) {
				await closeServer(server);
			}
		}
	} finally {
		handle.close();
		logger.info("SHUTDOWN: completed");
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
