import fs from "node:fs";
import { Command } from "commander";

import { MeasurementStore, openDb } from "@measurement-hub/store";

import { importCsv, parseColumnMapping } from "./csv-import";
import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/log";

interface CliOptions {
	file: string;
	timeColumn: string;
	column: string[];
}

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

function parseCommandLine(): CliOptions {
	const program = new Command();

	program
		.option("-c, --config <path>", "Path to configuration file (parsed by config.ts)")
		.requiredOption("-f, --file <path>", "CSV file to import")
		.option("-t, --time-column <name>", "Column holding the timestamp", "time")
		.option("--column <NAME=TYPE_ID>", "Map a CSV column to a value type (repeatable)", collect, [])
		.allowExcessArguments(true);

	program.parse(process.argv);

	return program.opts<CliOptions>();
}

async function main(): Promise<void> {
	const opts = parseCommandLine();
	const config = loadConfig();

	const logger = createLogger({
		name: "import-csv",
		dir: config.paths.logDir,
		level: config.logLevel,
		files: "single"
	});

	if (opts.column.length === 0) {
		throw new Error("At least one --column NAME=TYPE_ID mapping is required");
	}
	const columns = new Map(opts.column.map(parseColumnMapping));

	const handle = openDb(config.paths.sqlite);
	try {
		const store = new MeasurementStore({ db: handle.db, logger });
		const result = await importCsv(
			store,
			fs.createReadStream(opts.file),
			{ timeColumn: opts.timeColumn, columns },
			logger
		);
		logger.info("Imported %s: %d values from %d rows (%d skipped)", opts.file, result.inserted, result.rows, result.skipped);
	} finally {
		handle.close();
	}
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
