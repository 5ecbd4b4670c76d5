import type { Server } from "node:http";
import type { Express } from "express";

/**
 * Bind the app to a port. Resolves once the socket is listening, rejects on a bind
 * failure such as EADDRINUSE.
 */
export function listen(app: Express, port: number): Promise<Server> {
	return new Promise((resolve, reject) => {
		const server = app.listen(port);
		const onError = (err: Error) => {
			server.off("listening", onListening);
			reject(err);
		};
		const onListening = () => {
			server.off("error", onError);
			resolve(server);
		};
		server.once("error", onError);
		server.once("listening", onListening);
	});
}

export function closeServer(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close(err => (err ? reject(err) : resolve()));
	});
}
