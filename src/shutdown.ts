/**
 * Graceful shutdown.
 * Named handlers run in reverse registration order (LIFO) under a hard timeout.
 */

import { logger } from "./logger";

type ShutdownHandler = () => Promise<void>;

const SHUTDOWN_TIMEOUT_MS = 30000; // 30 seconds

export interface ShutdownRegistryOptions {
	timeoutMs?: number;
	exit?: (code: number) => void;
}

export class ShutdownRegistry {
	private readonly handlers: Array<{ name: string; handler: ShutdownHandler }> = [];
	private shuttingDown = false;
	private readonly timeoutMs: number;
	private readonly exit: (code: number) => void;

	constructor(options: ShutdownRegistryOptions = {}) {
		this.timeoutMs = options.timeoutMs ?? SHUTDOWN_TIMEOUT_MS;
		this.exit = options.exit ?? ((code) => process.exit(code));
	}

	register(name: string, handler: ShutdownHandler): void {
		this.handlers.push({ name, handler });
	}

	/**
	 * Run every handler, last registered first. A failing handler is logged
	 * and the rest still run. A second call while in progress forces exit.
	 */
	async shutdown(signal: string): Promise<void> {
		if (this.shuttingDown) {
			logger.warn("Shutdown already in progress, forcing exit");
			this.exit(1);
			return;
		}

		this.shuttingDown = true;
		logger.info({ signal }, "Graceful shutdown initiated");

		const forceExit = setTimeout(() => {
			logger.error("Graceful shutdown timed out, forcing exit");
			this.exit(1);
		}, this.timeoutMs);
		forceExit.unref();

		for (const { name, handler } of [...this.handlers].reverse()) {
			try {
				logger.info({ handler: name }, "Closing");
				await handler();
			} catch (error) {
				logger.error({ err: error, handler: name }, "Shutdown handler failed");
			}
		}

		clearTimeout(forceExit);
		logger.info("Graceful shutdown complete");
		this.exit(0);
	}

	/**
	 * Hook process signals and fatal errors.
	 */
	listen(): void {
		const run = (signal: string) => {
			this.shutdown(signal).catch((error: unknown) => {
				logger.fatal({ err: error }, "Error during shutdown");
				this.exit(1);
			});
		};

		process.on("SIGTERM", () => run("SIGTERM"));
		process.on("SIGINT", () => run("SIGINT"));

		process.on("uncaughtException", (error) => {
			logger.fatal({ err: error }, "Uncaught exception");
			run("uncaughtException");
		});

		// Logged only; a stray rejection should not take the scheduler down
		process.on("unhandledRejection", (reason) => {
			logger.error({ reason }, "Unhandled rejection");
		});

		logger.debug("Shutdown handlers initialized");
	}
}
