import { afterEach, describe, expect, test, vi } from "vitest";
import { type LogEntry, createStepLogger } from "../src/stepwise";

describe("createStepLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	test("stores string and object entries", () => {
		const logs: LogEntry[] = [];
		const log = createStepLogger({ stepName: "Ping", consoleOutput: false }, logs);

		log.info("started");
		log.error({ status: 500 }, "failed");

		expect(logs).toHaveLength(2);
		expect(logs[0]).toMatchObject({ level: "info", message: "started" });
		expect(logs[0]?.metadata).toBeUndefined();
		expect(logs[1]).toMatchObject({ level: "error", message: "failed", metadata: { status: 500 } });
	});

	test("mirrors to the console with the step prefix", () => {
		const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const log = createStepLogger({ stepName: "Ping" }, []);

		log.info("hello");
		log.warn({ attempt: 2 }, "slow");

		expect(info).toHaveBeenCalledWith("[Ping] hello");
		expect(warn).toHaveBeenCalledWith("[Ping] slow", { attempt: 2 });
	});

	test("debug entries are stored but not printed at the default level", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
		const logs: LogEntry[] = [];
		const log = createStepLogger({ stepName: "Ping" }, logs);

		log.debug("details");

		expect(logs).toHaveLength(1);
		expect(debug).not.toHaveBeenCalled();
	});

	test("consoleLevel lowers the threshold", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
		const log = createStepLogger({ stepName: "Ping", consoleLevel: "debug" }, []);

		log.debug("details");

		expect(debug).toHaveBeenCalledWith("[Ping] details");
	});
});
