import { describe, expect, it } from "vitest";
import { createLogger, createSilentLogger } from "./index.js";
import type { LoggerConfig } from "./index.js";

function capture(config: Omit<LoggerConfig, "destination">) {
	const lines: Record<string, unknown>[] = [];
	const logger = createLogger({
		...config,
		destination: {
			write(msg: string) {
				lines.push(JSON.parse(msg));
			},
		},
	});
	return { logger, lines };
}

const sessionToken = { __opaque: true as const, toString: () => "[REDACTED]" };

describe("createLogger", () => {
	it("writes one JSON line per call with the message and fields", () => {
		const { logger, lines } = capture({ level: "info", base: { service: "engine" } });

		logger.info({ symbol: "MYM", quantity: 2 }, "entry submitted");

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			level: 30,
			service: "engine",
			symbol: "MYM",
			quantity: 2,
			msg: "entry submitted",
		});
	});

	it("drops lines below the configured level", () => {
		const { logger, lines } = capture({ level: "warn" });

		logger.debug("poll");
		logger.info("tick");
		logger.warn("drift found");
		logger.fatal("kill switch timed out");

		expect(lines.map((l) => l["msg"])).toEqual(["drift found", "kill switch timed out"]);
		expect(lines.map((l) => l["level"])).toEqual([40, 60]);
	});

	it("carries child bindings onto every line", () => {
		const { logger, lines } = capture({ level: "info" });

		logger.child({ component: "exit" }).child({ account: "acct-1" }).error("exit rejected");

		expect(lines[0]).toMatchObject({
			component: "exit",
			account: "acct-1",
			msg: "exit rejected",
		});
	});

	it("redacts opaque credentials in fields and bindings", () => {
		const { logger, lines } = capture({ level: "info" });

		logger.info({ token: sessionToken, account: "acct-1" }, "session opened");
		logger.child({ token: sessionToken }).info("polling");

		expect(lines[0]).toMatchObject({ token: "[REDACTED]", account: "acct-1" });
		expect(lines[1]).toMatchObject({ token: "[REDACTED]", msg: "polling" });
	});

	it("censors configured paths", () => {
		const { logger, lines } = capture({ level: "info", redactPaths: ["headers.authorization"] });

		logger.info({ headers: { authorization: "Bearer test-secret", host: "broker" } }, "request");

		expect(lines[0]?.["headers"]).toEqual({ authorization: "[REDACTED]", host: "broker" });
	});
});

describe("createSilentLogger", () => {
	it("accepts every call and writes nothing", () => {
		const logger = createSilentLogger();
		expect(() => {
			logger.fatal({ account: "acct-1" }, "halted");
			logger.child({ component: "kill-switch" }).debug("poll");
		}).not.toThrow();
	});
});
