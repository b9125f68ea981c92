import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type FeedEvents = {
	tick: (symbol: string, price: string) => void;
	halted: (reason: string) => void;
	ready: () => void;
};

describe("TypedEmitter", () => {
	it("delivers the emitted arguments to every handler in order", () => {
		const feed = new TypedEmitter<FeedEvents>();
		const seen: string[] = [];
		feed.on("tick", (symbol, price) => seen.push(`a:${symbol}@${price}`));
		feed.on("tick", (symbol, price) => seen.push(`b:${symbol}@${price}`));

		expect(feed.emit("tick", "MYM", "38012")).toBe(true);

		expect(seen).toEqual(["a:MYM@38012", "b:MYM@38012"]);
	});

	it("reports an emit nobody heard", () => {
		expect(new TypedEmitter<FeedEvents>().emit("ready")).toBe(false);
	});

	it("stops calling a handler removed with off", () => {
		const feed = new TypedEmitter<FeedEvents>();
		const handler = vi.fn();
		feed.on("halted", handler).off("halted", handler);

		feed.emit("halted", "kill_switch_timeout");

		expect(handler).not.toHaveBeenCalled();
	});

	it("calls a once handler a single time", () => {
		const feed = new TypedEmitter<FeedEvents>();
		const handler = vi.fn();
		feed.once("ready", handler);

		feed.emit("ready");
		feed.emit("ready");

		expect(handler).toHaveBeenCalledTimes(1);
	});

	it("returns an unsubscribe function from listen", () => {
		const feed = new TypedEmitter<FeedEvents>();
		const handler = vi.fn();
		const off = feed.listen("tick", handler);

		feed.emit("tick", "MYM", "1");
		off();
		feed.emit("tick", "MYM", "2");

		expect(handler).toHaveBeenCalledOnce();
		expect(feed.listenerCount("tick")).toBe(0);
	});

	it("removes listeners for one event or all of them", () => {
		const feed = new TypedEmitter<FeedEvents>();
		feed.on("tick", vi.fn()).on("halted", vi.fn()).on("ready", vi.fn());

		feed.removeAllListeners("tick");
		expect(feed.listenerCount("tick")).toBe(0);
		expect(feed.listenerCount("halted")).toBe(1);

		feed.removeAllListeners();
		expect(feed.listenerCount("halted")).toBe(0);
		expect(feed.listenerCount("ready")).toBe(0);
	});

	it("lets a throwing handler reach the emitter", () => {
		const feed = new TypedEmitter<FeedEvents>();
		feed.on("ready", () => {
			throw new Error("handler failed");
		});

		expect(() => feed.emit("ready")).toThrow("handler failed");
	});
});
