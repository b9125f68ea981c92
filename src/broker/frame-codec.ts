/**
 * Broker push-stream frame codec.
 *
 * Requests go out as `<endpoint>\n<id>\n\n<body>`. Server frames are one of
 * `o` (open), `h` (heartbeat), `c[code,"reason"]` (close) or `a[...]`, an
 * array of request responses `{ s, i, d }` and entity events
 * `{ e: "props", d: { entityType, eventType, entity } }`. Fill, position and
 * order entities become BrokerEvents; everything else is counted and skipped.
 */

import { ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { accountId, fillId, orderId, symbolId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { OrderSide } from "../shared/side.js";
import { OrderStatus } from "./types.js";
import type { BrokerEvent } from "./types.js";

// ── Outgoing ─────────────────────────────────────────────────────────

export function encodeRequest(endpoint: string, id: number, body = ""): string {
	return `${endpoint}\n${id}\n\n${body}`;
}

export function encodeAuthorize(id: number, accessToken: string): string {
	return encodeRequest("authorize", id, accessToken);
}

export function encodeSyncRequest(id: number, userIds: readonly number[] = []): string {
	const body = userIds.length > 0 ? { users: userIds } : {};
	return encodeRequest("user/syncrequest", id, JSON.stringify(body));
}

/** Client heartbeat, sent in reply to a server `h` frame. */
export const HEARTBEAT_FRAME = "[]";

// ── Incoming ─────────────────────────────────────────────────────────

export interface BrokerResponse {
	readonly status: number;
	readonly requestId: number;
	readonly data: unknown;
}

export type DecodedFrame =
	| { readonly kind: "open" }
	| { readonly kind: "heartbeat" }
	| { readonly kind: "close"; readonly code: number; readonly reason: string }
	| {
			readonly kind: "messages";
			readonly responses: readonly BrokerResponse[];
			readonly events: readonly BrokerEvent[];
			/** Items that were not a response or a recognised entity */
			readonly skipped: number;
	  };

const entityId = z.union([z.number().int(), z.string().min(1)]).transform((v) => String(v));
const price = z.union([z.number(), z.string()]).transform((v, ctx) => {
	const n = Number(v);
	if (!Number.isFinite(n) || n <= 0) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: "price must be a positive number" });
		return z.NEVER;
	}
	return String(v);
});
const timestamp = z.union([z.number(), z.string()]).transform((v, ctx) => {
	const ms = typeof v === "number" ? v : Date.parse(v);
	if (!Number.isFinite(ms)) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid timestamp" });
		return z.NEVER;
	}
	return ms;
});

const fillEntity = z.object({
	id: entityId,
	orderId: entityId,
	accountId: entityId,
	symbol: z.string().min(1),
	action: z.enum(["Buy", "Sell"]),
	qty: z.number().int().positive(),
	price,
	timestamp,
});

const positionEntity = z.object({
	accountId: entityId,
	symbol: z.string().min(1),
	netPos: z.number().int(),
});

const orderEntity = z.object({
	id: entityId,
	accountId: entityId,
	ordStatus: z.string(),
	rejectReason: z.string().optional(),
});

const propsEvent = z.object({
	e: z.literal("props"),
	d: z.object({
		entityType: z.string(),
		eventType: z.string().optional(),
		entity: z.unknown(),
	}),
});

const response = z.object({
	s: z.number().int(),
	i: z.number().int(),
	d: z.unknown().optional(),
});

const closeBody = z.tuple([z.number().int(), z.string()]);

const ORDER_STATUS: Readonly<Record<string, OrderStatus>> = {
	Working: OrderStatus.Working,
	Filled: OrderStatus.Filled,
	Canceled: OrderStatus.Canceled,
	Rejected: OrderStatus.Rejected,
};

function parseJson(raw: string): Result<unknown, ValidationError> {
	try {
		return ok(JSON.parse(raw));
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ValidationError("Malformed broker frame", [{ path: [], message }]));
	}
}

function toEvent(entityType: string, entity: unknown): BrokerEvent | null {
	switch (entityType) {
		case "fill": {
			const parsed = fillEntity.safeParse(entity);
			if (!parsed.success) return null;
			const f = parsed.data;
			return {
				type: "fill",
				fill: {
					fillId: fillId(f.id),
					orderId: orderId(f.orderId),
					accountId: accountId(f.accountId),
					symbol: symbolId(f.symbol),
					side: f.action === "Buy" ? OrderSide.Buy : OrderSide.Sell,
					quantity: f.qty,
					price: Decimal.from(f.price),
					timestampMs: f.timestamp,
				},
			};
		}
		case "position": {
			const parsed = positionEntity.safeParse(entity);
			if (!parsed.success) return null;
			return {
				type: "position_snapshot",
				accountId: accountId(parsed.data.accountId),
				symbol: symbolId(parsed.data.symbol),
				quantity: parsed.data.netPos,
			};
		}
		case "order": {
			const parsed = orderEntity.safeParse(entity);
			if (!parsed.success) return null;
			const status = ORDER_STATUS[parsed.data.ordStatus];
			if (status === undefined) return null;
			if (status === OrderStatus.Rejected) {
				return {
					type: "order_rejected",
					accountId: accountId(parsed.data.accountId),
					orderId: orderId(parsed.data.id),
					reason: parsed.data.rejectReason ?? "Rejected",
				};
			}
			return {
				type: "order_status",
				accountId: accountId(parsed.data.accountId),
				orderId: orderId(parsed.data.id),
				status,
			};
		}
		default:
			return null;
	}
}

/** Decode one server frame. Fails only when the frame itself is malformed. */
export function decodeFrame(raw: string): Result<DecodedFrame, ValidationError> {
	const frame = raw.trim();
	if (frame === "o") return ok({ kind: "open" });
	if (frame === "h") return ok({ kind: "heartbeat" });

	if (frame.startsWith("c")) {
		const body = parseJson(frame.slice(1));
		if (!body.ok) return body;
		const close = validate(closeBody, body.value, "Malformed close frame");
		if (!close.ok) return close;
		return ok({ kind: "close", code: close.value[0], reason: close.value[1] });
	}

	if (!frame.startsWith("a")) {
		return err(
			new ValidationError("Unknown broker frame", [{ path: [], message: frame.slice(0, 32) }]),
		);
	}

	const body = parseJson(frame.slice(1));
	if (!body.ok) return body;
	const items = validate(z.array(z.unknown()), body.value, "Malformed message frame");
	if (!items.ok) return items;

	const responses: BrokerResponse[] = [];
	const events: BrokerEvent[] = [];
	let skipped = 0;
	for (const item of items.value) {
		const event = propsEvent.safeParse(item);
		if (event.success) {
			const mapped = toEvent(event.data.d.entityType, event.data.d.entity);
			if (mapped === null) {
				skipped++;
			} else {
				events.push(mapped);
			}
			continue;
		}
		const res = response.safeParse(item);
		if (res.success) {
			responses.push({ status: res.data.s, requestId: res.data.i, data: res.data.d });
			continue;
		}
		skipped++;
	}
	return ok({ kind: "messages", responses, events, skipped });
}
