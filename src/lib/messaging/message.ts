import type { Getter, Setter } from "../tracing/api.js";

export type MessageHeaders = Record<string, unknown>;

export const MESSAGE_BRAND: unique symbol = Symbol.for("function-tracing.message");

export interface Message<T = unknown> {
	readonly [MESSAGE_BRAND]: true;
	readonly payload: T;
	readonly headers: Readonly<MessageHeaders>;
}

export function createMessage<T>(payload: T, headers: MessageHeaders = {}): Message<T> {
	return Object.freeze({
		[MESSAGE_BRAND]: true as const,
		payload,
		headers: Object.freeze({ ...headers }),
	});
}

export function isMessage(value: unknown): value is Message {
	return (
		typeof value === "object" &&
		value !== null &&
		MESSAGE_BRAND in value &&
		value[MESSAGE_BRAND] === true
	);
}

/** Messages pass through; any other value becomes the payload of a message with no headers. */
export function toMessage(value: unknown): Message {
	return isMessage(value) ? value : createMessage(value);
}

// Only string-valued headers take part in propagation.
export const headerGetter: Getter<MessageHeaders> = {
	get(headers, key) {
		const value = headers[key];
		return typeof value === "string" ? value : undefined;
	},
	keys(headers) {
		return Object.keys(headers);
	},
};

export const headerSetter: Setter<MessageHeaders> = {
	set(headers, key, value) {
		headers[key] = value;
	},
};
