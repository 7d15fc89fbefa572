// Hex <-> unsigned bigint conversions for OpenTelemetry ids.

const U64_MASK = (1n << 64n) - 1n;
const HEX_RE = /^[0-9a-f]*$/i;

export function longFromBase16(hex: string, offset = 0): bigint {
	const chunk = hex.slice(offset, offset + 16);
	if (chunk.length !== 16 || !HEX_RE.test(chunk)) {
		throw new RangeError(`expected 16 hex chars at offset ${offset}: ${hex}`);
	}
	return BigInt(`0x${chunk}`);
}

export function base16FromLong(value: bigint): string {
	if (value < 0n || value > U64_MASK) {
		throw new RangeError(`not an unsigned 64-bit id: ${value}`);
	}
	return value.toString(16).padStart(16, "0");
}

export function traceIdFromLongs(high: bigint, low: bigint): string {
	return base16FromLong(high) + base16FromLong(low);
}

export function spanIdFromLong(value: bigint): string {
	return base16FromLong(value);
}

export function bigintFromHex(hex: string): bigint {
	if (hex.length === 0 || !HEX_RE.test(hex)) {
		throw new RangeError(`not a hex id: ${hex}`);
	}
	return BigInt(`0x${hex}`);
}
