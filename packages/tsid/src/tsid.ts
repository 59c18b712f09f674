/**
 * Time-sorted identifiers.
 *
 * 64-bit value: 42 bits of milliseconds since 2020-01-01T00:00:00Z followed by
 * a 22-bit counter that starts at a random value every millisecond. Encoded as
 * 13 characters of Crockford Base32, so lexicographic order is creation order.
 */

import crypto from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const EPOCH_MS = 1577836800000n;
const COUNTER_BITS = 22n;
const COUNTER_MASK = (1n << COUNTER_BITS) - 1n;
const LENGTH = 13;

let lastMillis = -1n;
let counter = 0n;

function randomCounter(): bigint {
	return BigInt(crypto.randomBytes(3).readUIntBE(0, 3)) & COUNTER_MASK;
}

function nextValue(): bigint {
	let millis = BigInt(Date.now()) - EPOCH_MS;

	if (millis <= lastMillis) {
		// Same (or rewound) clock tick: keep ordering by bumping the counter.
		millis = lastMillis;
		counter = (counter + 1n) & COUNTER_MASK;
		if (counter === 0n) {
			millis = lastMillis + 1n;
			counter = randomCounter();
		}
	} else {
		counter = randomCounter();
	}

	lastMillis = millis;
	return (millis << COUNTER_BITS) | counter;
}

function encode(value: bigint): string {
	let out = '';
	let rest = value;
	for (let i = 0; i < LENGTH; i++) {
		out = ALPHABET.charAt(Number(rest & 31n)) + out;
		rest >>= 5n;
	}
	return out;
}

function decode(raw: string): bigint {
	if (raw.length !== LENGTH) {
		throw new Error(`Invalid TSID length: expected ${LENGTH}, got ${raw.length}`);
	}
	let value = 0n;
	for (const char of raw.toUpperCase()) {
		const digit = ALPHABET.indexOf(char);
		if (digit < 0) {
			throw new Error(`Invalid Crockford Base32 character: ${char}`);
		}
		value = (value << 5n) | BigInt(digit);
	}
	return value;
}

/**
 * Generate a new unprefixed TSID string.
 */
export function generateRaw(): string {
	return encode(nextValue());
}

export function isValid(raw: string): boolean {
	if (raw.length !== LENGTH) {
		return false;
	}
	for (const char of raw.toUpperCase()) {
		if (!ALPHABET.includes(char)) {
			return false;
		}
	}
	return true;
}

/**
 * Creation time encoded in a TSID string.
 */
export function getTimestamp(raw: string): Date {
	return new Date(Number((decode(raw) >> COUNTER_BITS) + EPOCH_MS));
}
