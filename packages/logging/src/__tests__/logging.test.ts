import { describe, it, expect, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { createLogger, createComponentLogger, createSilentLogger, getLogger, setDefaultLogger, LogLevel } from '../index.js';

describe('logging', () => {
	const original = getLogger();

	afterEach(() => {
		setDefaultLogger(original);
	});

	it('should create a logger at the configured level', () => {
		const logger = createLogger({ level: LogLevel.DEBUG, serviceName: 'action-log-test' });
		expect(logger.level).toBe('debug');
	});

	it('should bind the component name on child loggers', () => {
		const parent = createLogger({ level: LogLevel.INFO, serviceName: 'action-log-test' });
		const child = createComponentLogger(parent, 'recorder', { queue: 'background' });
		expect(child.bindings()).toMatchObject({ component: 'recorder', queue: 'background' });
	});

	it('should swap the default logger', () => {
		const silent = createSilentLogger();
		setDefaultLogger(silent);
		expect(getLogger()).toBe(silent);
		expect(getLogger().level).toBe('silent');
	});
});

describe('redaction', () => {
	function capture() {
		const lines: Record<string, unknown>[] = [];
		const destination = new Writable({
			write(chunk: Buffer, _encoding, callback) {
				lines.push(JSON.parse(chunk.toString()));
				callback();
			},
		});
		return { lines, destination };
	}

	it('should censor credentials nested one level deep', () => {
		const { lines, destination } = capture();
		const logger = createLogger({ level: LogLevel.INFO, serviceName: 'action-log-test', destination });

		logger.info({ data: { title: 'Lesson plan', password: 'test-secret' } }, 'Request body');

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({
			level: 'info',
			service: 'action-log-test',
			msg: 'Request body',
			data: { title: 'Lesson plan', password: '[REDACTED]' },
		});
	});

	it('should take custom redact paths', () => {
		const { lines, destination } = capture();
		const logger = createLogger({
			level: LogLevel.INFO,
			serviceName: 'action-log-test',
			redact: ['actor.email'],
			destination,
		});

		logger.info({ actor: { id: 7, email: 'jane@example.com' } }, 'Actor');

		expect(lines[0]).toMatchObject({ actor: { id: 7, email: '[REDACTED]' } });
	});
});
