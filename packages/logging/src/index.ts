import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { DestinationStream, Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export const LogLevel = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
	FATAL: 'fatal',
	SILENT: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	/** Log level */
	level: LogLevel;
	/** Service name for structured logs */
	serviceName: string;
	/** Whether to use pretty printing (dev only) */
	pretty?: boolean;
	/** Additional base context */
	base?: Record<string, unknown>;
	/** Paths censored in every log line (default: DEFAULT_REDACT_PATHS) */
	redact?: readonly string[];
	/** Output stream when not pretty printing (default: stdout) */
	destination?: DestinationStream;
}

/**
 * Credentials that may end up in logged request data or entry metadata.
 */
export const DEFAULT_REDACT_PATHS: readonly string[] = [
	'req.headers.authorization',
	'req.headers.cookie',
	'*.password',
	'*.token',
	'*.secret',
];

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		redact: { paths: [...(config.redact ?? DEFAULT_REDACT_PATHS)], censor: '[REDACTED]' },
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Child logger scoped to one engine component (recorder, observer, interceptor...).
 * The component name is what operators filter on when chasing dropped entries.
 */
export function createComponentLogger(parent: Logger, component: string, bindings: Record<string, unknown> = {}): Logger {
	return parent.child({ component, ...bindings });
}

let defaultLogger: Logger = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

/**
 * Replace the process default logger (done once at bootstrap).
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

export function getLogger(): Logger {
	return defaultLogger;
}

/**
 * Silent logger for tests and tooling that must not write to stdout.
 */
export function createSilentLogger(): Logger {
	return pino({ level: 'silent' });
}
