import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors = result.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Reusable environment variable schemas.
 *
 * `.prefault()` supplies the raw string default so the transform still runs.
 */
export const CommonEnvSchemas = {
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	optionalUrl: z.url().optional(),

	stringArray: z
		.string()
		.transform((v) =>
			v
				.split(',')
				.map((s) => s.trim())
				.filter((s) => s.length > 0),
		)
		.prefault(''),
};

/**
 * Environment consumed by the action log engine.
 */
export const ActionLogEnvSchema = z.object({
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,
	DATABASE_URL: CommonEnvSchemas.optionalUrl,
	/** Run every recordAsync inline (tests, scripts) */
	ACTION_LOG_SYNC: CommonEnvSchemas.boolean,
	/** Concurrent background writers */
	ACTION_LOG_CONCURRENCY: CommonEnvSchemas.positiveInt.prefault('4'),
	/** Background writes allowed to wait before new ones are dropped */
	ACTION_LOG_BACKLOG: CommonEnvSchemas.positiveInt.prefault('1000'),
	/** Extra entity type tags the observer must never log */
	ACTION_LOG_IGNORED_TYPES: CommonEnvSchemas.stringArray,
});

export type ActionLogEnv = z.infer<typeof ActionLogEnvSchema>;

/**
 * Engine settings derived from the environment.
 */
export interface ActionLogConfig {
	readonly logLevel: ActionLogEnv['LOG_LEVEL'];
	readonly logPretty: boolean;
	readonly databaseUrl: string | undefined;
	readonly syncMode: boolean;
	readonly concurrency: number;
	readonly backlog: number;
	readonly ignoredTypes: readonly string[];
}

export function loadActionLogConfig(env: Record<string, string | undefined> = process.env): ActionLogConfig {
	const parsed = parseEnv(ActionLogEnvSchema, env);

	return {
		logLevel: parsed.LOG_LEVEL,
		logPretty: parsed.LOG_PRETTY,
		databaseUrl: parsed.DATABASE_URL,
		syncMode: parsed.ACTION_LOG_SYNC,
		concurrency: parsed.ACTION_LOG_CONCURRENCY,
		backlog: parsed.ACTION_LOG_BACKLOG,
		ignoredTypes: parsed.ACTION_LOG_IGNORED_TYPES,
	};
}
