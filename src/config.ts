import { LogLevel, isLogLevel } from "./log.js";
import { DEFAULT_CONCURRENCY } from "./level/orchestrator.js";

export interface ToolConfig {
	logLevel: LogLevel;
	concurrency: number;
	vocabularyPath?: string;
	/** Treat `.converted.xml` files as authoritative regardless of mtimes */
	markupAuthoritative: boolean;
	force: boolean;
	/** Skip re-exporting markup of unchanged binaries */
	cache: boolean;
}

export interface ResolvedArgs {
	config: ToolConfig;
	/** Arguments that are not flags, in order */
	positionals: string[];
}

/** Flags that take a value */
const VALUE_FLAGS = new Set(["--vocab", "--concurrency"]);

function positiveInt(text: string, what: string): number {
	const n = Number(text);
	if (!Number.isInteger(n) || n < 1) throw new Error(`${what} must be a positive integer, got "${text}"`);
	return n;
}

/**
 * Flags win over environment variables.
 *   --verbose / --quiet, --vocab <file>, --concurrency <n>, --markup, --force, --no-cache
 *   FCB_LOG_LEVEL, FCB_CONCURRENCY
 */
export function resolveConfig(args: string[], env: NodeJS.ProcessEnv = process.env): ResolvedArgs {
	const config: ToolConfig = {
		logLevel: "info",
		concurrency: DEFAULT_CONCURRENCY,
		markupAuthoritative: false,
		force: false,
		cache: true
	};

	const envLevel = env.FCB_LOG_LEVEL?.toLowerCase();
	if (envLevel) {
		if (!isLogLevel(envLevel)) throw new Error(`FCB_LOG_LEVEL must be debug|info|warn|error|silent, got "${env.FCB_LOG_LEVEL}"`);
		config.logLevel = envLevel;
	}
	if (env.FCB_CONCURRENCY) config.concurrency = positiveInt(env.FCB_CONCURRENCY, "FCB_CONCURRENCY");

	const positionals: string[] = [];
	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (VALUE_FLAGS.has(arg)) {
			const value = args[++i];
			if (value === undefined) throw new Error(`${arg} needs a value`);
			if (arg === "--vocab") {
				config.vocabularyPath = value;
			} else {
				config.concurrency = positiveInt(value, "--concurrency");
			}
		} else if (arg === "--verbose" || arg === "-v") {
			config.logLevel = "debug";
		} else if (arg === "--quiet" || arg === "-q") {
			config.logLevel = "warn";
		} else if (arg === "--markup") {
			config.markupAuthoritative = true;
		} else if (arg === "--force") {
			config.force = true;
		} else if (arg === "--no-cache") {
			config.cache = false;
		} else if (arg.startsWith("--")) {
			throw new Error(`Unknown option ${arg}`);
		} else {
			positionals.push(arg);
		}
	}
	return { config, positionals };
}
