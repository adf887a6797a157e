import process from 'node:process';
import { inspect } from 'node:util';
import * as winston from 'winston';

const levels = winston.config.syslog.levels;

const objectFormatter = (object: Record<string, unknown>) => {
	const entries = Object.entries(object).map(([ key, value ]) => {
		// Raw tool output is easier to read unquoted and unescaped.
		if ((key === 'stdout' || key === 'stderr') && typeof value === 'string' && value.includes('\n')) {
			return [ key, value.trimEnd().split('\n') ];
		}

		return [ key, value ];
	});

	return inspect(Object.fromEntries(entries), { breakLength: Infinity, depth: 4 });
};

export const getWinstonMessageContent = (info: Partial<winston.Logform.TransformableInfo>) => {
	const { timestamp, level, scope, message, stack, ...otherFields } = info;
	let result = typeof message === 'object' && message !== null ? objectFormatter(Object.fromEntries(Object.entries(message))) : String(message);

	if (Object.keys(otherFields).length > 0) {
		result += ` ${objectFormatter(otherFields)}`;
	}

	if (typeof stack === 'string') {
		result += `\n${stack}`;
	}

	return result;
};

export const consoleTransport = new winston.transports.Console({
	// stdout carries the measurement result.
	stderrLevels: Object.keys(levels),
});

const logger = winston.createLogger({
	levels,
	level: getLogLevel(),
	format: winston.format.combine(
		winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss Z' }),
		winston.format.printf((info: winston.Logform.TransformableInfo) => {
			const { timestamp, level, scope } = info;
			const message = getWinstonMessageContent(info);

			return `[${String(timestamp)}] [${level.toUpperCase()}] [${String(scope)}] ${message}`;
		}),
	),
	transports: [ consoleTransport ],
});

export const scopedLogger = (scope: string): winston.Logger => logger.child({ scope });

function getLogLevel () {
	const logLevel = process.env['LOG_LEVEL']?.toLowerCase();

	if (logLevel && Object.keys(levels).includes(logLevel)) {
		return logLevel;
	}

	return 'debug';
}
