/**
 * Control Core Logger
 * Winston-based structured logging
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

/**
 * Logger interface injected into core components
 */
export interface Logger {
	debug(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
	error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
	level?: LogLevel;
	service?: string;
	silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
	const service = options.service ?? 'gse-control-core';

	const logger = winston.createLogger({
		level: options.level ?? 'info',
		silent: options.silent ?? false,
		format: winston.format.combine(
			winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
			winston.format.errors({ stack: true }),
			winston.format.json()
		),
		defaultMeta: { service },
	});

	if (process.env.NODE_ENV === 'production') {
		logger.add(new winston.transports.Console());
	} else {
		logger.add(new winston.transports.Console({
			format: winston.format.combine(
				winston.format.colorize(),
				winston.format.timestamp({ format: 'HH:mm:ss' }),
				winston.format.printf(({ timestamp, level, message, service: _service, component, ...meta }) => {
					const prefix = typeof component === 'string' ? `[${component}] ` : '';
					const metaStr = Object.keys(meta).length > 0
						? ' ' + JSON.stringify(meta)
						: '';
					return `${timestamp} [${level}]: ${prefix}${message}${metaStr}`;
				})
			)
		}));
	}

	return logger;
}

/**
 * Logger that drops everything; used when no logger is injected
 */
export const noopLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
