export enum LogLevel {
	DEBUG,
	INFO,
	WARN,
	ERROR,
	FATAL,
	SILENT,
}

export type LogContext = { [key: string]: unknown }

let threshold = LogLevel.INFO

export function setLogLevel(level: LogLevel) {
	threshold = level
}

export function logLevelFromName(name: string): LogLevel | undefined {
	switch(name.trim().toLowerCase()) {
		case 'debug': return LogLevel.DEBUG
		case 'info': return LogLevel.INFO
		case 'warn':
		case 'warning': return LogLevel.WARN
		case 'error': return LogLevel.ERROR
		case 'fatal': return LogLevel.FATAL
		case 'silent':
		case 'off': return LogLevel.SILENT
		default: return undefined
	}
}

function format(tag: string, msg: string, context?: LogContext) {
	return context && Object.keys(context).length > 0 ? `[${tag}] ${msg} ${JSON.stringify(context)}` : `[${tag}] ${msg}`
}

export function debug(msg: string, context?: LogContext) {
	if(threshold <= LogLevel.DEBUG) console.debug(format('DEBUG', msg, context))
}

export function info(msg: string, context?: LogContext) {
	if(threshold <= LogLevel.INFO) console.info(format('INFO', msg, context))
}

export function warn(msg: string, context?: LogContext) {
	if(threshold <= LogLevel.WARN) console.warn(format('WARN', msg, context))
}

export function error(msg: string, context?: LogContext) {
	if(threshold <= LogLevel.ERROR) console.error(format('ERROR', msg, context))
}

export function fatal(msg: string, context?: LogContext) {
	if(threshold <= LogLevel.FATAL) console.error(format('FATAL', msg, context))
}
