import { fatal, LogContext } from './log.js'

/************\
| Exceptions |
\************/

export enum ExceptionLevel {
	Debug,
	Info,
	Warn,
	Error,
	Fatal,
}

export class Exception extends Error {
	public override name = 'Exception'

	public readonly func: string
	public readonly details: LogContext

	public level?: ExceptionLevel

	constructor(func: string, message: string, details: LogContext = {}) {
		super(message)

		this.func = func
		this.details = details
	}
}

/** A field, row or whole document that could not be extracted. */
export class ParserException extends Exception {
	public override name = 'ParserException'
}

/** The portal rejected the credentials, or answered the login in a shape we do not understand. */
export class AuthenticationException extends Exception {
	public override name = 'AuthenticationException'
}

export class NetworkException extends Exception {
	public override name = 'NetworkException'

	public readonly url: string
	public readonly status?: number
	public readonly code?: string

	constructor(func: string, url: string, message: string, options: { status?: number, code?: string } = {}) {
		super(func, message, { url, status: options.status, code: options.code })

		this.url = url
		this.status = options.status
		this.code = options.code
	}
}

/** The portal answered a data request with its login page. Consumed by the coordinator. */
export class SessionExpiredException extends Exception {
	public override name = 'SessionExpiredException'
}

export class CancelledException extends Exception {
	public override name = 'CancelledException'
}

export class ConfigurationException extends Exception {
	public override name = 'ConfigurationException'

	public readonly issues: string[]

	constructor(func: string, issues: string[]) {
		super(func, `Configuration invalid:\n${issues.map(issue => `  ${issue}`).join('\n')}`)

		this.issues = issues
	}
}

export class JavaScriptException extends Exception {
	public override name = 'JavaScriptException'
}

export function wrapException(func: string, exception: unknown): Exception {
	if(exception instanceof Exception) return exception
	if(exception instanceof Error) return new JavaScriptException(func, exception.message, { cause: exception.name })
	return new JavaScriptException(func, `${exception}`)
}

/*******************\
| Utility Functions |
\*******************/

function describe(exception: Exception) {
	return `${exception.func}: ${exception.message}`
}

export function assert(condition: unknown, exception: Exception): asserts condition {
	if(!condition) throw exception
}

export function assertFatal(condition: unknown, exception: Exception): asserts condition {
	if(!condition) {
		exception.level = ExceptionLevel.Fatal
		fatal(describe(exception), exception.details)
		throw exception
	}
}
