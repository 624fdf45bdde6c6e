import { z } from 'zod'
import { ConfigurationException } from './exceptions.js'
import { LogLevel, logLevelFromName } from './log.js'

/**
 * The portal refuses sessions from clients it does not recognise as a browser. The value
 * matches what the portal accepted at the time of writing; confirm it against the live
 * portal when logins start failing.
 */
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36'

export const DEFAULT_LOGIN_PATH = 'default.php'
export const DEFAULT_DATA_PATH = 'getdata.php'

const relativePath = z.string().trim().min(1).refine(path => !/^[a-z]+:/i.test(path) && !path.startsWith('/'), {
	message: 'must be relative to the portal URL',
})

const ConfigSchema = z.object({
	url: z
		.string()
		.trim()
		.url()
		.refine(url => /^https?:\/\//i.test(url), { message: 'must be an http(s) URL' })
		.transform(url => (url.endsWith('/') ? url : `${url}/`)),
	username: z.string().min(1),
	password: z.string().min(1),

	timeout: z.coerce.number().int().positive().default(30_000),
	userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
	loginPath: relativePath.default(DEFAULT_LOGIN_PATH),
	dataPath: relativePath.default(DEFAULT_DATA_PATH),
	timeZone: z.string().min(1).default('Europe/Berlin'),
	logLevel: z
		.union([ z.nativeEnum(LogLevel), z.string() ])
		.transform((level, ctx) => {
			if(typeof level !== 'string') return level

			const parsed = logLevelFromName(level)
			if(parsed == undefined) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown log level '${level}'` })
				return z.NEVER
			}

			return parsed
		})
		.default(LogLevel.INFO),
})

export type ConfigInput = z.input<typeof ConfigSchema>
export type Config = z.output<typeof ConfigSchema>

function issuesOf(error: z.ZodError) {
	return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
}

/** Validates the `{url, username, password}` the host collects, plus optional tuning. */
export function parseConfig(input: unknown): Config {
	const result = ConfigSchema.safeParse(input)
	if(!result.success) throw new ConfigurationException('parseConfig', issuesOf(result.error))

	return result.data
}

/** Reads `INFOPOINT_*` variables. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const input: { [key: string]: string | undefined } = {
		url: env.INFOPOINT_URL,
		username: env.INFOPOINT_USERNAME,
		password: env.INFOPOINT_PASSWORD,
		timeout: env.INFOPOINT_TIMEOUT,
		userAgent: env.INFOPOINT_USER_AGENT,
		loginPath: env.INFOPOINT_LOGIN_PATH,
		dataPath: env.INFOPOINT_DATA_PATH,
		timeZone: env.INFOPOINT_TIMEZONE,
		logLevel: env.INFOPOINT_LOG_LEVEL,
	}

	for(const key of Object.keys(input)) {
		if(input[key] === '') input[key] = undefined
	}

	return parseConfig(input)
}
