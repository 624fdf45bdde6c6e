import { Config } from './config.js'
import { request, Transport } from './env.js'
import { assert, AuthenticationException, CancelledException, Exception, SessionExpiredException, wrapException } from './exceptions.js'
import { error, info, setLogLevel, warn } from './log.js'
import { Parser } from './parser.js'
import { Session } from './session.js'
import { buildSnapshot } from './summary.js'
import { Snapshot } from './types.js'

export type SnapshotListener = (snapshot: Snapshot) => void

/**
 * Owns one portal account. `refresh()` logs in when needed, fetches the dashboard, and
 * publishes a new frozen {@link Snapshot}. A failed refresh keeps the previous snapshot
 * and records the failure in `lastError`.
 */
export class Coordinator {
	private readonly config: Config
	private readonly session: Session

	private _snapshot?: Snapshot
	private _lastError?: Exception
	private inFlight?: Promise<Snapshot>
	private listeners = new Set<SnapshotListener>()
	private closed = false

	public constructor(config: Config, transport: Transport = request) {
		this.config = config
		this.session = new Session(config, { timeout: config.timeout, userAgent: config.userAgent, loginPath: config.loginPath }, transport)

		setLogLevel(config.logLevel)
	}

	public get snapshot() { return this._snapshot }
	public get lastError() { return this._lastError }
	public get sessionState() { return this.session.state }

	public subscribe(listener: SnapshotListener) {
		this.listeners.add(listener)
		return () => { this.listeners.delete(listener) }
	}

	/** Concurrent calls share the cycle already running. */
	public refresh(): Promise<Snapshot> {
		if(!this.inFlight) {
			this.inFlight = this.runCycle().finally(() => {
				this.inFlight = undefined
			})
		}

		return this.inFlight
	}

	/** Logs in once to check the credentials; resolves with the entry title. */
	public async verify() {
		assert(!this.closed, new CancelledException('verify', 'Coordinator closed'))

		await this.session.ensureAuthenticated()
		return this.config.username
	}

	public close() {
		this.closed = true
		this.listeners.clear()
		this.session.close()
	}

	private async runCycle() {
		try {
			assert(!this.closed, new CancelledException('refresh', 'Coordinator closed'))

			const html = await this.fetchDashboard()

			const parsed = Parser.parseDashboard(html, this.config.timeZone)
			const fatal = parsed.fatal
			if(fatal) throw fatal

			const snapshot = buildSnapshot(parsed)

			assert(!this.closed, new CancelledException('refresh', 'Coordinator closed'))

			this._snapshot = snapshot
			this._lastError = undefined

			info('Refresh finished', { subjects: Object.keys(snapshot.subjects).length, absorbed: parsed.exceptions.length })

			this.notify(snapshot)

			return snapshot
		} catch(e) {
			const exception = wrapException('refresh', e)
			this._lastError = exception

			error(`Refresh failed: ${exception.message}`, { type: exception.name })
			throw exception
		}
	}

	private async fetchDashboard() {
		await this.session.ensureAuthenticated()

		try {
			return await this.session.fetchPage(this.config.dataPath)
		} catch(e) {
			if(!(e instanceof SessionExpiredException)) throw e
		}

		await this.session.ensureAuthenticated()

		try {
			return await this.session.fetchPage(this.config.dataPath)
		} catch(e) {
			if(e instanceof SessionExpiredException) throw new AuthenticationException('refresh', 'Session expired again right after logging in', e.details)
			throw e
		}
	}

	private notify(snapshot: Snapshot) {
		for(const listener of this.listeners) {
			try {
				listener(snapshot)
			} catch(e) {
				warn(`Snapshot listener failed: ${wrapException('notify', e).message}`)
			}
		}
	}
}
