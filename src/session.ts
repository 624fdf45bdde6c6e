import { CookieJar } from 'tough-cookie'
import { DOMObject, request, RequestOptions, Response, Transport } from './env.js'
import { assert, AuthenticationException, CancelledException, NetworkException, SessionExpiredException, wrapException } from './exceptions.js'
import { debug, info } from './log.js'
import { Credentials } from './types.js'

export enum SessionState {
	UNAUTHENTICATED = 'UNAUTHENTICATED',
	AUTHENTICATED = 'AUTHENTICATED',
	EXPIRED = 'EXPIRED',
}

export type SessionOptions = {
	timeout: number
	/** Client identification the portal insists on. */
	userAgent: string
	loginPath: string
}

const LOGOUT_MARKERS = [ 'Abmelden', 'Logout' ]
const FAILURE_MARKERS = [ 'fehler', 'falsch', 'nicht erfolgreich' ]
const PASSWORD_INPUT = /<input\b[^>]*\btype\s*=\s*["']?password/i

const MAX_REDIRECTS = 5

function hasLogoutMarker(content: string) {
	return LOGOUT_MARKERS.some(marker => content.includes(marker))
}

/** False for an empty body, or a document whose `<body>` holds no text or elements. */
function hasPageContent(content: string) {
	if(!content.trim()) return false

	const body = /<body\b[^>]*>([\s\S]*?)(?:<\/body>|$)/i.exec(content)
	if(!body) return true

	return body[1].replace(/<!--[\s\S]*?-->/g, '').trim().length > 0
}

function isRedirect(response: Response) {
	return response.status >= 300 && response.status < 400 && !!response.headers['location']
}

/*********\
| Session |
\*********/

export class Session {
	/**************\
	| Account Data |
	\**************/

	private readonly credentials: Readonly<Credentials>
	private readonly options: SessionOptions
	private readonly transport: Transport

	public constructor(credentials: Credentials, options: SessionOptions, transport: Transport = request) {
		this.credentials = Object.freeze({ ...credentials })
		this.options = options
		this.transport = transport
	}

	/**************\
	| Session Data |
	\**************/

	private jar = new CookieJar()
	private _state = SessionState.UNAUTHENTICATED
	private _establishedAt?: number
	private generation = 0

	public get state() { return this._state }
	public get establishedAt() { return this._establishedAt }

	private url(path: string) {
		return new URL(path, this.credentials.url).href
	}

	/****************\
	| State Locking |
	\****************/

	private stateLockQueue: [ (key: symbol) => void, (reason: Error) => void ][] = []
	private stateLock?: symbol

	private acquireStateLock() {
		if(!this.stateLock) {
			this.stateLock = Symbol()
			return Promise.resolve(this.stateLock)
		}

		return new Promise<symbol>((resolve, reject) => this.stateLockQueue.push([ resolve, reject ]))
	}

	private releaseStateLock(key: symbol) {
		if(key !== this.stateLock) return

		const next = this.stateLockQueue.shift()
		if(next) {
			const handoff = Symbol()
			this.stateLock = handoff
			next[0](handoff)
		} else this.stateLock = undefined
	}

	/******************\
	| Request Handling |
	\******************/

	private closed = false
	private controller = new AbortController()

	private async send(url: string, options: RequestOptions = {}) {
		assert(!this.closed, new CancelledException('send', 'Session closed'))

		const cookie = await this.jar.getCookieString(url)

		const response = await this.transport(url, {
			...options,
			headers: {
				'User-Agent': this.options.userAgent,
				...(cookie ? { 'Cookie': cookie } : {}),
				...options.headers,
			},
			timeout: this.options.timeout,
			signal: this.controller.signal,
		})

		for(const header of response.cookies) await this.jar.setCookie(header, url, { ignoreError: true })

		return response
	}

	/** Follows redirects by hand so every hop's cookies land in the jar. */
	private async follow(response: Response, visited: string[] = []) {
		let hops = 0

		while(isRedirect(response)) {
			assert(hops++ < MAX_REDIRECTS, new NetworkException('follow', response.url, `${response.url}: TOO MANY REDIRECTS`, { status: response.status }))

			const target = new URL(response.headers['location'], response.url).href
			visited.push(target)
			response = await this.send(target)
		}

		return response
	}

	/*******************\
	| Session Lifecycle |
	\*******************/

	public async login() {
		const stateLock = await this.acquireStateLock()

		try {
			await this.performLogin()
		} finally {
			this.releaseStateLock(stateLock)
		}
	}

	/**
	 * Returns once the session is authenticated. An unauthenticated or expired session gets
	 * exactly one login attempt; callers queued behind that attempt reuse its outcome when
	 * it succeeded.
	 */
	public async ensureAuthenticated() {
		if(this._state === SessionState.AUTHENTICATED) return

		const stateLock = await this.acquireStateLock()

		try {
			if(this.state === SessionState.AUTHENTICATED) return

			await this.performLogin()
		} finally {
			this.releaseStateLock(stateLock)
		}
	}

	/** Abandons in-flight requests; the session cannot be used afterwards. */
	public close() {
		if(this.closed) return

		this.closed = true
		this.controller.abort()

		const waiting = this.stateLockQueue
		this.stateLockQueue = []
		waiting.forEach(([ , reject ]) => reject(new CancelledException('close', 'Session closed')))

		this.handleLogout()
	}

	private async performLogin() {
		const reauthenticating = this._state === SessionState.EXPIRED

		this.handleLogout()
		await this.jar.removeAllCookies()

		info(reauthenticating ? 'Session expired, logging in again' : 'Logging in', { url: this.credentials.url })

		try {
			await this.handshake()
			assert(!this.closed, new CancelledException('login', 'Session closed'))
		} catch(e) {
			const exception = wrapException('login', e)
			debug('Login failed', { reason: exception.message, ...exception.details })

			this.handleLogout()
			throw exception
		}

		this._state = SessionState.AUTHENTICATED
		this._establishedAt = Date.now()
		this.generation++

		info('Login successful')
	}

	private async handshake() {
		const loginUrl = this.url(this.options.loginPath)

		const page = await this.follow(await this.send(loginUrl))
		assert(page.status == 200, new AuthenticationException('login', `Login page answered ${page.status}`, { url: page.url, status: page.status }))

		const [ form ] = DOMObject.parse(page.content).querySelector('form')
		assert(!!form, new AuthenticationException('login', 'No login form on page', { url: page.url }))

		const action = form.getAttribute('action')
		const postUrl = action ? new URL(action, page.url).href : page.url
		const fields = this.formFields(form)

		debug('Submitting login form', { action: postUrl, fields: Array.from(fields.keys()) })

		const visited = [ postUrl ]
		const response = await this.follow(await this.send(postUrl, {
			method: 'POST',
			body: new URLSearchParams(Array.from(fields)).toString(),
			headers: { 'Content-Type': 'application/x-www-form-urlencoded', 'Referer': page.url },
		}), visited)

		if(hasLogoutMarker(response.content)) {
			await this.assertSessionCookie()
			return
		}

		const lower = response.content.toLowerCase()
		const failure = FAILURE_MARKERS.find(marker => lower.includes(marker))
		assert(!failure, new AuthenticationException('login', 'Portal rejected the credentials', { marker: failure }))

		const errorUrl = visited.find(url => /[?&](err|error)=/.test(url))
		assert(!errorUrl, new AuthenticationException('login', 'Portal redirected to an error page', { url: errorUrl }))

		const check = await this.follow(await this.send(loginUrl))
		assert(check.status == 200 && hasLogoutMarker(check.content), new AuthenticationException('login', 'Login was not confirmed by the portal', { url: check.url, status: check.status }))

		await this.assertSessionCookie()
	}

	private async assertSessionCookie() {
		const cookies = await this.jar.getCookies(this.credentials.url)
		assert(cookies.length > 0, new AuthenticationException('login', 'Portal did not issue a session cookie'))
	}

	/**
	 * Fills the login form the way a browser user would: username and password go into
	 * the fields named like them, everything else keeps the value the portal rendered.
	 */
	private formFields(form: DOMObject) {
		const fields = new Map<string, string>()

		let usernameSet = false
		let passwordSet = false

		for(const input of form.querySelector('input')) {
			const name = input.getAttribute('name')
			if(!name) continue

			const type = input.getAttribute('type').toLowerCase()
			const lower = name.toLowerCase()

			if((type === 'checkbox' || type === 'radio') && !input.hasAttribute('checked')) continue

			if(type === 'submit' || type === 'hidden') {
				fields.set(name, input.getAttribute('value'))
			} else if(lower.includes('pass') || type === 'password') {
				fields.set(name, this.credentials.password)
				passwordSet = true
			} else if(lower.includes('user') || lower.includes('login')) {
				fields.set(name, this.credentials.username)
				usernameSet = true
			} else {
				fields.set(name, input.getAttribute('value'))
			}
		}

		if(!usernameSet) fields.set('username', this.credentials.username)
		if(!passwordSet) fields.set('password', this.credentials.password)
		if(!fields.has('login')) fields.set('login', 'Anmelden')

		return fields
	}

	private handleLogout() {
		this._state = SessionState.UNAUTHENTICATED
		this._establishedAt = undefined
	}

	/****************\
	| Fetching Pages |
	\****************/

	private isLoggedOut(response: Response) {
		if(response.status == 401 || response.status == 403) return true
		if(response.status >= 300 && response.status < 400) return true
		if(response.status == 200 && !hasPageContent(response.content)) return true

		return PASSWORD_INPUT.test(response.content)
	}

	/**
	 * GETs a page with the session's cookies. A login page, redirect, 401/403 or a page without
	 * any content in reply marks the session expired, unless a newer login already replaced the
	 * session this request used.
	 */
	public async fetchPage(path: string) {
		assert(this._state === SessionState.AUTHENTICATED, new SessionExpiredException('fetchPage', 'Not logged in', { state: this._state }))

		const generation = this.generation
		const url = this.url(path)
		const response = await this.send(url)

		if(this.isLoggedOut(response)) {
			if(generation === this.generation && this._state === SessionState.AUTHENTICATED) this._state = SessionState.EXPIRED

			debug('Session expired', { url, status: response.status, location: response.headers['location'] })
			throw new SessionExpiredException('fetchPage', 'Portal answered with its login page', { url, status: response.status })
		}

		assert(response.status == 200, new NetworkException('fetchPage', url, `${url}: ${response.status}`, { status: response.status }))

		return response.content
	}
}
