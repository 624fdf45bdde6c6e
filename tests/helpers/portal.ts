import { readFileSync } from 'node:fs'
import type { RequestOptions, Response } from '../../src/env.js'
import { CancelledException, NetworkException } from '../../src/exceptions.js'

export const BASE_URL = 'https://portal.example.org/hip/'

export const DASHBOARD_HTML = readFileSync(new URL('../fixtures/dashboard.html', import.meta.url), 'utf8')

export const LOGIN_PAGE = `<!DOCTYPE html>
<html><body>
<h1>Home.InfoPoint</h1>
<form method="post" action="index.php">
<input type="text" name="username" value="">
<input type="password" name="password" value="">
<input type="hidden" name="token" value="abc123">
<input type="checkbox" name="remember" value="1">
<input type="submit" name="login" value="Anmelden">
</form>
</body></html>`

const HOME_PAGE = '<html><body><p>Willkommen</p><a href="logout.php">Abmelden</a></body></html>'
const REJECTED_PAGE = '<html><body><p>Benutzername oder Passwort falsch.</p></body></html>'

export type PortalCall = {
	url: string
	method: string
	headers: { [key: string]: string }
	body?: string
}

/**
 * In-process stand-in for the portal: issues a session cookie with its login page, accepts
 * the login form, and serves the dashboard to authenticated sessions.
 */
export class FakePortal {
	username = 'student'
	password = 'test-password'

	loginPage = LOGIN_PAGE
	dashboard = DASHBOARD_HTML

	/** `inline` answers the login POST with the home page, `redirect` sends a 302 to it. */
	loginReply: 'inline' | 'redirect' = 'inline'
	/** Where a rejected login is redirected; answered inline with an error text otherwise. */
	rejectRedirect?: string
	issueCookies = true

	/** Every data request answers with a redirect to the login page. */
	alwaysExpire = false
	/** Answer to data requests after the session was dropped, until the next successful login. */
	droppedReply?: { status: number, content: string }
	dataStatus = 200
	failData = false
	hangData = false

	calls: PortalCall[] = []
	logins = 0
	dataRequests = 0

	private sessions = new Map<string, boolean>()
	private counter = 0
	private waiters: (() => void)[] = []

	/** Drops every server-side session. */
	expire() {
		this.sessions.clear()
	}

	/** Resolves once the next data request has reached the portal. */
	dataRequested() {
		return new Promise<void>(resolve => this.waiters.push(resolve))
	}

	transport = async (url: string, options: RequestOptions = {}): Promise<Response> => {
		if(options.signal?.aborted) throw new CancelledException('request', `${url}: ABORTED`)

		const method = options.method ?? 'GET'
		const headers = options.headers ?? {}
		this.calls.push({ url, method, headers, body: options.body })

		if(!headers['User-Agent']) return this.reply(url, 403, 'Forbidden')

		const path = new URL(url).pathname.replace(/^\/hip\//, '')
		const sid = /PHPSESSID=([^;]+)/.exec(headers['Cookie'] ?? '')?.[1]

		if(path === 'default.php' && method === 'GET') {
			if(sid && this.sessions.get(sid)) return this.reply(url, 200, HOME_PAGE)
			if(sid || !this.issueCookies) return this.reply(url, 200, this.loginPage)

			const id = `sid${++this.counter}`
			this.sessions.set(id, false)
			return this.reply(url, 200, this.loginPage, {}, [ `PHPSESSID=${id}; path=/` ])
		}

		if(path === 'index.php' && method === 'POST') {
			this.logins++

			const form = new URLSearchParams(options.body ?? '')
			if(form.get('username') !== this.username || form.get('password') !== this.password) {
				if(this.rejectRedirect) return this.reply(url, 302, '', { location: this.rejectRedirect })
				return this.reply(url, 200, REJECTED_PAGE)
			}

			if(sid) this.sessions.set(sid, true)
			this.droppedReply = undefined
			if(this.loginReply === 'redirect') return this.reply(url, 302, '', { location: 'default.php' })
			return this.reply(url, 200, HOME_PAGE)
		}

		if(path === 'getdata.php' && method === 'GET') {
			this.dataRequests++
			this.waiters.splice(0).forEach(resolve => resolve())

			if(this.failData) throw new NetworkException('request', url, `${url}: ECONNREFUSED`, { code: 'ECONNREFUSED' })
			if(this.hangData) return this.hang(url, options.signal)
			if(this.droppedReply) return this.reply(url, this.droppedReply.status, this.droppedReply.content)
			if(this.alwaysExpire || !sid || !this.sessions.get(sid)) return this.reply(url, 302, '', { location: 'default.php' })

			return this.reply(url, this.dataStatus, this.dataStatus == 200 ? this.dashboard : 'Internal Server Error')
		}

		return this.reply(url, 404, 'Not Found')
	}

	private hang(url: string, signal: AbortSignal | undefined) {
		return new Promise<Response>((_, reject) => {
			signal?.addEventListener('abort', () => reject(new CancelledException('request', `${url}: ABORTED`)))
		})
	}

	private reply(url: string, status: number, content: string, headers: { [key: string]: string } = {}, cookies: string[] = []): Response {
		return { url, status, content, headers, cookies: this.issueCookies ? cookies : [] }
	}
}
