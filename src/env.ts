import axios, { type AxiosResponse, type Method } from 'axios'
import { JSDOM } from 'jsdom'
import { DateTime } from 'luxon'
import { CancelledException, NetworkException } from './exceptions.js'

/******\
| HTTP |
\******/

export type RequestOptions = {
	method?: Method
	headers?: { [key: string]: string }
	body?: string
	timeout?: number
	signal?: AbortSignal
}

export type Response = {
	url: string
	content: string
	status: number
	headers: { [key: string]: string }
	cookies: string[]
}

export type Transport = (url: string, options?: RequestOptions) => Promise<Response>

/**
 * Sends a single request without following redirects. Any status is returned to the
 * caller; only transport failures (timeout, refused connection, abort) are thrown.
 * `timeout` is a deadline for the whole exchange, body included.
 */
export async function request(url: string, options?: RequestOptions): Promise<Response> {
	const deadline = options?.timeout ? AbortSignal.timeout(options.timeout) : undefined
	const signals = [ options?.signal, deadline ].filter((signal): signal is AbortSignal => !!signal)

	let response: AxiosResponse<string>
	try {
		response = await axios.request<string>({
			url: url,
			method: options?.method ?? 'GET',
			headers: options?.headers,
			data: options?.body,
			timeout: options?.timeout,
			signal: signals.length > 1 ? AbortSignal.any(signals) : signals[0],
			responseType: 'text',
			transformResponse: data => data,
			maxRedirects: 0,
			validateStatus: () => true,
		})
	} catch(e) {
		if(axios.isCancel(e) || deadline?.aborted) {
			if(deadline?.aborted && !options?.signal?.aborted) throw new NetworkException('request', url, `${url}: TIMEOUT`, { code: 'ETIMEDOUT' })
			throw new CancelledException('request', `${url}: ABORTED`)
		}
		if(axios.isAxiosError(e)) {
			const timedOut = e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT'
			throw new NetworkException('request', url, `${url}: ${timedOut ? 'TIMEOUT' : e.code ?? e.message}`, { code: e.code })
		}
		throw new NetworkException('request', url, `${url}: NO HTTP RESPONSE`)
	}

	const headers: { [key: string]: string } = {}
	let cookies: string[] = []

	for(const [ key, value ] of Object.entries(response.headers)) {
		if(value == undefined) continue

		const name = key.toLowerCase()
		if(name === 'set-cookie') cookies = Array.isArray(value) ? value.map(String) : [ String(value) ]
		else headers[name] = Array.isArray(value) ? value.join(', ') : String(value)
	}

	return {
		url: url,
		content: typeof response.data === 'string' ? response.data : '',
		status: response.status,
		headers: headers,
		cookies: cookies,
	}
}

/*****\
| DOM |
\*****/

export class DOMObject {
	private _obj: Element

	private constructor(obj: Element) {
		this._obj = obj
	}

	public static parse(html: string) {
		const obj = (new JSDOM(html)).window.document.documentElement
		return new DOMObject(obj)
	}

	get tagName() {
		return this._obj.tagName.toLowerCase()
	}

	querySelector(selector: string) {
		return Array.from(this._obj.querySelectorAll(selector)).map(element => new DOMObject(element))
	}

	/** Direct children matching `selector`, in document order. */
	children(selector: string) {
		return Array.from(this._obj.children).filter(element => element.matches(selector)).map(element => new DOMObject(element))
	}

	/** Nearest ancestor (excluding this element) matching `selector`. */
	closest(selector: string) {
		const parent = this._obj.parentElement?.closest(selector)
		return parent ? new DOMObject(parent) : undefined
	}

	/** All descendant text, whitespace collapsed. */
	text() {
		return (this._obj.textContent ?? '').replace(/\s+/g, ' ').trim()
	}

	getAttribute(attribute: string) {
		return this._obj.getAttribute(attribute) ?? ''
	}

	hasAttribute(attribute: string) {
		return this._obj.hasAttribute(attribute)
	}
}

/*******\
| Dates |
\*******/

export function parseDate(str: string, format: string, zone = 'Europe/Berlin'): DateTime | undefined {
	const date = DateTime.fromFormat(str, format, { locale: 'de-DE', zone: zone })
	return date.isValid ? date : undefined
}

export function parseISODate(str: string, zone = 'Europe/Berlin'): DateTime | undefined {
	const date = DateTime.fromISO(str, { zone: zone })
	return date.isValid ? date : undefined
}
