import type { RequestDescriptor } from '../../../scraper/types.js'
import type { JsonValue, ParamPlacement, RequestTemplate } from '../types.js'
import { setPath } from './json.js'

export interface PlacedParam {
  placement: ParamPlacement
  /** null writes JSON null and is skipped for query and form */
  value: string | number | null
}

export interface BuildRequestOptions {
  /** Source-level headers; template headers override them */
  headers?: Record<string, string>
  /** Values for `{token}` placeholders */
  vars?: Record<string, string>
  params?: PlacedParam[]
}

export function fillTokens(value: string, vars: Record<string, string> = {}): string {
  return value.replace(/\{(\w+)\}/g, (token, name: string) => vars[name] ?? token)
}

function fillJsonTokens(value: JsonValue, vars: Record<string, string>): JsonValue {
  if (typeof value === 'string') return fillTokens(value, vars)
  if (Array.isArray(value)) return value.map(entry => fillJsonTokens(entry, vars))
  if (value !== null && typeof value === 'object') {
    const next: { [key: string]: JsonValue } = {}
    for (const [key, entry] of Object.entries(value)) {
      next[key] = fillJsonTokens(entry, vars)
    }
    return next
  }
  return value
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase()
  return Object.keys(headers).some(key => key.toLowerCase() === lower)
}

/** Build the concrete request for one step of a pagination plan */
export function buildRequest(template: RequestTemplate, options: BuildRequestOptions = {}): RequestDescriptor {
  const vars = options.vars ?? {}
  const params = options.params ?? []
  const url = new URL(fillTokens(template.url, vars))

  for (const [name, value] of Object.entries(template.query ?? {})) {
    const values = Array.isArray(value) ? value : [value]
    for (const entry of values) {
      url.searchParams.append(name, fillTokens(String(entry), vars))
    }
  }

  const headers: Record<string, string> = { ...options.headers, ...template.headers }
  let body: string | undefined

  const formParams = params.filter(param => param.placement.in === 'form')
  const jsonParams = params.filter(param => param.placement.in === 'json')

  for (const param of params) {
    if (param.placement.in === 'query' && param.value !== null) {
      url.searchParams.set(param.placement.name, String(param.value))
    }
  }

  if (template.form || formParams.length > 0) {
    const form = new URLSearchParams()
    for (const [name, value] of Object.entries(template.form ?? {})) {
      form.append(name, fillTokens(String(value), vars))
    }
    for (const param of formParams) {
      if (param.value !== null) {
        form.set(param.placement.name, String(param.value))
      }
    }
    body = form.toString()
    if (!hasHeader(headers, 'Content-Type')) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8'
    }
  } else if (template.json !== undefined || jsonParams.length > 0) {
    let json = fillJsonTokens(template.json ?? {}, vars)
    for (const param of jsonParams) {
      json = setPath(json, param.placement.name, param.value)
    }
    body = JSON.stringify(json)
    if (!hasHeader(headers, 'Content-Type')) {
      headers['Content-Type'] = 'application/json'
    }
  }

  return {
    method: template.method ?? (body === undefined ? 'GET' : 'POST'),
    url: url.toString(),
    headers,
    body,
  }
}
