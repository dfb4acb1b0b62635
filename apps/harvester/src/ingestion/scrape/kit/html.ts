import * as cheerio from 'cheerio'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

/** Whitespace runs (NBSP included) collapsed to one space, trimmed */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return collapseWhitespace($(selector).first().text())
}

export function firstAttr(
  $: cheerio.CheerioAPI,
  selector: string,
  attr: string
): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

export function allTexts($: cheerio.CheerioAPI, selector: string): string[] {
  return $(selector)
    .toArray()
    .map(element => collapseWhitespace($(element).text()))
}

export function allAttrs($: cheerio.CheerioAPI, selector: string, attr: string): string[] {
  return $(selector)
    .toArray()
    .map(element => $(element).attr(attr)?.trim())
    .filter((value): value is string => value !== undefined && value.length > 0)
}

/** Text of a `<script>` (or any element) as-is, for embedded JSON */
export function rawText($: cheerio.CheerioAPI, selector: string): string | undefined {
  const element = $(selector).first()
  if (element.length === 0) return undefined
  return element.text()
}
