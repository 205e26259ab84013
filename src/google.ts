import { z } from 'zod'
import { loadConfig } from './config'
import { SchedulerError } from './errors'
import { scheduleTableToRows, toAvailabilityTable, toQualificationList, toScheduleTable } from './tables'
import type { AvailabilityTable, QualificationTables, ScheduleTable } from './types'

const SHEETS_API = 'https://sheets.googleapis.com/v4/spreadsheets'
const LOG_PREFIX = '[Google]'

const cellSchema = z.union([z.string(), z.number(), z.boolean()])
const valuesSchema = z.object({ values: z.array(z.array(cellSchema)).optional() })
const titlesSchema = z.object({
	sheets: z.array(z.object({ properties: z.object({ title: z.string() }).partial().optional() })).optional(),
})

function getAccessToken(): string {
	const token = loadConfig().googleAccessToken
	if (!token) throw new SchedulerError('SHEETS_NOT_CONFIGURED', 'Missing GOOGLE_SHEETS_ACCESS_TOKEN')
	return token
}

async function fetchJson(url: string, init?: RequestInit): Promise<unknown> {
	const token = getAccessToken()
	console.log(LOG_PREFIX, 'HTTP', init?.method || 'GET', url)
	const res = await fetch(url, {
		...init,
		headers: {
			'Content-Type': 'application/json',
			Authorization: `Bearer ${token}`,
		},
	})
	if (!res.ok) {
		const text = await res.text().catch(() => '')
		console.error(LOG_PREFIX, 'HTTP error', res.status, text || res.statusText)
		throw new SchedulerError('SHEETS_HTTP', `HTTP ${res.status}: ${text || res.statusText}`, res.status)
	}
	return res.json()
}

function sheetRange(sheet: string): string {
	return `'${sheet.replace(/'/g, "''")}'`
}

function valuesUrl(spreadsheetId: string, sheet: string, suffix = ''): string {
	return `${SHEETS_API}/${encodeURIComponent(spreadsheetId)}/values/${encodeURIComponent(sheetRange(sheet))}${suffix}`
}

export function parseSpreadsheetId(input: string): string {
	const trimmed = (input || '').trim()
	const m = trimmed.match(/\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/)
	if (m && m[1]) return m[1]
	return trimmed
}

export function isLikelySpreadsheetId(id: string): boolean {
	return /^[a-zA-Z0-9-_]{20,}$/.test(id)
}

export function normalizeAndValidateSpreadsheetId(input: string): string {
	const id = parseSpreadsheetId(input)
	if (!isLikelySpreadsheetId(id)) {
		throw new SchedulerError(
			'INVALID_SPREADSHEET_ID',
			'Invalid Spreadsheet ID. Pass the full sheet URL or the ID from /spreadsheets/d/<ID>/...',
		)
	}
	return id
}

export async function spreadsheetExists(spreadsheetId: string): Promise<boolean> {
	const token = getAccessToken()
	const url = `${SHEETS_API}/${encodeURIComponent(spreadsheetId)}?fields=spreadsheetId`
	const res = await fetch(url, { headers: { Authorization: `Bearer ${token}` } })
	console.log(LOG_PREFIX, 'Sheets exists check', { status: res.status })
	if (res.status === 404 || res.status === 403) return false
	if (!res.ok) throw new SchedulerError('SHEETS_HTTP', `HTTP ${res.status}: ${res.statusText}`, res.status)
	return true
}

export async function getSheetTitles(spreadsheetId: string): Promise<Set<string>> {
	const data = titlesSchema.parse(await fetchJson(`${SHEETS_API}/${encodeURIComponent(spreadsheetId)}?fields=sheets(properties(title))`))
	const titles = new Set<string>()
	for (const s of data.sheets ?? []) {
		const t = s.properties?.title
		if (t) titles.add(t)
	}
	return titles
}

export async function getSheetValues(spreadsheetId: string, sheet: string): Promise<string[][]> {
	const data = valuesSchema.parse(await fetchJson(valuesUrl(spreadsheetId, sheet)))
	return (data.values ?? []).map((row) => row.map((cell) => String(cell)))
}

export async function loadAvailabilitySheet(spreadsheetId: string, sheet = loadConfig().availabilitySheet): Promise<AvailabilityTable> {
	return toAvailabilityTable(await getSheetValues(spreadsheetId, sheet))
}

/** One tab per pool. Tabs that do not exist leave their pool out. */
export async function loadQualificationSheets(
	spreadsheetId: string,
	pools: Iterable<string>,
	column = loadConfig().qualificationColumn,
): Promise<QualificationTables> {
	const existing = await getSheetTitles(spreadsheetId)
	const tables: QualificationTables = {}
	for (const pool of new Set(pools)) {
		if (!existing.has(pool)) {
			console.warn(LOG_PREFIX, 'No qualification sheet for pool', { pool })
			continue
		}
		tables[pool] = toQualificationList(await getSheetValues(spreadsheetId, pool), column)
	}
	return tables
}

export async function loadScheduleSheet(spreadsheetId: string, sheet = loadConfig().scheduleSheet): Promise<ScheduleTable | null> {
	const existing = await getSheetTitles(spreadsheetId)
	if (!existing.has(sheet)) return null
	const rows = await getSheetValues(spreadsheetId, sheet)
	if (rows.length === 0) return null
	return toScheduleTable(rows)
}

/** Replaces the tab's contents with the grid, adding the tab if needed. */
export async function saveScheduleSheet(spreadsheetId: string, table: ScheduleTable, sheet = loadConfig().scheduleSheet): Promise<void> {
	const existing = await getSheetTitles(spreadsheetId)
	if (!existing.has(sheet)) {
		console.log(LOG_PREFIX, 'Adding sheet', { sheet })
		await fetchJson(`${SHEETS_API}/${encodeURIComponent(spreadsheetId)}:batchUpdate`, {
			method: 'POST',
			body: JSON.stringify({ requests: [{ addSheet: { properties: { title: sheet } } }] }),
		})
	}
	await fetchJson(valuesUrl(spreadsheetId, sheet, ':clear'), { method: 'POST', body: '{}' })
	const values = scheduleTableToRows(table)
	await fetchJson(valuesUrl(spreadsheetId, sheet, '?valueInputOption=RAW'), {
		method: 'PUT',
		body: JSON.stringify({ range: sheetRange(sheet), majorDimension: 'ROWS', values }),
	})
	console.log(LOG_PREFIX, 'Schedule saved', { sheet, rows: values.length })
}
