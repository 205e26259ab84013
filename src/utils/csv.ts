import { readFile, writeFile } from 'node:fs/promises'
import path from 'node:path'
import Papa from 'papaparse'
import { SchedulerError } from '../errors'
import { scheduleTableToRows, toAvailabilityTable, toQualificationList, toScheduleTable } from '../tables'
import type { AvailabilityTable, QualificationTables, ScheduleTable } from '../types'

const LOG_PREFIX = '[CSV]'

export function parseCsvRows(text: string): string[][] {
	const res = Papa.parse<string[]>(text, { header: false, skipEmptyLines: 'greedy' })
	const fatal = res.errors.find((e) => e.type === 'Quotes')
	if (fatal) {
		throw new SchedulerError('INVALID_TABLE', `CSV parse error on row ${fatal.row ?? '?'}: ${fatal.message}`)
	}
	return res.data
}

export function parseAvailabilityCsv(text: string): AvailabilityTable {
	return toAvailabilityTable(parseCsvRows(text))
}

export function parseQualificationCsv(text: string, column = 'name'): string[] {
	return toQualificationList(parseCsvRows(text), column)
}

export function parseScheduleCsv(text: string): ScheduleTable {
	return toScheduleTable(parseCsvRows(text))
}

export function scheduleToCsv(table: ScheduleTable): string {
	return Papa.unparse(scheduleTableToRows(table), { newline: '\n' })
}

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export async function readAvailabilityFile(file: string): Promise<AvailabilityTable> {
	return parseAvailabilityCsv(await readFile(file, 'utf8'))
}

/** One `<pool>.csv` per pool. A missing file leaves that pool out. */
export async function readQualificationDir(dir: string, pools: Iterable<string>, column = 'name'): Promise<QualificationTables> {
	const tables: QualificationTables = {}
	for (const pool of new Set(pools)) {
		const file = path.join(dir, `${pool}.csv`)
		try {
			tables[pool] = parseQualificationCsv(await readFile(file, 'utf8'), column)
		} catch (err) {
			if (!isMissingFile(err)) throw err
			console.warn(LOG_PREFIX, 'No qualification file for pool', { pool, file })
		}
	}
	return tables
}

export async function readScheduleFile(file: string): Promise<ScheduleTable | null> {
	try {
		return parseScheduleCsv(await readFile(file, 'utf8'))
	} catch (err) {
		if (isMissingFile(err)) return null
		throw err
	}
}

export async function writeScheduleFile(file: string, table: ScheduleTable): Promise<void> {
	await writeFile(file, `${scheduleToCsv(table)}\n`, 'utf8')
	console.log(LOG_PREFIX, 'Schedule written', { file, dates: table.dates.length })
}
