import { SchedulerError } from './errors'
import { UNASSIGNED_MARKER } from './types'
import type { AvailabilityRecord, AvailabilityTable, Person, ScheduleTable } from './types'

export type Cell = string | number | boolean | null | undefined
export type RawRows = Cell[][]

function text(cell: Cell): string {
	if (cell === null || cell === undefined) return ''
	return String(cell).trim()
}

function isDroppedHeader(header: string): boolean {
	return header.length === 0 || /^Unnamed/i.test(header)
}

/** `yes` in any case counts as available; everything else does not. */
export function parseAvailabilityFlag(cell: Cell): boolean {
	if (typeof cell === 'boolean') return cell
	return text(cell).toLowerCase() === 'yes'
}

interface Columns {
	key: number
	dates: { date: string; index: number }[]
}

/**
 * Drops blank and `Unnamed` headers, then takes the first remaining column
 * as the key and the rest as date labels. Repeated dates are rejected.
 */
function splitColumns(header: Cell[], table: string): Columns {
	const kept = header.map((cell, index) => ({ date: text(cell), index })).filter((c) => !isDroppedHeader(c.date))
	const [key, ...dates] = kept
	if (!key) throw new SchedulerError('INVALID_TABLE', `${table} table has no header row`)
	const repeated = dates.find((c, i) => dates.findIndex((o) => o.date === c.date) !== i)
	if (repeated) {
		throw new SchedulerError('INVALID_TABLE', `Date "${repeated.date}" appears twice in the ${table.toLowerCase()} table`)
	}
	return { key: key.index, dates }
}

/** One row per person, date columns in the order the caller keeps them. */
export function toAvailabilityTable(rows: RawRows): AvailabilityTable {
	const [header = []] = rows
	const { key, dates: dateColumns } = splitColumns(header, 'Availability')

	const records: AvailabilityRecord[] = []
	const seen = new Set<Person>()
	for (const row of rows.slice(1)) {
		const person = text(row[key])
		if (!person) continue
		if (seen.has(person)) {
			throw new SchedulerError('INVALID_TABLE', `Person "${person}" appears twice in the availability table`)
		}
		seen.add(person)
		records.push({
			person,
			days: dateColumns.map((c) => ({ date: c.date, isAvailable: parseAvailabilityFlag(row[c.index]) })),
		})
	}
	return { dates: dateColumns.map((c) => c.date), records }
}

export function availablePeopleOn(table: AvailabilityTable, date: string): Person[] {
	return table.records.filter((r) => r.days.some((d) => d.date === date && d.isAvailable)).map((r) => r.person)
}

export function memberCalendar(table: AvailabilityTable, person: Person): Record<string, boolean> {
	const record = table.records.find((r) => r.person === person)
	if (!record) return {}
	return Object.fromEntries(record.days.map((d) => [d.date, d.isAvailable]))
}

export function toQualificationList(rows: RawRows, column = 'name'): Person[] {
	const [header, ...body] = rows
	if (!header) return []
	const index = header.findIndex((cell) => text(cell).toLowerCase() === column.toLowerCase())
	if (index < 0) {
		throw new SchedulerError('INVALID_TABLE', `Qualification table has no "${column}" column`)
	}
	const names = body.map((row) => text(row[index])).filter(Boolean)
	return Array.from(new Set(names))
}

function scheduleCell(cell: Cell): Person | null {
	const value = text(cell)
	if (!value || value.toLowerCase() === UNASSIGNED_MARKER.toLowerCase()) return null
	return value
}

/** Role rows by date columns, header `role, <dates...>`. */
export function toScheduleTable(rows: RawRows): ScheduleTable {
	const [header = []] = rows
	const { key, dates: dateColumns } = splitColumns(header, 'Schedule')

	return {
		dates: dateColumns.map((c) => c.date),
		rows: rows
			.slice(1)
			.filter((row) => text(row[key]).length > 0)
			.map((row) => ({ role: text(row[key]), cells: dateColumns.map((c) => scheduleCell(row[c.index])) })),
	}
}

export function scheduleTableToRows(table: ScheduleTable): string[][] {
	return [
		['role', ...table.dates],
		...table.rows.map((row) => [row.role, ...table.dates.map((_, i) => row.cells[i] ?? UNASSIGNED_MARKER)]),
	]
}
