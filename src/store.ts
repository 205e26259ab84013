import { createStore } from 'zustand/vanilla'
import { loadConfig } from './config'
import { SchedulerError, errorMessage } from './errors'
import {
	loadAvailabilitySheet,
	loadQualificationSheets,
	loadScheduleSheet,
	normalizeAndValidateSpreadsheetId,
	saveScheduleSheet,
	spreadsheetExists,
} from './google'
import { mergeScheduleTables } from './ledger'
import { DEFAULT_ROLES } from './roles'
import { generateSchedule } from './scheduler'
import type { ScheduleRun } from './scheduler'
import type { AvailabilityTable, QualificationTables, RoleDefinition, ScheduleTable } from './types'
import { readAvailabilityFile, readQualificationDir, readScheduleFile, writeScheduleFile } from './utils/csv'

const LOG_PREFIX = '[Store]'

export interface FileSources {
	availabilityPath: string
	qualificationsDir: string
	historyPath?: string
}

interface RotaState {
	roles: RoleDefinition[]
	availability?: AvailabilityTable
	qualifications: QualificationTables
	history?: ScheduleTable
	seed?: string
	currentRun?: ScheduleRun
	isLoading: boolean
	error?: string
}

interface Actions {
	setRoles: (roles: RoleDefinition[]) => void
	setSeed: (seed: string | undefined) => void
	loadFromFiles: (sources: FileSources) => Promise<void>
	loadFromSheets: (spreadsheetId: string) => Promise<void>
	generate: () => ScheduleRun | undefined
	/** History merged with the current run, as it would be saved. */
	mergedSchedule: () => ScheduleTable
	saveToFile: (file: string) => Promise<void>
	saveToSheets: (spreadsheetId: string) => Promise<void>
	reset: () => void
}

export type RotaStore = RotaState & Actions

function poolsOf(roles: RoleDefinition[]): string[] {
	return roles.map((r) => r.pool)
}

export function createRotaStore(initial?: Partial<Pick<RotaState, 'roles' | 'seed'>>) {
	const defaults = (): RotaState => ({
		roles: initial?.roles ?? [...DEFAULT_ROLES],
		qualifications: {},
		seed: initial?.seed,
		isLoading: false,
	})

	return createStore<RotaStore>()((set, get) => ({
		...defaults(),
		setRoles(roles) {
			set({ roles, currentRun: undefined })
		},
		setSeed(seed) {
			set({ seed })
		},
		async loadFromFiles({ availabilityPath, qualificationsDir, historyPath }) {
			set({ isLoading: true, error: undefined })
			try {
				const [availability, qualifications, history] = await Promise.all([
					readAvailabilityFile(availabilityPath),
					readQualificationDir(qualificationsDir, poolsOf(get().roles), loadConfig().qualificationColumn),
					historyPath ? readScheduleFile(historyPath) : Promise.resolve(null),
				])
				console.log(LOG_PREFIX, 'Loaded tables from files', { people: availability.records.length, dates: availability.dates.length })
				set({ availability, qualifications, history: history ?? undefined, currentRun: undefined })
			} catch (e) {
				set({ error: errorMessage(e) })
			} finally {
				set({ isLoading: false })
			}
		},
		async loadFromSheets(spreadsheetIdRaw) {
			set({ isLoading: true, error: undefined })
			try {
				const spreadsheetId = normalizeAndValidateSpreadsheetId(spreadsheetIdRaw)
				const availability = await loadAvailabilitySheet(spreadsheetId)
				const qualifications = await loadQualificationSheets(spreadsheetId, poolsOf(get().roles))
				const history = await loadScheduleSheet(spreadsheetId)
				console.log(LOG_PREFIX, 'Loaded tables from Google Sheets', { spreadsheetId })
				set({ availability, qualifications, history: history ?? undefined, currentRun: undefined })
			} catch (e) {
				set({ error: errorMessage(e) })
			} finally {
				set({ isLoading: false })
			}
		},
		generate() {
			const { availability, qualifications, roles, history, seed } = get()
			set({ error: undefined })
			try {
				const run = generateSchedule({ availability, qualifications, roles, history, seed })
				set({ currentRun: run })
				return run
			} catch (e) {
				console.error(LOG_PREFIX, 'Generation failed', e)
				set({ error: errorMessage(e), currentRun: undefined })
				return undefined
			}
		},
		mergedSchedule() {
			const { currentRun, history } = get()
			if (!currentRun) throw new SchedulerError('NO_SCHEDULE', 'Generate a schedule before saving')
			return mergeScheduleTables(history, currentRun.ledger.toTable())
		},
		async saveToFile(file) {
			const table = get().mergedSchedule()
			await writeScheduleFile(file, table)
			set({ history: table })
		},
		async saveToSheets(spreadsheetIdRaw) {
			const table = get().mergedSchedule()
			const spreadsheetId = normalizeAndValidateSpreadsheetId(spreadsheetIdRaw)
			if (!(await spreadsheetExists(spreadsheetId))) {
				console.warn(LOG_PREFIX, 'Spreadsheet missing or inaccessible; blocking save', { spreadsheetId })
				throw new SchedulerError('SHEETS_HTTP', 'The spreadsheet does not exist or is not accessible', 404)
			}
			await saveScheduleSheet(spreadsheetId, table)
			set({ history: table })
		},
		reset() {
			set({ ...defaults(), availability: undefined, history: undefined, currentRun: undefined, error: undefined })
		},
	}))
}
