#!/usr/bin/env node
import { readFile } from 'node:fs/promises'
import { RoleCatalog } from './catalog'
import { loadEnvConfig } from './config'
import type { RotaConfig } from './config'
import { coverageIssues } from './coverage'
import { SchedulerError, errorMessage } from './errors'
import { DEFAULT_ROLES, validateRoleDefinitions } from './roles'
import { createRotaStore } from './store'
import { scheduleTableToRows } from './tables'
import type { RoleDefinition } from './types'

const LOG_PREFIX = '[rota]'

const USAGE = `Usage:
  service-rota generate --availability=<csv> --qualifications=<dir> [--history=<csv>] [--out=<csv>] [--roles=<json>] [--seed=<seed>]
  service-rota generate --sheet=<spreadsheet id or url> [--save] [--roles=<json>] [--seed=<seed>]
  service-rota coverage --availability=<csv> --qualifications=<dir> [--roles=<json>]`

export interface CliOptions {
	command?: string
	availability?: string
	qualifications?: string
	history?: string
	out?: string
	roles?: string
	seed?: string
	sheet?: string
	save: boolean
}

export function parseArgs(args: string[]): CliOptions {
	const lookup = new Map<string, string>()
	let command: string | undefined
	for (const arg of args) {
		if (!arg.startsWith('--')) {
			if (command === undefined) command = arg
			continue
		}
		const [rawKey, ...rest] = arg.slice(2).split('=')
		lookup.set(rawKey, rest.length ? rest.join('=') : 'true')
	}
	return {
		command,
		availability: lookup.get('availability'),
		qualifications: lookup.get('qualifications'),
		history: lookup.get('history'),
		out: lookup.get('out'),
		roles: lookup.get('roles'),
		seed: lookup.get('seed'),
		sheet: lookup.get('sheet'),
		save: lookup.get('save') === 'true',
	}
}

async function readRoles(file?: string): Promise<RoleDefinition[]> {
	if (!file) return [...DEFAULT_ROLES]
	const raw: unknown = JSON.parse(await readFile(file, 'utf8'))
	return validateRoleDefinitions(raw)
}

function requireFileSources(options: CliOptions): { availability: string; qualifications: string } {
	if (!options.availability || !options.qualifications) {
		throw new SchedulerError('INVALID_CONFIG', `--availability and --qualifications are required\n${USAGE}`)
	}
	return { availability: options.availability, qualifications: options.qualifications }
}

async function generate(options: CliOptions, config: RotaConfig): Promise<void> {
	const store = createRotaStore({ roles: await readRoles(options.roles), seed: options.seed ?? config.seed })
	const sheet = options.sheet ?? config.spreadsheetId

	if (options.sheet) {
		await store.getState().loadFromSheets(options.sheet)
	} else {
		const sources = requireFileSources(options)
		await store.getState().loadFromFiles({
			availabilityPath: sources.availability,
			qualificationsDir: sources.qualifications,
			historyPath: options.history,
		})
	}
	const loadError = store.getState().error
	if (loadError) throw new Error(loadError)

	const run = store.getState().generate()
	if (!run) throw new Error(store.getState().error ?? 'Schedule generation failed')

	console.log(LOG_PREFIX, `run ${run.runId}`)
	console.table(scheduleTableToRows(run.ledger.toTable()))
	for (const role of run.unfillableRoles) console.log(LOG_PREFIX, `no qualified people for ${role}`)

	if (options.out) await store.getState().saveToFile(options.out)
	if (options.save) {
		if (!sheet) throw new SchedulerError('SHEETS_NOT_CONFIGURED', '--save needs --sheet or ROTA_SPREADSHEET_ID')
		await store.getState().saveToSheets(sheet)
	}
}

async function coverage(options: CliOptions, config: RotaConfig): Promise<void> {
	const roles = await readRoles(options.roles)
	const store = createRotaStore({ roles })
	const sources = requireFileSources(options)
	await store.getState().loadFromFiles({ availabilityPath: sources.availability, qualificationsDir: sources.qualifications })
	const { availability, qualifications, error } = store.getState()
	if (error || !availability) throw new Error(error ?? 'No availability data provided')

	const catalog = new RoleCatalog(roles, qualifications)
	for (const date of availability.dates) {
		const issues = Object.entries(coverageIssues(catalog, availability, date, config.limitedBelow))
		const summary = issues.length ? issues.map(([role, issue]) => `${role}=${issue}`).join(', ') : 'ok'
		console.log(`${date}: ${summary}`)
	}
}

export async function main(args = process.argv.slice(2)): Promise<number> {
	const options = parseArgs(args)
	try {
		const config = loadEnvConfig()
		if (options.command === 'generate') await generate(options, config)
		else if (options.command === 'coverage') await coverage(options, config)
		else {
			console.log(USAGE)
			return options.command ? 1 : 0
		}
		return 0
	} catch (error) {
		console.error(LOG_PREFIX, 'failed:', errorMessage(error))
		return 1
	}
}

if (require.main === module) {
	main().then((code) => {
		process.exitCode = code
	})
}
