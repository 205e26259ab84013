import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { isSchedulerError } from '../errors'
import { createRotaStore } from '../store'
import type { RoleDefinition } from '../types'

const ROLES: RoleDefinition[] = [{ name: 'lead', pool: 'lead', exclusiveWith: [] }]

describe('rota store', () => {
	let dir: string
	let sources: { availabilityPath: string; qualificationsDir: string; historyPath: string }

	beforeEach(async () => {
		vi.spyOn(console, 'log').mockImplementation(() => {})
		vi.spyOn(console, 'warn').mockImplementation(() => {})
		vi.spyOn(console, 'error').mockImplementation(() => {})
		dir = await mkdtemp(path.join(os.tmpdir(), 'rota-store-'))
		const qualificationsDir = path.join(dir, 'qualifications')
		await mkdir(qualificationsDir)
		await writeFile(path.join(dir, 'availability.csv'), 'name,d1,d2\nAnn,yes,yes\nBen,yes,no\n')
		await writeFile(path.join(qualificationsDir, 'lead.csv'), 'name\nAnn\nBen\n')
		await writeFile(path.join(dir, 'history.csv'), 'role,h1\nlead,Ann\n')
		sources = {
			availabilityPath: path.join(dir, 'availability.csv'),
			qualificationsDir,
			historyPath: path.join(dir, 'history.csv'),
		}
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it('loads files, generates against history and saves the merged grid', async () => {
		const store = createRotaStore({ roles: ROLES, seed: 'test-seed' })
		await store.getState().loadFromFiles(sources)
		expect(store.getState().isLoading).toBe(false)
		expect(store.getState().qualifications).toEqual({ lead: ['Ann', 'Ben'] })

		const run = store.getState().generate()
		expect(run?.ledger.toTable()).toEqual({ dates: ['d1', 'd2'], rows: [{ role: 'lead', cells: ['Ben', 'Ann'] }] })
		expect(run?.seed).toBe('test-seed')

		const out = path.join(dir, 'out.csv')
		await store.getState().saveToFile(out)
		expect(await readFile(out, 'utf8')).toBe('role,h1,d1,d2\nlead,Ann,Ben,Ann\n')
		expect(store.getState().history?.dates).toEqual(['h1', 'd1', 'd2'])
	})

	it('records a load failure instead of throwing', async () => {
		const store = createRotaStore({ roles: ROLES })
		await store.getState().loadFromFiles({ ...sources, availabilityPath: path.join(dir, 'missing.csv') })
		expect(store.getState().error).toContain('ENOENT')
		expect(store.getState().isLoading).toBe(false)
		expect(store.getState().availability).toBeUndefined()
	})

	it('produces nothing when there is no availability', () => {
		const store = createRotaStore({ roles: ROLES })
		expect(store.getState().generate()).toBeUndefined()
		expect(store.getState().error).toBe('No availability data provided')
	})

	it('will not save before a schedule exists', async () => {
		const store = createRotaStore({ roles: ROLES })
		let err: unknown
		try {
			await store.getState().saveToFile(path.join(dir, 'out.csv'))
		} catch (e) {
			err = e
		}
		expect(isSchedulerError(err, 'NO_SCHEDULE')).toBe(true)
	})

	it('blocks a save to a spreadsheet it cannot reach', async () => {
		vi.stubEnv('GOOGLE_SHEETS_ACCESS_TOKEN', 'test-token')
		const fetchMock = vi.fn(async () => new Response('{}', { status: 404 }))
		vi.stubGlobal('fetch', fetchMock)
		const store = createRotaStore({ roles: ROLES })
		await store.getState().loadFromFiles(sources)
		store.getState().generate()

		let err: unknown
		try {
			await store.getState().saveToSheets('test-sheet-id-000000000')
		} catch (e) {
			err = e
		}
		expect(isSchedulerError(err, 'SHEETS_HTTP')).toBe(true)
		expect(fetchMock).toHaveBeenCalledTimes(1)
		expect(store.getState().history?.dates).toEqual(['h1'])
	})

	it('drops the current run when roles change and clears everything on reset', async () => {
		const store = createRotaStore({ roles: ROLES })
		await store.getState().loadFromFiles(sources)
		store.getState().generate()
		store.getState().setRoles([...ROLES, { name: 'keys', pool: 'keys', exclusiveWith: [] }])
		expect(store.getState().currentRun).toBeUndefined()

		store.getState().setSeed('test-seed')
		store.getState().reset()
		expect(store.getState().roles).toEqual(ROLES)
		expect(store.getState().seed).toBeUndefined()
		expect(store.getState().availability).toBeUndefined()
	})
})
