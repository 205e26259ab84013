import { describe, it, expect } from 'vitest'
import { loadConfig } from '../config'
import { isSchedulerError } from '../errors'

describe('loadConfig', () => {
	it('fills defaults', () => {
		expect(loadConfig({})).toEqual({
			googleAccessToken: undefined,
			spreadsheetId: undefined,
			availabilitySheet: 'cleaned_availability',
			scheduleSheet: 'final_schedule',
			qualificationColumn: 'name',
			seed: undefined,
			limitedBelow: 2,
		})
	})

	it('reads values and treats blanks as unset', () => {
		const config = loadConfig({
			GOOGLE_SHEETS_ACCESS_TOKEN: ' test-token ',
			ROTA_SCHEDULE_SHEET: '   ',
			ROTA_SEED: 'test-seed',
			ROTA_LIMITED_BELOW: '3',
		})
		expect(config.googleAccessToken).toBe('test-token')
		expect(config.scheduleSheet).toBe('final_schedule')
		expect(config.seed).toBe('test-seed')
		expect(config.limitedBelow).toBe(3)
	})

	it('rejects a threshold below one', () => {
		let caught: unknown
		try {
			loadConfig({ ROTA_LIMITED_BELOW: '0' })
		} catch (err) {
			caught = err
		}
		expect(isSchedulerError(caught, 'INVALID_CONFIG')).toBe(true)
		expect(() => loadConfig({ ROTA_LIMITED_BELOW: 'lots' })).toThrow(/^Invalid configuration: ROTA_LIMITED_BELOW/)
	})
})
