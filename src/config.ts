import dotenv from 'dotenv'
import { z } from 'zod'
import { DEFAULT_LIMITED_BELOW } from './coverage'
import { SchedulerError } from './errors'

const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value)

const envSchema = z.object({
	GOOGLE_SHEETS_ACCESS_TOKEN: z.preprocess(blankToUndefined, z.string().trim().optional()),
	ROTA_SPREADSHEET_ID: z.preprocess(blankToUndefined, z.string().trim().optional()),
	ROTA_AVAILABILITY_SHEET: z.preprocess(blankToUndefined, z.string().trim().default('cleaned_availability')),
	ROTA_SCHEDULE_SHEET: z.preprocess(blankToUndefined, z.string().trim().default('final_schedule')),
	ROTA_QUALIFICATION_COLUMN: z.preprocess(blankToUndefined, z.string().trim().default('name')),
	ROTA_SEED: z.preprocess(blankToUndefined, z.string().optional()),
	ROTA_LIMITED_BELOW: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(DEFAULT_LIMITED_BELOW)),
})

export interface RotaConfig {
	googleAccessToken?: string
	spreadsheetId?: string
	availabilitySheet: string
	scheduleSheet: string
	qualificationColumn: string
	seed?: string
	limitedBelow: number
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RotaConfig {
	const parsed = envSchema.safeParse(env)
	if (!parsed.success) {
		const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
		throw new SchedulerError('INVALID_CONFIG', `Invalid configuration: ${detail}`)
	}
	const e = parsed.data
	return {
		googleAccessToken: e.GOOGLE_SHEETS_ACCESS_TOKEN,
		spreadsheetId: e.ROTA_SPREADSHEET_ID,
		availabilitySheet: e.ROTA_AVAILABILITY_SHEET,
		scheduleSheet: e.ROTA_SCHEDULE_SHEET,
		qualificationColumn: e.ROTA_QUALIFICATION_COLUMN,
		seed: e.ROTA_SEED,
		limitedBelow: e.ROTA_LIMITED_BELOW,
	}
}

/** Reads `.env` into process.env (existing variables win) and parses it. */
export function loadEnvConfig(path?: string): RotaConfig {
	dotenv.config(path ? { path } : undefined)
	return loadConfig(process.env)
}
