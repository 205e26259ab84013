export type SchedulerErrorCode =
	| 'DATA_UNAVAILABLE'
	| 'INVALID_ROLES'
	| 'UNKNOWN_ROLE'
	| 'DUPLICATE_DATE'
	| 'INVALID_TABLE'
	| 'INVALID_CONFIG'
	| 'SHEETS_NOT_CONFIGURED'
	| 'SHEETS_HTTP'
	| 'INVALID_SPREADSHEET_ID'
	| 'NO_SCHEDULE'

export class SchedulerError extends Error {
	code: SchedulerErrorCode
	status?: number

	constructor(code: SchedulerErrorCode, message: string, status?: number) {
		super(message)
		this.name = 'SchedulerError'
		this.code = code
		this.status = status
	}
}

export function isSchedulerError(value: unknown, code?: SchedulerErrorCode): value is SchedulerError {
	if (!(value instanceof SchedulerError)) return false
	return code === undefined || value.code === code
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
