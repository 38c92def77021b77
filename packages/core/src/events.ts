export type CodecEventPhase = 'encode' | 'decode'
export type CodecEventLevel = 'info' | 'warn' | 'error'

export interface CodecEvent {
	phase: CodecEventPhase
	level: CodecEventLevel
	code: string
	message: string
	metrics?: Record<string, string | number>
}

export type CodecEventCallback = (event: CodecEvent) => void

export interface EventCapableOptions {
	onEvent?: CodecEventCallback
}

export function emit(onEvent: CodecEventCallback | undefined, event: CodecEvent): void {
	onEvent?.(event)
}
