// Sync configuration — defaults and validation for the sync engine
import { z } from 'zod';
import { CALORIES_GOAL } from '$lib/types/metrics.js';
import type { PrefetchRequest } from '$lib/types/sync.js';
import { DEFAULT_PREFETCH_QUEUE, PREFETCH_DELAY_MS } from '$lib/types/sync.js';
import { AggregationPeriodSchema, describeIssues } from '$lib/api/schemas.js';
import { secureGet, STORAGE_KEYS } from '$lib/utils/secure-storage.js';

export interface SyncConfig {
	patientId: string;
	/** Owner id the paired-devices endpoint is keyed by */
	deviceOwnerId: string;
	prefetchDelayMs: number;
	prefetchQueue: readonly PrefetchRequest[];
	caloriesGoal: number;
}

export type SyncConfigInput = Pick<SyncConfig, 'patientId'> & Partial<Omit<SyncConfig, 'patientId'>>;

const PrefetchRequestSchema = z.object({
	period: AggregationPeriodSchema,
	days: z.number().int().positive()
});

const SyncConfigSchema: z.ZodType<SyncConfig, z.ZodTypeDef, unknown> = z
	.object({
		patientId: z.string().min(1),
		deviceOwnerId: z.string().min(1).optional(),
		prefetchDelayMs: z.number().int().nonnegative().default(PREFETCH_DELAY_MS),
		prefetchQueue: z
			.array(PrefetchRequestSchema)
			.default(() => DEFAULT_PREFETCH_QUEUE.map((r) => ({ ...r }))),
		caloriesGoal: z.number().positive().default(CALORIES_GOAL)
	})
	.transform((c) => ({
		...c,
		deviceOwnerId: c.deviceOwnerId ?? c.patientId,
		prefetchQueue: Object.freeze(c.prefetchQueue.map((r) => Object.freeze(r)))
	}));

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

/** Fill defaults and validate; throws ConfigError on bad input */
export function resolveSyncConfig(input: SyncConfigInput): SyncConfig {
	const parsed = SyncConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new ConfigError(`Invalid sync configuration: ${describeIssues(parsed.error)}`);
	}
	return parsed.data;
}

/** Build a config from the ids stored at sign-in, null when signed out */
export async function loadSyncConfig(overrides?: Partial<SyncConfigInput>): Promise<SyncConfig | null> {
	const patientId = overrides?.patientId ?? (await secureGet(STORAGE_KEYS.PATIENT_ID));
	if (!patientId) return null;

	const deviceOwnerId = overrides?.deviceOwnerId ?? (await secureGet(STORAGE_KEYS.DEVICE_OWNER_ID)) ?? undefined;
	return resolveSyncConfig({ ...overrides, patientId, deviceOwnerId });
}
