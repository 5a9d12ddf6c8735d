// Patient profile types — backend record and its durable cache envelope

export interface PatientProfile {
	id: string;
	user_id: string;
	name: string;
	age: number;
	gender: string;
	blood_type: string;
	contact: string;
	email: string;
	address: string;
	family_contact: string;
	insurance_provider: string | null;
	insurance_id: string | null;
	emergency: boolean;
	occupation: string | null;
}

/** `GET patients/{id}/profile` envelope */
export interface PatientProfileResponse {
	success: boolean;
	patient: PatientProfile | null;
	message: string | null;
}

/** Persisted profile plus the epoch-ms time it was written */
export interface CachedProfile {
	value: PatientProfile;
	writtenAt: number;
}

/** Where a returned profile came from */
export type ProfileSource = 'fresh_cache' | 'network' | 'stale_cache';

export type ProfileResult =
	| { ok: true; profile: PatientProfile; source: ProfileSource; error: string | null }
	| { ok: false; error: string };

/** Cached profile is trusted without a network call for this long */
export const PROFILE_CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes
