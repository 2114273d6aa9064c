import path from "path";

import { CodedError, ErrorCode } from "./errors";

// Physical constants
export const G0 = 9.80665;     // standard gravity (m/s²)
export const RD = 287.05;      // gas constant of dry air (J/(kg·K))
export const RV = 461.5;       // gas constant of water vapor (J/(kg·K))
export const CP = 1004.0;      // specific heat of air at constant pressure (J/(kg·K))
export const LV = 2.5e6;       // latent heat of vaporization (J/kg)
export const EPSILON = 0.622;  // RD / RV
export const KAPPA = RD / CP;
export const TV_COEF = 0.61;
export const LCL_FACTOR = 125.0; // m/°C
export const EARTH_RADIUS_KM = 6371;

// Rain intensity thresholds (mm/h), ascending
export const RAIN_TRACE = 0.4;
export const RAIN_VERY_LIGHT = 1.0;
export const RAIN_LIGHT = 2.5;
export const RAIN_MODERATE_LIGHT = 6.5;
export const RAIN_MODERATE = 16.0;
export const RAIN_HEAVY = 40.0;
export const RAIN_VERY_HEAVY = 100.0;

/** Rate reported for the first tip of a day, when there is no slope yet (mm/h). */
export const RAIN_BOOTSTRAP_RATE = 0.4;
export const RAIN_HISTORY_CAPACITY = 2000;

/** ~6 hours of samples at a 30 second polling cadence. */
export const PRESSURE_HISTORY_CAPACITY = 720;

export interface PressureThresholds {
	/** |Δp| at or below this value (hPa over 3 h) is reported as stable. */
	stable: number;
	/** |Δp| above this value (hPa over 3 h) is reported as a fast change. */
	rapidChange: number;
}

export interface AppConfig {
	port: number;
	/** Directory holding the station inventory JSON files. */
	stationsLocation: string;
	/** IANA time zone used for calendar days when a station has no coordinates. */
	defaultTimezone: string;
	/** Wall-clock minutes without a new tip after which rain is considered stopped. */
	rainDecayMinutes: number;
	pressureThresholds: PressureThresholds;
	/** Sessions without a reading for this many minutes are dropped. */
	sessionIdleMinutes: number;
	/** Upper bound on live sessions; the least recently used one goes first. */
	maxSessions: number;
}

export const DEFAULT_PRESSURE_THRESHOLDS: Readonly<PressureThresholds> = { stable: 0.2, rapidChange: 2.0 };
export const DEFAULT_RAIN_DECAY_MINUTES = 15;
export const DEFAULT_SESSION_IDLE_MINUTES = 360;
export const DEFAULT_MAX_SESSIONS = 1000;

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar( env: Env, name: string ): string | undefined {
	const value = env[ name ];
	if ( value && value.trim().length > 0 ) {
		return value.trim();
	}
	return undefined;
}

function getEnvNumber( env: Env, name: string, fallback: number, min: number ): number {
	const raw = getEnvVar( env, name );
	if ( raw === undefined ) {
		return fallback;
	}
	const parsed = Number( raw );
	if ( !Number.isFinite( parsed ) || parsed < min ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `${ name } must be a number >= ${ min } (got "${ raw }")` );
	}
	return parsed;
}

function isValidTimezone( timezone: string ): boolean {
	try {
		new Intl.DateTimeFormat( "en-US", { timeZone: timezone } );
		return true;
	} catch ( err ) {
		return false;
	}
}

/**
 * Reads the runtime configuration from the environment.
 * @throws CodedError(InvalidConfiguration) if a variable is set to an unusable value.
 */
export function loadConfig( env: Env = process.env ): AppConfig {
	const port = getEnvNumber( env, "PORT", 3000, 0 );
	if ( !Number.isInteger( port ) || port > 65535 ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `PORT must be an integer between 0 and 65535 (got ${ port })` );
	}

	const defaultTimezone = getEnvVar( env, "DEFAULT_TIMEZONE" ) ?? "UTC";
	if ( !isValidTimezone( defaultTimezone ) ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `DEFAULT_TIMEZONE "${ defaultTimezone }" is not a known IANA time zone` );
	}

	const stable = getEnvNumber( env, "PRESSURE_STABLE_THRESHOLD", DEFAULT_PRESSURE_THRESHOLDS.stable, 0 );
	const rapidChange = getEnvNumber( env, "PRESSURE_RAPID_CHANGE", DEFAULT_PRESSURE_THRESHOLDS.rapidChange, 0 );
	if ( rapidChange < stable ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, "PRESSURE_RAPID_CHANGE must not be smaller than PRESSURE_STABLE_THRESHOLD" );
	}

	const maxSessions = getEnvNumber( env, "MAX_SESSIONS", DEFAULT_MAX_SESSIONS, 1 );
	if ( !Number.isInteger( maxSessions ) ) {
		throw new CodedError( ErrorCode.InvalidConfiguration, `MAX_SESSIONS must be an integer (got ${ maxSessions })` );
	}

	return {
		port,
		stationsLocation: getEnvVar( env, "STATIONS_LOCATION" ) ?? path.join( __dirname, "..", "data", "stations" ),
		defaultTimezone,
		rainDecayMinutes: getEnvNumber( env, "RAIN_DECAY_MINUTES", DEFAULT_RAIN_DECAY_MINUTES, 0 ),
		pressureThresholds: { stable, rapidChange },
		sessionIdleMinutes: getEnvNumber( env, "SESSION_IDLE_MINUTES", DEFAULT_SESSION_IDLE_MINUTES, 1 ),
		maxSessions
	};
}
