import path from "path";

import { describe, expect, it } from "vitest";

import { loadConfig } from "./config";
import { CodedError, ErrorCode } from "./errors";

describe( "loadConfig", () => {
	it( "uses defaults for an empty environment", () => {
		expect( loadConfig( {} ) ).toEqual( {
			port: 3000,
			stationsLocation: path.join( __dirname, "..", "data", "stations" ),
			defaultTimezone: "UTC",
			rainDecayMinutes: 15,
			pressureThresholds: { stable: 0.2, rapidChange: 2 },
			sessionIdleMinutes: 360,
			maxSessions: 1000
		} );
	} );

	it( "reads every variable", () => {
		expect( loadConfig( {
			PORT: "8080",
			STATIONS_LOCATION: " /srv/stations ",
			DEFAULT_TIMEZONE: "Europe/Madrid",
			RAIN_DECAY_MINUTES: "20",
			PRESSURE_STABLE_THRESHOLD: "0.5",
			PRESSURE_RAPID_CHANGE: "3",
			SESSION_IDLE_MINUTES: "60",
			MAX_SESSIONS: "50"
		} ) ).toEqual( {
			port: 8080,
			stationsLocation: "/srv/stations",
			defaultTimezone: "Europe/Madrid",
			rainDecayMinutes: 20,
			pressureThresholds: { stable: 0.5, rapidChange: 3 },
			sessionIdleMinutes: 60,
			maxSessions: 50
		} );
	} );

	it( "treats blank variables as unset", () => {
		expect( loadConfig( { PORT: "  ", DEFAULT_TIMEZONE: "" } ) ).toMatchObject( { port: 3000, defaultTimezone: "UTC" } );
	} );

	it.each( [
		{ PORT: "abc" },
		{ PORT: "70000" },
		{ PORT: "1.5" },
		{ DEFAULT_TIMEZONE: "Mars/Olympus_Mons" },
		{ RAIN_DECAY_MINUTES: "-1" },
		{ PRESSURE_STABLE_THRESHOLD: "0.5", PRESSURE_RAPID_CHANGE: "0.1" },
		{ SESSION_IDLE_MINUTES: "0" },
		{ MAX_SESSIONS: "2.5" },
		{ MAX_SESSIONS: "0" }
	] )( "rejects %j", ( env ) => {
		expect( () => loadConfig( env ) ).toThrow( CodedError );
		try {
			loadConfig( env );
		} catch ( err ) {
			expect( err ).toMatchObject( { errCode: ErrorCode.InvalidConfiguration } );
		}
	} );
} );
