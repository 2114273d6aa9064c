import { beforeEach, describe, expect, it, vi } from "vitest";

import { potentialTemperature } from "../models/thermodynamics";
import { LocalNormalizer } from "../routes/normalization/normalizers";
import type { CanonicalReading, StationIdentity } from "../types";
import { EnrichOptions, enrichReading } from "./enrichment";
import { SessionStore, WeatherSession } from "./session";

const NOW = Date.UTC( 2024, 0, 15, 10 ) / 1000;

const STATION: StationIdentity = { providerId: "LOCAL", stationId: "TEST", name: "", lat: NaN, lon: NaN, elevation: 100 };

function makeReading( overrides: Partial<CanonicalReading> = {} ): CanonicalReading {
	return {
		epoch: NOW - 60,
		temperature: 20,
		humidity: 50,
		dewPoint: 9.3,
		pressureAbsolute: 1000,
		pressureMsl: 1013,
		windSpeed: 10,
		windGust: 20,
		windDirection: 180,
		precipTotal: 0,
		solarRadiation: 300,
		uv: 3,
		station: STATION,
		...overrides
	};
}

function options( now: number, overrides: Partial<EnrichOptions> = {} ): EnrichOptions {
	return { now, defaultTimezone: "UTC", ...overrides };
}

beforeEach( () => {
	vi.restoreAllMocks();
	vi.spyOn( console, "log" ).mockImplementation( () => undefined );
} );

describe( "enrichReading", () => {
	it( "combines all derived metrics for a first reading", () => {
		const session = new WeatherSession( "s1" );
		const enriched = enrichReading( session, makeReading(), options( NOW ) );

		expect( enriched.dataAgeSeconds ).toBe( 60 );
		expect( enriched.validation ).toEqual( { valid: true, errors: [], warnings: [] } );
		expect( enriched.thermodynamics.vaporPressure ).toBeCloseTo( 11.6847, 4 );
		expect( enriched.windCompass ).toBe( "S" );
		expect( enriched.radiation ).toMatchObject( { skyClarity: 0.3, skyClarityLabel: "Cloudy", uvLabel: "Moderate" } );
		expect( enriched.radiation.et0 ).toBeCloseTo( 3.51652, 5 );
		expect( enriched.rain ).toEqual( { instant: NaN, rate1min: NaN, rate5min: NaN, intensity: "none", label: "No precipitation" } );
		expect( enriched.pressureTrend ).toMatchObject( { label: "Unknown", source: "none", outlook: "Insufficient data" } );
		expect( enriched.extremes ).toEqual( {
			tempMax: 20, tempMin: 20, rhMax: 50, rhMin: 50, gustMax: 20, date: "2024-01-15", timezone: "UTC"
		} );
		expect( session.lastReading ).toBe( enriched );
	} );

	it( "accumulates rain and pressure history across readings", () => {
		const session = new WeatherSession( "s1" );
		enrichReading( session, makeReading( { epoch: NOW, precipTotal: 0.4, temperature: 18 } ), options( NOW ) );
		const enriched = enrichReading(
			session,
			makeReading( { epoch: NOW + 120, precipTotal: 0.8, pressureAbsolute: 1000.5 } ),
			options( NOW + 120 )
		);

		expect( enriched.rain.instant ).toBeCloseTo( 12, 9 );
		expect( enriched.rain.label ).toBe( "Moderate rain" );
		expect( enriched.pressureTrend ).toMatchObject( {
			deltaHpa: 0.5, label: "Rising", source: "local", outlook: "Slight improvement"
		} );
		expect( enriched.pressureTrend.ratePerHour ).toBeCloseTo( 15, 9 );
		expect( enriched.extremes ).toMatchObject( { tempMax: 20, tempMin: 18 } );
	} );

	it( "applies configured thresholds and decay", () => {
		const session = new WeatherSession( "s1" );
		const tuning = { pressureThresholds: { stable: 1, rapidChange: 2 }, rainDecayMinutes: 1 };
		enrichReading( session, makeReading( { epoch: NOW, precipTotal: 0.4 } ), options( NOW, tuning ) );
		const enriched = enrichReading(
			session,
			makeReading( { epoch: NOW + 120, precipTotal: 0.4, pressureAbsolute: 1000.5 } ),
			options( NOW + 120, tuning )
		);

		expect( enriched.pressureTrend.label ).toBe( "Stable" );
		expect( enriched.rain.instant ).toBe( 0 );
	} );

	it( "prefers a remote pressure reading", () => {
		const session = new WeatherSession( "s1" );
		const enriched = enrichReading( session, makeReading(), options( NOW, {
			remotePressure: { pressureNow: 1013, epochNow: NOW - 60, pressure3hAgo: 1016, epoch3hAgo: NOW - 60 - 10800 }
		} ) );
		expect( enriched.pressureTrend ).toMatchObject( {
			deltaHpa: -3, label: "Falling fast", source: "remote", outlook: "Gradual deterioration, rain likely"
		} );
	} );

	it( "derives a local pressure trend from uploads without an elevation", () => {
		const normalizer = new LocalNormalizer();
		const session = new WeatherSession( "s1" );
		const morning = Date.UTC( 2024, 0, 15, 6 ) / 1000;
		const upload = ( dateutc: string, baromin: string ) =>
			normalizer.normalize( { ID: "KSTATION1", dateutc, tempf: "50", humidity: "80", baromin } );

		enrichReading( session, upload( "2024-01-15 06:00:00", "29.92" ), options( morning ) );
		const enriched = enrichReading( session, upload( "2024-01-15 09:00:00", "30.05" ), options( morning + 10800 ) );

		const delta = 30.05 / 0.02953 - 29.92 / 0.02953;
		expect( enriched.pressureTrend.source ).toBe( "local" );
		expect( enriched.pressureTrend.deltaHpa ).toBeCloseTo( delta, 9 );
		expect( enriched.pressureTrend.ratePerHour ).toBeCloseTo( delta / 3, 9 );
		expect( enriched.pressureTrend.label ).toBe( "Rising fast" );
		expect( enriched.thermodynamics.potentialTemperature ).toBeCloseTo( potentialTemperature( 10, 30.05 / 0.02953 ), 9 );
		expect( enriched.thermodynamics.airDensity ).toBeGreaterThan( 1.2 );
		expect( enriched.validation.warnings ).toEqual( [ "Station elevation unknown, pressures taken at sea level" ] );
	} );

	it( "reports validation errors without stopping", () => {
		const warn = vi.spyOn( console, "warn" ).mockImplementation( () => undefined );
		const session = new WeatherSession( "s1" );
		const enriched = enrichReading( session, makeReading( { epoch: NaN } ), options( NOW ) );

		expect( enriched.validation.valid ).toBe( false );
		expect( warn ).toHaveBeenCalledWith( "[Enrichment] Session \"s1\": Missing timestamp" );
		expect( enriched.dataAgeSeconds ).toBeNaN();
		expect( enriched.extremes.date ).toBeNull();
		expect( enriched.thermodynamics.dewPoint ).toBeCloseTo( 9.27, 2 );
	} );

	it( "counts days in the station's time zone and restarts when it changes", () => {
		const session = new WeatherSession( "s1" );
		const madrid = { ...STATION, lat: 40.4168, lon: -3.7038 };
		const seattle = { ...STATION, lat: 47.6062, lon: -122.3321 };

		const first = enrichReading( session, makeReading( { station: madrid, temperature: 30 } ), options( NOW ) );
		expect( first.extremes.timezone ).toBe( "Europe/Madrid" );

		const second = enrichReading( session, makeReading( { epoch: NOW, station: seattle, temperature: 5 } ), options( NOW ) );
		expect( second.extremes ).toMatchObject( { timezone: "America/Los_Angeles", date: "2024-01-15", tempMax: 5, tempMin: 5 } );
	} );
} );

describe( "SessionStore", () => {
	it( "keeps sessions apart", () => {
		const store = new SessionStore();
		enrichReading( store.get( "a" ), makeReading( { epoch: NOW, precipTotal: 0.4 } ), options( NOW ) );
		const other = enrichReading( store.get( "b" ), makeReading( { epoch: NOW + 120, precipTotal: 0.8 } ), options( NOW + 120 ) );

		expect( other.rain.instant ).toBe( 0.4 );
		expect( store.get( "a" ).rain.samples ).toEqual( [ { epoch: NOW, totalMm: 0.4 } ] );
		expect( store.size ).toBe( 2 );
	} );

	it( "creates sessions on demand and forgets deleted ones", () => {
		const store = new SessionStore();
		expect( store.has( "a" ) ).toBe( false );

		const session = store.get( "a" );
		expect( store.get( "a" ) ).toBe( session );
		enrichReading( session, makeReading(), options( NOW ) );

		expect( store.delete( "a" ) ).toBe( true );
		expect( session.lastReading ).toBeUndefined();
		expect( session.currentExtremes ).toBeUndefined();
		expect( store.has( "a" ) ).toBe( false );
		expect( store.delete( "a" ) ).toBe( false );
	} );

	it( "drops sessions that stay idle too long", () => {
		const log = vi.spyOn( console, "log" ).mockImplementation( () => undefined );
		let clock = NOW;
		const store = new SessionStore( { idleMinutes: 10, clock: () => clock } );
		const session = store.get( "a" );
		enrichReading( session, makeReading(), options( NOW ) );

		clock += 500;
		expect( store.get( "a" ) ).toBe( session );
		clock += 500;
		expect( store.has( "a" ) ).toBe( true );
		clock += 101;
		expect( store.has( "a" ) ).toBe( false );

		store.get( "b" );
		expect( store.size ).toBe( 1 );
		expect( session.lastReading ).toBeUndefined();
		expect( log ).toHaveBeenCalledWith( "[Sessions] Dropped session \"a\" (idle)" );
	} );

	it( "drops the least recently used session beyond the limit", () => {
		let clock = NOW;
		const store = new SessionStore( { maxSessions: 2, clock: () => clock } );
		store.get( "a" );
		clock += 1;
		store.get( "b" );
		clock += 1;
		store.get( "a" );
		clock += 1;
		store.get( "c" );

		expect( store.size ).toBe( 2 );
		expect( store.has( "a" ) ).toBe( true );
		expect( store.has( "b" ) ).toBe( false );
		expect( store.has( "c" ) ).toBe( true );
	} );
} );
