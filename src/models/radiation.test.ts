import { describe, expect, it } from "vitest";

import type { CanonicalReading } from "../types";
import {
	deriveRadiation, priestleyTaylorEt0, skyClarityIndex, skyClarityLabel, uvIndexLabel, waterBalance, waterBalanceLabel
} from "./radiation";

function makeReading( overrides: Partial<CanonicalReading> = {} ): CanonicalReading {
	return {
		epoch: 1705312800,
		temperature: 20,
		humidity: 50,
		dewPoint: NaN,
		pressureAbsolute: 1000,
		pressureMsl: NaN,
		windSpeed: NaN,
		windGust: NaN,
		windDirection: NaN,
		precipTotal: 0,
		solarRadiation: 300,
		uv: 3,
		station: { providerId: "LOCAL", stationId: "TEST", name: "", lat: NaN, lon: NaN, elevation: NaN },
		...overrides
	};
}

describe( "priestleyTaylorEt0", () => {
	it( "computes the reference evapotranspiration", () => {
		expect( priestleyTaylorEt0( 500, 20, 50, 1013.25 ) ).toBeCloseTo( 5.83652, 5 );
		expect( priestleyTaylorEt0( 300, 20, 50, 1000 ) ).toBeCloseTo( 3.51652, 5 );
	} );

	it( "reduces ET0 by up to 10 % in humid air", () => {
		expect( priestleyTaylorEt0( 500, 20, 90, 1013.25 ) ).toBeCloseTo( 5.54469, 5 );
		expect( priestleyTaylorEt0( 500, 20, 100, 1013.25 ) ).toBeCloseTo( 5.25287, 5 );
	} );

	it( "is zero without radiation", () => {
		expect( priestleyTaylorEt0( 0, 20, 50, 1013.25 ) ).toBe( 0 );
	} );

	it( "rejects input outside its domain", () => {
		expect( priestleyTaylorEt0( -1, 20, 50, 1013.25 ) ).toBeNaN();
		expect( priestleyTaylorEt0( 500, 20, 101, 1013.25 ) ).toBeNaN();
		expect( priestleyTaylorEt0( 500, 20, 50, NaN ) ).toBeNaN();
		expect( priestleyTaylorEt0( NaN, 20, 50, 1013.25 ) ).toBeNaN();
	} );
} );

describe( "sky clarity", () => {
	it( "relates radiation to a clear sky", () => {
		expect( skyClarityIndex( 500 ) ).toBe( 0.5 );
		expect( skyClarityIndex( 1200 ) ).toBe( 1 );
		expect( skyClarityIndex( 300, 600 ) ).toBe( 0.5 );
		expect( skyClarityIndex( -5 ) ).toBeNaN();
		expect( skyClarityIndex( NaN ) ).toBeNaN();
	} );

	it.each( [
		[ 0.8, "Clear" ],
		[ 0.79, "Mostly clear" ],
		[ 0.6, "Mostly clear" ],
		[ 0.4, "Partly cloudy" ],
		[ 0.2, "Cloudy" ],
		[ 0.19, "Very cloudy" ],
		[ NaN, "—" ]
	] )( "labels clarity %s as %s", ( clarity, label ) => {
		expect( skyClarityLabel( clarity ) ).toBe( label );
	} );
} );

describe( "uvIndexLabel", () => {
	it.each( [
		[ 0, "Low" ],
		[ 2.9, "Low" ],
		[ 3, "Moderate" ],
		[ 6, "High" ],
		[ 8, "Very high" ],
		[ 11, "Extreme" ],
		[ NaN, "—" ]
	] )( "labels UV %s as %s", ( uv, label ) => {
		expect( uvIndexLabel( uv ) ).toBe( label );
	} );
} );

describe( "water balance", () => {
	it( "subtracts ET0 from precipitation", () => {
		expect( waterBalance( 10, 4 ) ).toBe( 6 );
		expect( waterBalance( NaN, 4 ) ).toBeNaN();
	} );

	it.each( [
		[ 5.1, "Excess" ],
		[ 5, "Surplus" ],
		[ 0, "Balanced" ],
		[ -2, "Slight deficit" ],
		[ -5, "Deficit" ],
		[ NaN, "—" ]
	] )( "labels a balance of %s mm as %s", ( balance, label ) => {
		expect( waterBalanceLabel( balance ) ).toBe( label );
	} );
} );

describe( "deriveRadiation", () => {
	it( "derives every radiation metric from one reading", () => {
		const metrics = deriveRadiation( makeReading() );
		expect( metrics.et0 ).toBeCloseTo( 3.51652, 5 );
		expect( metrics.skyClarity ).toBe( 0.3 );
		expect( metrics.skyClarityLabel ).toBe( "Cloudy" );
		expect( metrics.uvLabel ).toBe( "Moderate" );
		expect( metrics.waterBalance ).toBeCloseTo( -3.51652, 5 );
		expect( metrics.waterBalanceLabel ).toBe( "Slight deficit" );
	} );

	it( "yields NaN and placeholder labels without radiation sensors", () => {
		const metrics = deriveRadiation( makeReading( { solarRadiation: NaN, uv: NaN } ) );
		expect( metrics ).toEqual( {
			et0: NaN,
			skyClarity: NaN,
			skyClarityLabel: "—",
			uvLabel: "—",
			waterBalance: NaN,
			waterBalanceLabel: "—"
		} );
	} );
} );
