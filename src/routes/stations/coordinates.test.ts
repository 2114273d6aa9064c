import { beforeEach, describe, expect, it, vi } from "vitest";

import type { StationCandidate } from "../../types";
import { normalizeCoordinateOrder } from "./coordinates";
import { haversineDistance } from "./geo";

const MADRID: StationCandidate = {
	providerId: "AEMET",
	providerName: "AEMET",
	stationId: "3195",
	name: "MADRID",
	lat: 40.4117,
	lon: -3.6781,
	elevation: 667,
	distanceKm: 0,
	metadata: {}
};

function registryWith( stations: StationCandidate[] ) {
	return {
		searchNearbyStations: vi.fn( async ( lat: number, lon: number, maxResults?: number ): Promise<StationCandidate[]> => stations
			.map( ( s ) => ( { ...s, distanceKm: haversineDistance( [ lat, lon ], [ s.lat, s.lon ] ) } ) )
			.sort( ( a, b ) => a.distanceKm - b.distanceKm )
			.slice( 0, maxResults ) )
	};
}

beforeEach( () => {
	vi.spyOn( console, "log" ).mockImplementation( () => undefined );
} );

describe( "normalizeCoordinateOrder", () => {
	it( "swaps coordinates whose nearest station is much closer in the other order", async () => {
		const registry = registryWith( [ MADRID ] );
		expect( await normalizeCoordinateOrder( -3.7, 40.4, registry ) ).toEqual( { lat: 40.4, lon: -3.7, swapped: true } );
		expect( registry.searchNearbyStations ).toHaveBeenCalledTimes( 2 );
	} );

	it( "keeps coordinates with a station nearby", async () => {
		const registry = registryWith( [ MADRID ] );
		expect( await normalizeCoordinateOrder( 40.4, -3.7, registry ) ).toEqual( { lat: 40.4, lon: -3.7, swapped: false } );
		expect( registry.searchNearbyStations ).toHaveBeenCalledTimes( 1 );
	} );

	it( "swaps an order that is only valid swapped without searching", async () => {
		const registry = registryWith( [ MADRID ] );
		expect( await normalizeCoordinateOrder( 120, 40, registry ) ).toEqual( { lat: 40, lon: 120, swapped: true } );
		expect( registry.searchNearbyStations ).not.toHaveBeenCalled();
	} );

	it( "keeps coordinates that are invalid in both orders", async () => {
		const registry = registryWith( [ MADRID ] );
		expect( await normalizeCoordinateOrder( 95, 200, registry ) ).toEqual( { lat: 95, lon: 200, swapped: false } );
		expect( registry.searchNearbyStations ).not.toHaveBeenCalled();
	} );

	it( "keeps coordinates when no stations are known", async () => {
		expect( await normalizeCoordinateOrder( -3.7, 40.4, registryWith( [] ) ) ).toEqual( { lat: -3.7, lon: 40.4, swapped: false } );
	} );
} );
