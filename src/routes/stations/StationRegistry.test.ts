import { afterEach, describe, expect, it, vi } from "vitest";

import { ErrorCode } from "../../errors";
import type { ProviderId, StationCandidate, StationRecord } from "../../types";
import type { StationProvider } from "./StationProvider";
import { StationRegistry } from "./StationRegistry";

function candidate( providerId: ProviderId, stationId: string, distanceKm: number ): StationCandidate {
	return { providerId, providerName: providerId, stationId, name: stationId, lat: 0, lon: 0, elevation: 0, distanceKm, metadata: {} };
}

class FakeProvider implements StationProvider {
	public constructor(
		public readonly providerId: ProviderId,
		public readonly providerName: string,
		private readonly distances: number[] | Error
	) {}

	public async searchNearbyStations( lat: number, lon: number, maxResults: number ): Promise<StationCandidate[]> {
		if ( this.distances instanceof Error ) {
			throw this.distances;
		}
		return this.distances.slice( 0, maxResults ).map( ( d ) => candidate( this.providerId, `${ this.providerId }-${ d }`, d ) );
	}

	public async findStation( stationId: string ): Promise<StationRecord | undefined> {
		return ( await this.searchNearbyStations( 0, 0, Infinity ) ).find( ( s ) => s.stationId === stationId );
	}

	public async searchStationsByName( query: string, maxResults: number ): Promise<StationRecord[]> {
		const stations = await this.searchNearbyStations( 0, 0, Infinity );
		return stations.filter( ( s ) => s.name.includes( query ) ).slice( 0, maxResults );
	}
}

class ThrowingProvider implements StationProvider {
	public readonly providerId = "EUSKALMET";
	public readonly providerName = "Euskalmet";

	public searchNearbyStations(): Promise<StationCandidate[]> {
		throw new Error( "broken" );
	}

	public findStation(): Promise<StationRecord | undefined> {
		throw new Error( "broken" );
	}

	public searchStationsByName(): Promise<StationRecord[]> {
		throw new Error( "broken" );
	}
}

afterEach( () => {
	vi.restoreAllMocks();
} );

describe( "StationRegistry", () => {
	it( "merges providers by ascending distance", async () => {
		const registry = new StationRegistry( [
			new FakeProvider( "AEMET", "AEMET", [ 1, 10, 30 ] ),
			new FakeProvider( "NWS", "NWS", [ 5, 20 ] )
		] );
		const stations = await registry.searchNearbyStations( 0, 0, 3 );
		expect( stations.map( ( s ) => s.stationId ) ).toEqual( [ "AEMET-1", "NWS-5", "AEMET-10" ] );
	} );

	it( "uses five results by default", async () => {
		const registry = new StationRegistry( [ new FakeProvider( "AEMET", "AEMET", [ 1, 2, 3, 4, 5, 6, 7 ] ) ] );
		expect( await registry.searchNearbyStations( 0, 0 ) ).toHaveLength( 5 );
	} );

	it( "skips a failing provider and logs it", async () => {
		const warn = vi.spyOn( console, "warn" ).mockImplementation( () => undefined );
		const registry = new StationRegistry( [
			new FakeProvider( "AEMET", "AEMET", [ 3 ] ),
			new FakeProvider( "METEOCAT", "Meteocat", new Error( "file missing" ) ),
			new ThrowingProvider()
		] );

		const stations = await registry.searchNearbyStations( 41, 2, 5 );
		expect( stations.map( ( s ) => s.stationId ) ).toEqual( [ "AEMET-3" ] );
		expect( warn ).toHaveBeenCalledTimes( 2 );
		expect( warn ).toHaveBeenCalledWith( "[StationRegistry] Meteocat search failed, skipping: file missing" );
		expect( warn ).toHaveBeenCalledWith( "[StationRegistry] Euskalmet search failed, skipping: broken" );
	} );

	it( "returns an empty list without providers", async () => {
		expect( await new StationRegistry( [] ).searchNearbyStations( 0, 0, 1 ) ).toEqual( [] );
	} );

	it.each( [ 0, -1, 1.5, NaN ] )( "rejects maxResults %s", async ( maxResults ) => {
		await expect( new StationRegistry( [] ).searchNearbyStations( 0, 0, maxResults ) )
			.rejects.toMatchObject( { errCode: ErrorCode.InvalidArgument } );
	} );

	it( "rejects non-finite coordinates", async () => {
		await expect( new StationRegistry( [] ).searchNearbyStations( NaN, 0, 1 ) )
			.rejects.toMatchObject( { errCode: ErrorCode.InvalidArgument } );
	} );

	it( "looks up providers by ID", () => {
		const nws = new FakeProvider( "NWS", "NWS", [] );
		const registry = new StationRegistry( [ new FakeProvider( "AEMET", "AEMET", [] ), nws ] );
		expect( registry.getProvider( "NWS" ) ).toBe( nws );
		expect( registry.getProvider( "METEOCAT" ) ).toBeUndefined();
		expect( registry.getProviderIds() ).toEqual( [ "AEMET", "NWS" ] );
	} );

	it( "finds a station by provider and ID", async () => {
		const registry = new StationRegistry( [ new FakeProvider( "AEMET", "AEMET", [ 1, 2 ] ), new FakeProvider( "NWS", "NWS", [ 3 ] ) ] );
		expect( await registry.findStation( "nws", "NWS-3" ) ).toMatchObject( { providerId: "NWS", stationId: "NWS-3" } );
		expect( await registry.findStation( "AEMET", "NWS-3" ) ).toBeUndefined();
		await expect( registry.findStation( "METEOCAT", "X4" ) ).rejects.toMatchObject( { errCode: ErrorCode.UnknownProvider } );
	} );

	it( "searches names across providers in registration order", async () => {
		const warn = vi.spyOn( console, "warn" ).mockImplementation( () => undefined );
		const registry = new StationRegistry( [
			new FakeProvider( "AEMET", "AEMET", [ 1, 2, 3 ] ),
			new ThrowingProvider(),
			new FakeProvider( "NWS", "NWS", [ 4 ] )
		] );

		const stations = await registry.searchStationsByName( "-", 3 );
		expect( stations.map( ( s ) => s.stationId ) ).toEqual( [ "AEMET-1", "AEMET-2", "AEMET-3" ] );
		expect( ( await registry.searchStationsByName( "NWS" ) ).map( ( s ) => s.stationId ) ).toEqual( [ "NWS-4" ] );
		expect( warn ).toHaveBeenCalledWith( "[StationRegistry] Euskalmet name search failed, skipping: broken" );
		await expect( registry.searchStationsByName( "x", 0 ) ).rejects.toMatchObject( { errCode: ErrorCode.InvalidArgument } );
	} );
} );
