import { CodedError, ErrorCode, describeError } from "../../errors";
import { ProviderId, StationCandidate, StationRecord } from "../../types";
import { StationProvider } from "./StationProvider";

export const DEFAULT_MAX_RESULTS = 5;
export const DEFAULT_MAX_NAME_RESULTS = 10;

/**
 * Searches all registered station providers at once. Providers are independent of each other: one whose source is
 * unavailable is logged and skipped, and the others still contribute their stations.
 */
export class StationRegistry {
	private readonly providers: ReadonlyMap<ProviderId, StationProvider>;

	public constructor( providers: readonly StationProvider[] ) {
		this.providers = new Map( providers.map( ( provider ) => [ provider.providerId, provider ] ) );
	}

	public getProvider( providerId: ProviderId ): StationProvider | undefined {
		return this.providers.get( providerId );
	}

	public getProviderIds(): ProviderId[] {
		return Array.from( this.providers.keys() );
	}

	/**
	 * Finds the stations nearest to a point across every provider.
	 * @param maxResults The maximum number of candidates to return, a positive integer.
	 * @return The merged candidates sorted by ascending distance.
	 * @throws CodedError(InvalidArgument) if maxResults or the coordinates are unusable.
	 */
	public async searchNearbyStations( lat: number, lon: number, maxResults: number = DEFAULT_MAX_RESULTS ): Promise<StationCandidate[]> {
		if ( !Number.isInteger( maxResults ) || maxResults < 1 ) {
			throw new CodedError( ErrorCode.InvalidArgument, `maxResults must be a positive integer (got ${ maxResults })` );
		}
		if ( !Number.isFinite( lat ) || !Number.isFinite( lon ) ) {
			throw new CodedError( ErrorCode.InvalidArgument, `Coordinates must be finite numbers (got ${ lat }, ${ lon })` );
		}

		const providers = Array.from( this.providers.values() );
		const results = await Promise.allSettled(
			providers.map( async ( provider ) => provider.searchNearbyStations( lat, lon, maxResults ) )
		);

		const candidates: StationCandidate[] = [];
		results.forEach( ( result, index ) => {
			if ( result.status === "fulfilled" ) {
				candidates.push( ...result.value );
			} else {
				console.warn( `[StationRegistry] ${ providers[ index ].providerName } search failed, skipping: ${ describeError( result.reason ) }` );
			}
		} );

		candidates.sort( ( a, b ) => a.distanceKm - b.distanceKm );
		return candidates.slice( 0, maxResults );
	}

	/**
	 * Looks a station up by its ID within one provider.
	 * @return The station, or undefined if the provider has no station with this ID.
	 * @throws CodedError(UnknownProvider) if no provider with this ID is registered.
	 */
	public async findStation( providerId: string, stationId: string ): Promise<StationRecord | undefined> {
		const provider = Array.from( this.providers.values() ).find( ( p ) => p.providerId === providerId.toUpperCase() );
		if ( !provider ) {
			throw new CodedError( ErrorCode.UnknownProvider, `No station provider "${ providerId }"` );
		}
		return provider.findStation( stationId );
	}

	/**
	 * Finds stations whose name contains the query, ignoring case, across every provider. Providers are searched in
	 * registration order, and a failing one is logged and skipped.
	 * @throws CodedError(InvalidArgument) if maxResults is not a positive integer.
	 */
	public async searchStationsByName( query: string, maxResults: number = DEFAULT_MAX_NAME_RESULTS ): Promise<StationRecord[]> {
		if ( !Number.isInteger( maxResults ) || maxResults < 1 ) {
			throw new CodedError( ErrorCode.InvalidArgument, `maxResults must be a positive integer (got ${ maxResults })` );
		}

		const providers = Array.from( this.providers.values() );
		const results = await Promise.allSettled(
			providers.map( async ( provider ) => provider.searchStationsByName( query, maxResults ) )
		);

		const stations: StationRecord[] = [];
		results.forEach( ( result, index ) => {
			if ( result.status === "fulfilled" ) {
				stations.push( ...result.value );
			} else {
				console.warn( `[StationRegistry] ${ providers[ index ].providerName } name search failed, skipping: ${ describeError( result.reason ) }` );
			}
		} );
		return stations.slice( 0, maxResults );
	}
}
