import fs from "fs";
import path from "path";

import { CodedError, ErrorCode, describeError } from "../../errors";
import { ProviderId, RawPayload, StationCandidate, StationRecord } from "../../types";
import { isRecord, parseNumber } from "../normalization/parse";
import { haversineDistance } from "./geo";

export { isRecord };

/** A source of stations that can be searched by distance, ID or name. */
export interface StationProvider {
	readonly providerId: ProviderId;
	readonly providerName: string;

	/**
	 * Finds the stations nearest to a point.
	 * @return A Promise resolved with at most maxResults candidates sorted by ascending distance, or rejected if the
	 * provider's station source is unavailable.
	 */
	searchNearbyStations( lat: number, lon: number, maxResults: number ): Promise<StationCandidate[]>;

	/** @return The station with this ID (compared case-insensitively), or undefined. */
	findStation( stationId: string ): Promise<StationRecord | undefined>;

	/** @return At most maxResults stations whose name contains the query, ignoring case, in inventory order. */
	searchStationsByName( query: string, maxResults: number ): Promise<StationRecord[]>;
}

/** A station as described by an inventory entry, before the distance is known. */
export interface InventoryStation {
	stationId: string;
	name: string;
	lat: number;
	lon: number;
	elevation: number;
}

/** Returns the trimmed text of a string or number inventory field, or an empty string. */
export function textField( entry: RawPayload, key: string ): string {
	const value = entry[ key ];
	return typeof value === "string" || typeof value === "number" ? String( value ).trim() : "";
}

/** Returns a numeric inventory field, NaN if it is missing or unparseable. */
export function numberField( entry: RawPayload, key: string ): number {
	return parseNumber( entry[ key ] );
}

type LoadedStation = InventoryStation & { metadata: RawPayload };

/**
 * A station provider backed by a JSON inventory file in the stations directory. The file is read once, on the first
 * search, and kept in memory afterwards.
 */
export abstract class InventoryStationProvider implements StationProvider {
	public abstract readonly providerId: ProviderId;
	public abstract readonly providerName: string;

	/** File name of the inventory inside the stations directory. */
	protected abstract readonly inventoryFile: string;

	private inventory: Promise<LoadedStation[]> | undefined;

	public constructor( private readonly stationsLocation: string ) {}

	/**
	 * Maps one inventory entry to a station, or returns undefined to skip it.
	 */
	protected abstract toStation( entry: RawPayload ): InventoryStation | undefined;

	/**
	 * Extracts the list of entries from the decoded inventory file. Most inventories are a bare list.
	 */
	protected extractEntries( data: unknown ): unknown[] | undefined {
		return Array.isArray( data ) ? data : undefined;
	}

	public async searchNearbyStations( lat: number, lon: number, maxResults: number ): Promise<StationCandidate[]> {
		const stations = await this.getStations();

		const candidates: StationCandidate[] = [];
		for ( const station of stations ) {
			const distanceKm = haversineDistance( [ lat, lon ], [ station.lat, station.lon ] );
			if ( Number.isNaN( distanceKm ) ) {
				continue;
			}
			candidates.push( Object.freeze( { ...this.toRecord( station ), distanceKm } ) );
		}

		candidates.sort( ( a, b ) => a.distanceKm - b.distanceKm );
		return candidates.slice( 0, maxResults );
	}

	public async findStation( stationId: string ): Promise<StationRecord | undefined> {
		const wanted = stationId.trim().toUpperCase();
		const station = ( await this.getStations() ).find( ( s ) => s.stationId.toUpperCase() === wanted );
		return station && this.toRecord( station );
	}

	public async searchStationsByName( query: string, maxResults: number ): Promise<StationRecord[]> {
		const needle = query.trim().toLowerCase();
		if ( !needle ) {
			return [];
		}
		const stations = await this.getStations();
		return stations
			.filter( ( station ) => station.name.toLowerCase().includes( needle ) )
			.slice( 0, maxResults )
			.map( ( station ) => this.toRecord( station ) );
	}

	private toRecord( station: LoadedStation ): StationRecord {
		return Object.freeze( { providerId: this.providerId, providerName: this.providerName, ...station } );
	}

	private getStations(): Promise<LoadedStation[]> {
		if ( !this.inventory ) {
			this.inventory = this.loadInventory().catch( ( err: unknown ) => {
				// The next search reads the file again
				this.inventory = undefined;
				throw err;
			} );
		}
		return this.inventory;
	}

	private async loadInventory(): Promise<LoadedStation[]> {
		const file = path.join( this.stationsLocation, this.inventoryFile );

		let data: unknown;
		try {
			data = JSON.parse( await fs.promises.readFile( file, "utf-8" ) );
		} catch ( err ) {
			throw new CodedError( ErrorCode.StationInventoryUnavailable, `${ this.providerName } inventory ${ file }: ${ describeError( err ) }` );
		}

		const entries = this.extractEntries( data );
		if ( !entries ) {
			throw new CodedError( ErrorCode.StationInventoryUnavailable, `${ this.providerName } inventory ${ file } has an unexpected shape` );
		}

		const stations: LoadedStation[] = [];
		for ( const entry of entries ) {
			if ( !isRecord( entry ) ) {
				continue;
			}
			const station = this.toStation( entry );
			if ( station && station.stationId && Number.isFinite( station.lat ) && Number.isFinite( station.lon ) ) {
				stations.push( { ...station, metadata: entry } );
			}
		}

		console.log( `[${ this.providerName }] Loaded ${ stations.length } stations from ${ file }` );
		return stations;
	}
}
