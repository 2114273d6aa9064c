import { StationRegistry } from "./StationRegistry";
import { isValidCoordinate } from "./geo";

/** Beyond this distance to the nearest station, the swapped order is also tried. */
const SWAP_CHECK_DISTANCE_KM = 500;

export interface CoordinateOrder {
	lat: number;
	lon: number;
	/** True if the returned coordinates are the input in swapped order. */
	swapped: boolean;
}

type NearestSearch = Pick<StationRegistry, "searchNearbyStations">;

async function nearestDistance( registry: NearestSearch, lat: number, lon: number ): Promise<number> {
	const [ nearest ] = await registry.searchNearbyStations( lat, lon, 1 );
	return nearest ? nearest.distanceKm : Infinity;
}

/**
 * Best-effort correction of coordinates entered as (lon, lat) instead of (lat, lon).
 *
 * An order that is only valid swapped is swapped. When both orders are valid and no station lies within 500 km of the
 * given order, the swapped order is adopted if its nearest station is at least twice as close. This is a heuristic:
 * near the equator and the prime meridian both orders can look plausible.
 */
export async function normalizeCoordinateOrder( lat: number, lon: number, registry: NearestSearch ): Promise<CoordinateOrder> {
	const asGiven: CoordinateOrder = { lat, lon, swapped: false };
	const swapped: CoordinateOrder = { lat: lon, lon: lat, swapped: true };

	const givenOk = isValidCoordinate( lat, lon );
	const swappedOk = isValidCoordinate( lon, lat );
	if ( !swappedOk || !givenOk ) {
		return swappedOk ? swapped : asGiven;
	}

	const dGiven = await nearestDistance( registry, lat, lon );
	if ( dGiven <= SWAP_CHECK_DISTANCE_KM ) {
		return asGiven;
	}

	const dSwapped = await nearestDistance( registry, lon, lat );
	if ( dSwapped < dGiven * 0.5 ) {
		console.log( `[Coordinates] Swapping (${ lat }, ${ lon }): nearest station ${ dSwapped.toFixed( 1 ) } km instead of ${ dGiven.toFixed( 1 ) } km` );
		return swapped;
	}
	return asGiven;
}
