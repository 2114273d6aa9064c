import { EARTH_RADIUS_KM } from "../../config";
import { GeoCoordinates } from "../../types";
import { degreesToRadians } from "../normalization/converters";

/**
 * Great-circle distance between two points with the haversine formula.
 * @return The distance in kilometers (NaN if a coordinate is NaN).
 */
export function haversineDistance( a: GeoCoordinates, b: GeoCoordinates ): number {
	const [ lat1, lon1 ] = a;
	const [ lat2, lon2 ] = b;
	const dLat = degreesToRadians( lat2 - lat1 );
	const dLon = degreesToRadians( lon2 - lon1 );

	const h = Math.sin( dLat / 2 ) ** 2
		+ Math.cos( degreesToRadians( lat1 ) ) * Math.cos( degreesToRadians( lat2 ) ) * Math.sin( dLon / 2 ) ** 2;
	return 2 * EARTH_RADIUS_KM * Math.asin( Math.min( 1, Math.sqrt( h ) ) );
}

export function isValidCoordinate( lat: number, lon: number ): boolean {
	return lat >= -90 && lat <= 90 && lon >= -180 && lon <= 180;
}
