/** Geographic coordinates. The 1st element is the latitude, and the 2nd element is the longitude. */
export type GeoCoordinates = [number, number];

/** Providers that readings and station inventories can come from. */
export type ProviderId = "AEMET" | "METEOCAT" | "EUSKALMET" | "METEOGALICIA" | "NWS" | "WU" | "LOCAL";

/** A loosely-typed, already JSON-decoded provider payload. */
export type RawPayload = Readonly<Record<string, unknown>>;

/** Identity and location of the station a reading belongs to. */
export interface StationIdentity {
	providerId: ProviderId;
	stationId: string;
	name: string;
	/** Latitude in degrees, NaN if unknown. */
	lat: number;
	/** Longitude in degrees, NaN if unknown. */
	lon: number;
	/** Elevation above sea level (in meters), NaN if unknown. */
	elevation: number;
}

/**
 * One normalized observation. Any field the provider did not deliver is NaN, never null or undefined, so arithmetic
 * on a missing value yields NaN instead of failing.
 */
export interface CanonicalReading {
	/** The Unix epoch seconds timestamp of the observation. */
	epoch: number;
	/** The air temperature (in Celsius). */
	temperature: number;
	/** The relative humidity (as a percentage). */
	humidity: number;
	/** The dew point reported by the station (in Celsius). Derived values live in ThermodynamicMetrics. */
	dewPoint: number;
	/** The station-level pressure (in hPa). */
	pressureAbsolute: number;
	/** The pressure reduced to mean sea level (in hPa). */
	pressureMsl: number;
	/** The mean wind speed (in km/h). */
	windSpeed: number;
	/** The wind gust (in km/h). */
	windGust: number;
	/** The direction the wind blows from (in degrees, 0-360). */
	windDirection: number;
	/** The precipitation accumulated since local midnight (in mm). */
	precipTotal: number;
	/** The solar irradiance (in W/m²). */
	solarRadiation: number;
	/** The UV index. */
	uv: number;
	station: Readonly<StationIdentity>;
}

/** A station of a provider's inventory. */
export interface StationRecord {
	providerId: ProviderId;
	providerName: string;
	stationId: string;
	name: string;
	lat: number;
	lon: number;
	/** Elevation above sea level (in meters). */
	elevation: number;
	/** The inventory entry the station was built from. */
	metadata: Readonly<Record<string, unknown>>;
}

/** A station found by the nearest-station search. */
export interface StationCandidate extends StationRecord {
	/** Great-circle distance to the query point (in kilometers). */
	distanceKm: number;
}

/** A pressure reading pair supplied by a provider's daily endpoint. */
export interface RemotePressureReading {
	pressureNow: number;
	epochNow: number;
	pressure3hAgo: number;
	epoch3hAgo: number;
}

/** The result of a validation. Errors are blocking for the consumer, warnings are not. */
export interface ValidationResult {
	valid: boolean;
	errors: string[];
	warnings: string[];
}
