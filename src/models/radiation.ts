/**
 * Solar radiation, UV and evapotranspiration metrics from a single reading.
 *
 * Radiation is in W/m², pressure in hPa, precipitation and ET0 in mm. NaN input yields NaN, and labels of NaN
 * values are "—".
 */

import type { CanonicalReading } from "../types";

/** Clear-sky irradiance a clarity of 1 refers to (W/m²). */
export const CLEAR_SKY_RADIATION = 1000;

const PRIESTLEY_TAYLOR_ALPHA = 1.26;
const LATENT_HEAT_MJ = 2.45;       // MJ/kg
const ALBEDO = 0.23;
const W_TO_MJ_DAY = 0.0864;        // 1 W/m² over one day, in MJ/m²
const DAYLIGHT_FRACTION = 0.5;     // instantaneous reading taken as twice the daily mean

/**
 * Reference evapotranspiration (Priestley-Taylor), in mm/day. Needs no wind or latitude, and is reduced by up to
 * 10 % in very humid air (RH above 80 %).
 */
export function priestleyTaylorEt0( solarRadiation: number, tempC: number, humidity: number, pressure: number ): number {
	if ( [ solarRadiation, tempC, humidity, pressure ].some( Number.isNaN ) ) {
		return NaN;
	}
	if ( solarRadiation < 0 || humidity < 0 || humidity > 100 ) {
		return NaN;
	}

	// Psychrometric constant and slope of the vapor pressure curve, both in kPa/°C
	const gamma = 0.665e-3 * ( pressure / 10 );
	const es = 0.6108 * Math.exp( ( 17.27 * tempC ) / ( tempC + 237.3 ) );
	const delta = ( 4098 * es ) / ( tempC + 237.3 ) ** 2;
	if ( delta + gamma === 0 ) {
		return NaN;
	}

	const netRadiation = solarRadiation * W_TO_MJ_DAY * DAYLIGHT_FRACTION * ( 1 - ALBEDO );
	let et0 = PRIESTLEY_TAYLOR_ALPHA * ( delta / ( delta + gamma ) ) * ( netRadiation / LATENT_HEAT_MJ );
	if ( humidity > 80 ) {
		et0 *= Math.max( 1 - 0.1 * ( ( humidity - 80 ) / 20 ), 0.9 );
	}
	return Math.max( et0, 0 );
}

/** Measured radiation as a fraction of clear-sky radiation, clamped to [0, 1]. */
export function skyClarityIndex( solarRadiation: number, clearSky: number = CLEAR_SKY_RADIATION ): number {
	if ( !( solarRadiation >= 0 ) || !( clearSky > 0 ) ) {
		return NaN;
	}
	return Math.min( solarRadiation / clearSky, 1 );
}

export function skyClarityLabel( clarity: number ): string {
	if ( Number.isNaN( clarity ) ) return "—";
	if ( clarity >= 0.8 ) return "Clear";
	if ( clarity >= 0.6 ) return "Mostly clear";
	if ( clarity >= 0.4 ) return "Partly cloudy";
	if ( clarity >= 0.2 ) return "Cloudy";
	return "Very cloudy";
}

/** WHO UV index category. */
export function uvIndexLabel( uv: number ): string {
	if ( Number.isNaN( uv ) ) return "—";
	if ( uv < 3 ) return "Low";
	if ( uv < 6 ) return "Moderate";
	if ( uv < 8 ) return "High";
	if ( uv < 11 ) return "Very high";
	return "Extreme";
}

/** Precipitation minus evapotranspiration (mm); negative means the soil dries out. */
export function waterBalance( precipitation: number, et0: number ): number {
	return precipitation - et0;
}

export function waterBalanceLabel( balance: number ): string {
	if ( Number.isNaN( balance ) ) return "—";
	if ( balance > 5 ) return "Excess";
	if ( balance > 0 ) return "Surplus";
	if ( balance > -2 ) return "Balanced";
	if ( balance > -5 ) return "Slight deficit";
	return "Deficit";
}

export interface RadiationMetrics {
	/** Reference evapotranspiration (mm/day). */
	et0: number;
	skyClarity: number;
	skyClarityLabel: string;
	uvLabel: string;
	/** Today's precipitation minus ET0 (mm). */
	waterBalance: number;
	waterBalanceLabel: string;
}

/**
 * Radiation metrics for one reading. ET0 uses the station-level pressure.
 */
export function deriveRadiation( reading: CanonicalReading ): RadiationMetrics {
	const et0 = priestleyTaylorEt0( reading.solarRadiation, reading.temperature, reading.humidity, reading.pressureAbsolute );
	const skyClarity = skyClarityIndex( reading.solarRadiation );
	const balance = waterBalance( reading.precipTotal, et0 );
	return {
		et0,
		skyClarity,
		skyClarityLabel: skyClarityLabel( skyClarity ),
		uvLabel: uvIndexLabel( reading.uv ),
		waterBalance: balance,
		waterBalanceLabel: waterBalanceLabel( balance )
	};
}
