/**
 * Thermodynamic quantities derived from temperature (°C), relative humidity (%) and pressure (hPa).
 *
 * All functions are pure. NaN input, or input outside a function's physical domain, yields NaN.
 */

import { CP, EPSILON, KAPPA, LCL_FACTOR, LV, RD, RV, TV_COEF } from "../config";
import type { CanonicalReading } from "../types";
import { celsiusToKelvin, kmhToMs } from "../routes/normalization/converters";

export { absoluteToMsl, mslToAbsolute } from "../routes/normalization/converters";

/** Saturation vapor pressure over water (Tetens), in hPa. */
export function saturationVaporPressure( tempC: number ): number {
	return 6.112 * Math.exp( ( 17.67 * tempC ) / ( tempC + 243.5 ) );
}

/** Actual vapor pressure, in hPa. */
export function vaporPressure( tempC: number, humidity: number ): number {
	return ( humidity / 100 ) * saturationVaporPressure( tempC );
}

/** Dew point from vapor pressure (inverse Tetens), in °C. */
export function dewPointFromVaporPressure( e: number ): number {
	if ( !( e > 0 ) ) {
		return NaN;
	}
	const lnE = Math.log( e / 6.112 );
	return ( 243.5 * lnE ) / ( 17.67 - lnE );
}

export function dewPoint( tempC: number, humidity: number ): number {
	return dewPointFromVaporPressure( vaporPressure( tempC, humidity ) );
}

/** Mixing ratio r = ε·e / (p − e), in kg/kg. */
export function mixingRatio( e: number, pressure: number ): number {
	if ( !( pressure > e ) ) {
		return NaN;
	}
	return EPSILON * e / ( pressure - e );
}

/** Specific humidity q = r / (1 + r), in kg/kg. */
export function specificHumidity( e: number, pressure: number ): number {
	const r = mixingRatio( e, pressure );
	return r / ( 1 + r );
}

/** Absolute humidity (water vapor density), in g/m³. */
export function absoluteHumidity( e: number, tempC: number ): number {
	return ( ( e * 100 ) / ( RV * celsiusToKelvin( tempC ) ) ) * 1000;
}

/** Potential temperature θ = T_K·(1000/p)^(R_d/c_p), in °C. */
export function potentialTemperature( tempC: number, pressure: number ): number {
	if ( !( pressure > 0 ) ) {
		return NaN;
	}
	return celsiusToKelvin( tempC ) * Math.pow( 1000 / pressure, KAPPA ) - 273.15;
}

/** Virtual temperature T_v = T_K·(1 + 0.61·q), in °C. */
export function virtualTemperature( tempC: number, q: number ): number {
	return celsiusToKelvin( tempC ) * ( 1 + TV_COEF * q ) - 273.15;
}

/**
 * Temperature at the lifting condensation level (Bolton 1980, eq. 22), in Kelvin.
 */
export function lclTemperature( tempC: number, humidity: number ): number {
	if ( !( humidity > 0 && humidity <= 100 ) ) {
		return NaN;
	}
	const tempK = celsiusToKelvin( tempC );
	return 1 / ( 1 / ( tempK - 55 ) - Math.log( humidity / 100 ) / 2840 ) + 55;
}

/** Mixing ratio in g/kg straight from T, RH and p. */
function mixingRatioGkg( tempC: number, humidity: number, pressure: number ): number {
	return mixingRatio( vaporPressure( tempC, humidity ), pressure ) * 1000;
}

// exp[(3.376/T_L − 0.00254)·r·(1 + 0.00081·r)] with r in g/kg
function boltonMoistureFactor( tempC: number, humidity: number, pressure: number ): number {
	const r = mixingRatioGkg( tempC, humidity, pressure );
	const tL = lclTemperature( tempC, humidity );
	return Math.exp( ( 3.376 / tL - 0.00254 ) * r * ( 1 + 0.00081 * r ) );
}

/**
 * Equivalent temperature: the temperature the parcel would have if all its moisture condensed at constant
 * pressure. Bolton moisture factor applied to T, in °C.
 */
export function equivalentTemperature( tempC: number, humidity: number, pressure: number ): number {
	return celsiusToKelvin( tempC ) * boltonMoistureFactor( tempC, humidity, pressure ) - 273.15;
}

/**
 * Equivalent potential temperature θE (Bolton 1980, eq. 43), in °C.
 */
export function equivalentPotentialTemperature( tempC: number, humidity: number, pressure: number ): number {
	if ( !( pressure > 0 ) ) {
		return NaN;
	}
	const r = mixingRatioGkg( tempC, humidity, pressure );
	const exponent = 0.2854 * ( 1 - 0.00028 * r );
	return celsiusToKelvin( tempC ) * Math.pow( 1000 / pressure, exponent )
		* boltonMoistureFactor( tempC, humidity, pressure ) - 273.15;
}

/** Height of the lifting condensation level, linear estimate, in meters. */
export function lclHeight( tempC: number, dewPointC: number ): number {
	return LCL_FACTOR * ( tempC - dewPointC );
}

/** Air density ρ = p / (R_d·T_v), in kg/m³. */
export function airDensity( pressure: number, virtualTempC: number ): number {
	return ( pressure * 100 ) / ( RD * celsiusToKelvin( virtualTempC ) );
}

/**
 * Wet-bulb temperature (Stull 2011), in °C. Valid for RH in [0, 100].
 */
export function wetBulbStull( tempC: number, humidity: number ): number {
	if ( !( humidity >= 0 && humidity <= 100 ) ) {
		return NaN;
	}
	return tempC * Math.atan( 0.151977 * Math.sqrt( humidity + 8.313659 ) )
		+ Math.atan( tempC + humidity )
		- Math.atan( humidity - 1.676331 )
		+ 0.00391838 * Math.pow( humidity, 1.5 ) * Math.atan( 0.023101 * humidity )
		- 4.686035;
}

/**
 * Wet-bulb temperature from the psychrometric equation e = e_s(Tw) − γ·(T − Tw), γ = c_p·p / (ε·L_v),
 * solved with Newton's method seeded by Stull. The result is clamped to [Td, T].
 */
export function wetBulbPsychrometric( tempC: number, humidity: number, pressure: number ): number {
	let tw = wetBulbStull( tempC, humidity );
	if ( Number.isNaN( tw ) || Number.isNaN( tempC ) ) {
		return NaN;
	}
	if ( !( pressure > 0 ) ) {
		return tw;
	}

	const gamma = CP * pressure / ( EPSILON * LV );
	const e = vaporPressure( tempC, humidity );

	for ( let i = 0; i < 50; i++ ) {
		const es = saturationVaporPressure( tw );
		const f = es - gamma * ( tempC - tw ) - e;
		const df = es * 17.67 * 243.5 / Math.pow( tw + 243.5, 2 ) + gamma;
		const delta = f / df;
		tw -= delta;
		if ( Math.abs( delta ) < 1e-6 ) {
			break;
		}
	}

	const td = dewPointFromVaporPressure( e );
	if ( !Number.isNaN( td ) ) {
		tw = Math.max( tw, td );
	}
	return Math.min( tw, tempC );
}

/** Psychrometric wet bulb when the pressure is known, Stull otherwise. */
export function wetBulb( tempC: number, humidity: number, pressure: number = NaN ): number {
	return Number.isNaN( pressure ) ? wetBulbStull( tempC, humidity ) : wetBulbPsychrometric( tempC, humidity, pressure );
}

/**
 * Apparent temperature (Steadman 1984): T + 0.33·e − 0.70·v − 4.00, with v in m/s. Missing wind counts as calm.
 */
export function apparentTemperature( tempC: number, e: number, windMs: number ): number {
	const wind = Number.isNaN( windMs ) ? 0 : windMs;
	return tempC + 0.33 * e - 0.70 * wind - 4.00;
}

/**
 * Heat index (Rothfusz regression, Celsius coefficients), applied at every temperature. The fit is made for
 * hot and humid air; away from that it drifts from the air temperature.
 */
export function heatIndex( tempC: number, humidity: number ): number {
	if ( Number.isNaN( tempC ) || Number.isNaN( humidity ) ) {
		return NaN;
	}
	const T = tempC;
	const R = humidity;
	return -8.78469475556
		+ 1.61139411 * T
		+ 2.33854883889 * R
		- 0.14611605 * T * R
		- 0.012308094 * T * T
		- 0.0164248277778 * R * R
		+ 0.002211732 * T * T * R
		+ 0.00072546 * T * R * R
		- 0.000003582 * T * T * R * R;
}

export interface ThermodynamicMetrics {
	/** Saturation vapor pressure (hPa). */
	saturationVaporPressure: number;
	/** Vapor pressure (hPa). */
	vaporPressure: number;
	/** Dew point (°C), computed from T and RH. */
	dewPoint: number;
	/** Mixing ratio (g/kg). */
	mixingRatio: number;
	/** Specific humidity (g/kg). */
	specificHumidity: number;
	/** Absolute humidity (g/m³). */
	absoluteHumidity: number;
	potentialTemperature: number;
	virtualTemperature: number;
	equivalentTemperature: number;
	equivalentPotentialTemperature: number;
	wetBulb: number;
	apparentTemperature: number;
	heatIndex: number;
	/** Air density (kg/m³). */
	airDensity: number;
	/** Height of the lifting condensation level (m). */
	lclHeight: number;
}

/**
 * All derived quantities for one reading, based on T, RH and the station-level pressure.
 */
export function deriveThermodynamics( reading: CanonicalReading ): ThermodynamicMetrics {
	const { temperature: t, humidity: rh, pressureAbsolute: p } = reading;

	const e = vaporPressure( t, rh );
	const td = dewPointFromVaporPressure( e );
	const q = specificHumidity( e, p );
	const tv = virtualTemperature( t, q );

	return {
		saturationVaporPressure: saturationVaporPressure( t ),
		vaporPressure: e,
		dewPoint: td,
		mixingRatio: mixingRatio( e, p ) * 1000,
		specificHumidity: q * 1000,
		absoluteHumidity: absoluteHumidity( e, t ),
		potentialTemperature: potentialTemperature( t, p ),
		virtualTemperature: tv,
		equivalentTemperature: equivalentTemperature( t, rh, p ),
		equivalentPotentialTemperature: equivalentPotentialTemperature( t, rh, p ),
		wetBulb: wetBulb( t, rh, p ),
		apparentTemperature: apparentTemperature( t, e, kmhToMs( reading.windSpeed ) ),
		heatIndex: heatIndex( t, rh ),
		airDensity: airDensity( p, tv ),
		lclHeight: lclHeight( t, td )
	};
}
