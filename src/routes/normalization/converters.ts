/**
 * Unit conversion utilities for reading normalization.
 * Canonical units: °C, %, hPa, km/h, degrees, mm, W/m².
 * Every function propagates NaN, so a missing input yields a missing output.
 */

import { G0, RD } from '../../config';

/**
 * Temperature conversions
 */

export function fahrenheitToCelsius(fahrenheit: number): number {
    return (fahrenheit - 32) * 5 / 9;
}

export function kelvinToCelsius(kelvin: number): number {
    return kelvin - 273.15;
}

export function celsiusToKelvin(celsius: number): number {
    return celsius + 273.15;
}

/**
 * Pressure conversions
 */

export function inhgToHpa(inhg: number): number {
    return inhg / 0.02953;
}

export function paToHpa(pa: number): number {
    return pa / 100;
}

/**
 * Station-level pressure reduced to mean sea level with the barometric formula
 * p_msl = p_abs · exp(g·z / (R_d·T_K)).
 */
export function absoluteToMsl(pAbs: number, elevation: number, tempC: number): number {
    return pAbs * Math.exp((G0 * elevation) / (RD * celsiusToKelvin(tempC)));
}

/**
 * Inverse of absoluteToMsl for the same elevation and temperature.
 */
export function mslToAbsolute(pMsl: number, elevation: number, tempC: number): number {
    return pMsl * Math.exp((-G0 * elevation) / (RD * celsiusToKelvin(tempC)));
}

/**
 * Precipitation conversions
 */

export function inchesToMm(inches: number): number {
    return inches * 25.4;
}

/**
 * Wind speed conversions
 */

export function msToKmh(ms: number): number {
    return ms * 3.6;
}

export function kmhToMs(kmh: number): number {
    return kmh / 3.6;
}

export function mphToKmh(mph: number): number {
    return mph * 1.609344;
}

export function knotsToKmh(knots: number): number {
    return knots * 1.852;
}

/**
 * Angle/Direction conversions
 */

export function degreesToRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
}

/**
 * Normalize wind direction to 0-360 range
 */
export function normalizeWindDirection(degrees: number): number {
    let normalized = degrees % 360;
    if (normalized < 0) normalized += 360;
    return normalized;
}

const COMPASS_EN = [
    'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
    'S', 'SSW', 'SW', 'WSW', 'W', 'WNW', 'NW', 'NNW'
] as const;

const COMPASS_ES = [
    'N', 'NNE', 'NE', 'ENE', 'E', 'ESE', 'SE', 'SSE',
    'S', 'SSO', 'SO', 'OSO', 'O', 'ONO', 'NO', 'NNO'
] as const;

// Full names of the eight principal points, even bins only
const COMPASS_NAMES: Readonly<Record<string, number>> = {
    norte: 0, north: 0,
    noreste: 2, nordeste: 2, northeast: 2,
    este: 4, east: 4,
    sureste: 6, sudeste: 6, southeast: 6,
    sur: 8, south: 8,
    suroeste: 10, sudoeste: 10, southwest: 10,
    oeste: 12, west: 12,
    noroeste: 14, northwest: 14
};

/**
 * Convert a 16-point compass name (English or Spanish) to degrees at the 22.5° bin center.
 * Unknown names give NaN.
 */
export function compassToDegrees(name: string): number {
    const cleaned = name.trim().toUpperCase().replace(/[\s.-]/g, '');
    if (!cleaned) return NaN;

    const en = COMPASS_EN.findIndex(point => point === cleaned);
    if (en >= 0) return en * 22.5;

    const es = COMPASS_ES.findIndex(point => point === cleaned);
    if (es >= 0) return es * 22.5;

    const byName = COMPASS_NAMES[cleaned.toLowerCase()];
    return byName === undefined ? NaN : byName * 22.5;
}

/**
 * Convert degrees to an English 16-point compass abbreviation ("—" for NaN).
 */
export function degreesToCompass(degrees: number): string {
    if (Number.isNaN(degrees)) return '—';
    const index = Math.floor((normalizeWindDirection(degrees) + 11.25) / 22.5) % 16;
    return COMPASS_EN[index];
}
