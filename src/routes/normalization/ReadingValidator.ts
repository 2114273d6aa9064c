import type { CanonicalReading, ValidationResult } from '../../types';

function warn(message: string) {
    console.warn(`[ReadingValidator] ${message}`);
}

interface Range {
    field: keyof Omit<CanonicalReading, 'station' | 'epoch'>;
    min: number;
    max: number;
}

// Plausible physical ranges; values outside are reported, not removed
const RANGES: readonly Range[] = [
    { field: 'temperature', min: -90, max: 60 },
    { field: 'humidity', min: 0, max: 100 },
    { field: 'dewPoint', min: -90, max: 40 },
    { field: 'pressureAbsolute', min: 300, max: 1100 },
    { field: 'pressureMsl', min: 870, max: 1090 },
    { field: 'windSpeed', min: 0, max: 410 },
    { field: 'windGust', min: 0, max: 410 },
    { field: 'windDirection', min: 0, max: 360 },
    { field: 'precipTotal', min: 0, max: 2000 },
    { field: 'solarRadiation', min: 0, max: 1800 },
    { field: 'uv', min: 0, max: 20 }
];

export interface ValidationOptions {
    /** Wall-clock Unix epoch seconds, for the staleness check. */
    now: number;
    /** Readings older than this many minutes get a warning. */
    maxAgeMinutes?: number;
    /** Emit warnings on the console. */
    logWarnings?: boolean;
}

/**
 * Check a canonical reading for implausible values.
 *
 * Missing values (NaN) are allowed. A missing or future timestamp is an error, everything else is a warning:
 * the reading is still used, its odd values just propagate as they are.
 */
export function validateReading(reading: CanonicalReading, options: ValidationOptions): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    // 1️⃣ Timestamp
    if (!Number.isFinite(reading.epoch)) {
        errors.push('Missing timestamp');
    } else if (reading.epoch - options.now > 300) {
        errors.push(`Timestamp lies in the future: ${new Date(reading.epoch * 1000).toISOString()}`);
    } else {
        const ageMinutes = (options.now - reading.epoch) / 60;
        const maxAge = options.maxAgeMinutes ?? 30;
        if (ageMinutes > maxAge) {
            warnings.push(`Reading is ${ageMinutes.toFixed(0)} minutes old, the station may have stopped reporting`);
        }
    }

    // 2️⃣ Value ranges
    for (const { field, min, max } of RANGES) {
        const value = reading[field];
        if (!Number.isNaN(value) && (value < min || value > max)) {
            warnings.push(`${field} outside plausible range [${min}, ${max}]: ${value}`);
        }
    }

    // 3️⃣ Consistency
    if (reading.dewPoint > reading.temperature + 0.5) {
        warnings.push(`dewPoint above temperature (${reading.dewPoint} > ${reading.temperature})`);
    }
    if (reading.windGust + 0.1 < reading.windSpeed) {
        warnings.push(`windGust below windSpeed (${reading.windGust} < ${reading.windSpeed})`);
    }
    if (Number.isNaN(reading.station.elevation)
        && (Number.isFinite(reading.pressureMsl) || Number.isFinite(reading.pressureAbsolute))) {
        warnings.push('Station elevation unknown, pressures taken at sea level');
    }

    if (options.logWarnings) {
        warnings.forEach(w => warn(w));
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings
    };
}
