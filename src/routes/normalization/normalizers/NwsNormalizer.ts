import { BaseNormalizer, type FieldAliases, type MeasureField, type NormalizationContext } from '../BaseNormalizer';
import { fahrenheitToCelsius, inhgToHpa, kelvinToCelsius, knotsToKmh, mphToKmh, msToKmh, paToHpa } from '../converters';
import { getPath, parseNumber } from '../parse';
import type { RawPayload, StationIdentity } from '../../../types';

type Converter = (value: number) => number;

// WMO unit codes as used by api.weather.gov, without the "wmoUnit:" prefix
const UNIT_CONVERSIONS: Readonly<Record<string, Converter>> = {
    'degc': v => v,
    'degf': fahrenheitToCelsius,
    'k': kelvinToCelsius,
    'pa': paToHpa,
    'hpa': v => v,
    'in_hg': inhgToHpa,
    'km_h-1': v => v,
    'm_s-1': msToKmh,
    'kn': knotsToKmh,
    'mi_h-1': mphToKmh,
    'percent': v => v,
    'degree_(angle)': v => v,
    'mm': v => v,
    'm': v => v
};

/**
 * Normalizer for NWS (api.weather.gov) observation features (`/stations/{id}/observations/latest`).
 *
 * Every measurement is a `{ value, unitCode }` object, so units are resolved per value instead of per provider.
 * Coordinates come from the GeoJSON geometry as [lon, lat].
 */
export class NwsNormalizer extends BaseNormalizer {
    readonly providerId = 'NWS';
    readonly providerName = 'NWS';

    protected readonly aliases: FieldAliases = {
        epoch: ['properties.timestamp'],
        stationId: ['properties.stationId', 'properties.station'],
        stationName: ['properties.stationName'],
        lat: ['lat'],
        lon: ['lon'],
        elevation: ['properties.elevation'],
        temperature: ['properties.temperature'],
        humidity: ['properties.relativeHumidity'],
        dewPoint: ['properties.dewpoint'],
        pressureAbsolute: ['properties.barometricPressure'],
        pressureMsl: ['properties.seaLevelPressure'],
        windSpeed: ['properties.windSpeed'],
        windGust: ['properties.windGust'],
        windDirection: ['properties.windDirection.value']
    };

    protected prepare(payload: RawPayload): RawPayload {
        const coordinates = getPath(payload, 'geometry.coordinates');
        if (!Array.isArray(coordinates) || coordinates.length < 2) {
            return payload;
        }
        return { ...payload, lon: parseNumber(coordinates[0]), lat: parseNumber(coordinates[1]) };
    }

    protected readMeasure(data: RawPayload, field: MeasureField): number {
        for (const alias of this.aliasesFor(field)) {
            const value = this.readQuantity(data, alias);
            if (!Number.isNaN(value)) {
                return value;
            }
        }
        return NaN;
    }

    protected resolveStation(data: RawPayload, context: NormalizationContext): StationIdentity {
        const station = super.resolveStation(data, context);
        if (Number.isNaN(station.elevation)) {
            station.elevation = this.readQuantity(data, 'properties.elevation');
        }
        // "https://api.weather.gov/stations/KSEA" -> "KSEA"
        station.stationId = station.stationId.split('/').filter(Boolean).pop()?.toUpperCase() ?? '';
        return station;
    }

    private readQuantity(data: RawPayload, path: string): number {
        const value = parseNumber(getPath(data, `${path}.value`));
        const unitCode = getPath(data, `${path}.unitCode`);
        if (Number.isNaN(value) || typeof unitCode !== 'string') {
            return value;
        }
        const unit = unitCode.replace(/^wmoUnit:/i, '').toLowerCase();
        const convert = UNIT_CONVERSIONS[unit];
        if (!convert) {
            this.warn(`Unknown unit code "${unitCode}" at ${path}`);
            return NaN;
        }
        return convert(value);
    }
}
