import { BaseNormalizer, type FieldAliases, type UnitConversions } from '../BaseNormalizer';
import { fahrenheitToCelsius, inchesToMm, inhgToHpa, mphToKmh } from '../converters';

/**
 * Normalizer for a local station pushing the Weather Underground upload protocol
 * (`/weatherstation/updateweatherstation.php?tempf=...&dateutc=now`), e.g. weewx or an Ecowitt gateway.
 *
 * Properties:
 * - All units are imperial
 * - `dateutc` is either "now" or "YYYY-MM-DD HH:MM:SS" in UTC
 * - -9999 marks a sensor without a value
 * - Only the MSL pressure (`baromin`) is sent; the absolute pressure is derived from the elevation
 */
export class LocalNormalizer extends BaseNormalizer {
    readonly providerId = 'LOCAL';
    readonly providerName = 'Local';

    protected readonly aliases: FieldAliases = {
        epoch: ['dateutc'],
        stationId: ['ID'],
        temperature: ['tempf'],
        humidity: ['humidity'],
        dewPoint: ['dewptf'],
        pressureAbsolute: ['absbaromin'],
        pressureMsl: ['baromin'],
        windSpeed: ['windspeedmph'],
        windGust: ['windgustmph'],
        windDirection: ['winddir'],
        precipTotal: ['dailyrainin'],
        solarRadiation: ['solarradiation'],
        uv: ['UV']
    };

    protected readonly conversions: UnitConversions = {
        temperature: fahrenheitToCelsius,
        dewPoint: fahrenheitToCelsius,
        pressureAbsolute: inhgToHpa,
        pressureMsl: inhgToHpa,
        windSpeed: mphToKmh,
        windGust: mphToKmh,
        precipTotal: inchesToMm
    };
}
