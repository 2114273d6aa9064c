import { BaseNormalizer, type FieldAliases } from '../BaseNormalizer';
import type { RawPayload } from '../../../types';

/**
 * Normalizer for the Weather Underground PWS API (`/v2/pws/observations/current?units=m`).
 *
 * The response wraps a single observation in `observations[0]`; metric values sit under `metric`.
 */
export class WUndergroundNormalizer extends BaseNormalizer {
    readonly providerId = 'WU';
    readonly providerName = 'WUnderground';

    protected readonly aliases: FieldAliases = {
        epoch: ['epoch', 'obsTimeUtc'],
        stationId: ['stationID'],
        stationName: ['neighborhood'],
        lat: ['lat'],
        lon: ['lon'],
        elevation: ['metric.elev'],
        temperature: ['metric.temp'],
        humidity: ['humidity'],
        dewPoint: ['metric.dewpt'],
        pressureMsl: ['metric.pressure'],
        windSpeed: ['metric.windSpeed'],
        windGust: ['metric.windGust'],
        windDirection: ['winddir'],
        precipTotal: ['metric.precipTotal'],
        solarRadiation: ['solarRadiation'],
        uv: ['uv']
    };

    protected prepare(payload: RawPayload): RawPayload {
        const observations = payload['observations'];
        if (Array.isArray(observations)) {
            const first: unknown = observations[0];
            if (typeof first === 'object' && first !== null && !Array.isArray(first)) {
                return Object.fromEntries(Object.entries(first));
            }
            this.warn('Response contains no observation');
            return {};
        }
        return payload;
    }
}
