import { TZDate } from '@date-fns/tz';
import { getUnixTime, startOfDay } from 'date-fns';

import { BaseNormalizer, type FieldAliases, type UnitConversions } from '../BaseNormalizer';
import { msToKmh } from '../converters';
import { isRecord, parseEpoch, parseNumber } from '../parse';
import type { RawPayload } from '../../../types';

const METEOCAT_TIMEZONE = 'Europe/Madrid';

/**
 * Normalizer for Meteocat XEMA station measurements (`/xema/v1/estacions/mesurades/{codi}/{yyyy}/{mm}/{dd}`).
 *
 * Meteocat properties:
 * - Every variable is a numeric code (32 = temperature, 33 = RH, ...) with its own list of readings
 * - Readings are 30-minute aggregates; only the latest one per variable is used
 * - Wind speeds are in m/s at 10 m (code 30), falling back to 6 m (code 20)
 */
export class MeteocatNormalizer extends BaseNormalizer {
    readonly providerId = 'METEOCAT';
    readonly providerName = 'Meteocat';

    protected readonly aliases: FieldAliases = {
        epoch: ['epoch'],
        stationId: ['codi'],
        stationName: ['nom'],
        temperature: ['v32'],
        humidity: ['v33'],
        pressureAbsolute: ['v34'],
        windSpeed: ['v30', 'v20'],
        windGust: ['v50'],
        windDirection: ['v31', 'v21'],
        precipTotal: ['precipToday', 'v70'],
        solarRadiation: ['v36'],
        uv: ['v39']
    };

    protected readonly conversions: UnitConversions = {
        windSpeed: msToKmh,
        windGust: msToKmh
    };

    protected prepare(payload: RawPayload): RawPayload {
        const variables = payload['variables'];
        if (!Array.isArray(variables)) {
            return payload;
        }

        const flat: Record<string, unknown> = { ...payload };
        let latestEpoch = NaN;

        for (const variable of variables) {
            if (!isRecord(variable)) continue;
            const code = parseNumber(variable.codi);
            const readings: unknown = variable.lectures;
            if (Number.isNaN(code) || !Array.isArray(readings)) continue;

            let bestEpoch = NaN;
            let bestValue = NaN;
            for (const reading of readings) {
                if (!isRecord(reading)) continue;
                // "N" marks a reading Meteocat has invalidated
                if (reading.estat === 'N') continue;
                const epoch = parseEpoch(reading.data);
                if (!Number.isNaN(epoch) && !(epoch <= bestEpoch)) {
                    bestEpoch = epoch;
                    bestValue = parseNumber(reading.valor);
                }
            }

            flat[`v${code}`] = bestValue;
            if (!Number.isNaN(bestEpoch) && !(bestEpoch <= latestEpoch)) {
                latestEpoch = bestEpoch;
            }
        }

        if (!Number.isNaN(latestEpoch)) {
            flat['epoch'] = latestEpoch;
        }
        // 70 is the accumulated precipitation since midnight; without it, sum today's 30-minute totals (35)
        if (flat['v70'] === undefined) {
            flat['precipToday'] = this.sumToday(variables, latestEpoch);
        }
        return flat;
    }

    private sumToday(variables: unknown[], latestEpoch: number): number {
        const precip = variables.find(v => isRecord(v) && parseNumber(v.codi) === 35);
        const readings: unknown = isRecord(precip) ? precip.lectures : undefined;
        if (!Array.isArray(readings)) {
            return NaN;
        }
        // Meteocat days are Catalan local days
        const dayStart = getUnixTime(startOfDay(new TZDate(latestEpoch * 1000, METEOCAT_TIMEZONE)));
        let total = NaN;
        for (const reading of readings) {
            if (!isRecord(reading)) continue;
            const epoch = parseEpoch(reading.data);
            const value = parseNumber(reading.valor);
            if (epoch >= dayStart && !Number.isNaN(value)) {
                total = (Number.isNaN(total) ? 0 : total) + value;
            }
        }
        return total;
    }
}
