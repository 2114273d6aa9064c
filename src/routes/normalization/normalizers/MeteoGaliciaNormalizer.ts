import { BaseNormalizer, type FieldAliases } from '../BaseNormalizer';
import { msToKmh } from '../converters';
import { isRecord, parseNumber } from '../parse';
import type { RawPayload } from '../../../types';

type MeasureKind = 'temp' | 'rh' | 'pressure' | 'wind' | 'gust' | 'dir' | 'solar';

interface Classified {
    kind: MeasureKind;
    score: number;
}

/**
 * Classify a MeteoGalicia measure by its parameter code ("TA_AVG_1.5m", "VV_MAX_10m", ...).
 * Higher scores win when a station reports the same quantity several times.
 */
function classifyMeasure(code: string): Classified | undefined {
    const c = code.trim().toUpperCase().replace(/\s/g, '');
    const avgBonus = c.includes('_AVG_') ? 8 : 0;

    // Gust first, otherwise the generic wind rule would match it
    if (c.startsWith('VV_') && c.includes('_MAX_')) return { kind: 'gust', score: 80 };
    if (c.startsWith('DV_')) return { kind: 'dir', score: 70 + avgBonus };
    if (c.startsWith('VV_')) return { kind: 'wind', score: 60 + avgBonus + (c.includes('10M') ? 2 : 0) };
    if (c.startsWith('TA_')) return { kind: 'temp', score: 50 + avgBonus + (c.includes('1.5M') ? 2 : 0) };
    if (c.startsWith('HR_')) return { kind: 'rh', score: 45 + avgBonus };
    if (c.startsWith('PA_')) return { kind: 'pressure', score: 40 + avgBonus };
    if (c.startsWith('RS_') || c.startsWith('RG_')) return { kind: 'solar', score: 30 };
    return undefined;
}

/**
 * Normalizer for MeteoGalicia 10-minute observations (`/mgrss/observacion/ultimos10minEstacionsMeteo.action`).
 *
 * MeteoGalicia properties:
 * - Measurements arrive as `listaMedidas`, identified by parameter code rather than field name
 * - Validation codes 3 and 9 mark rejected values
 * - Units are given per measure in `unidade`
 * - The endpoint has no daily precipitation total; callers pass it as `precipToday` when they have it
 */
export class MeteoGaliciaNormalizer extends BaseNormalizer {
    readonly providerId = 'METEOGALICIA';
    readonly providerName = 'MeteoGalicia';

    protected readonly aliases: FieldAliases = {
        epoch: ['instanteLecturaUTC'],
        stationId: ['idEstacion'],
        stationName: ['estacion'],
        lat: ['lat'],
        lon: ['lon'],
        elevation: ['altitude'],
        temperature: ['temp'],
        humidity: ['rh'],
        pressureAbsolute: ['pressure'],
        windSpeed: ['wind'],
        windGust: ['gust'],
        windDirection: ['dir'],
        precipTotal: ['precipToday'],
        solarRadiation: ['solar']
    };

    protected prepare(payload: RawPayload): RawPayload {
        let station: RawPayload = payload;
        const list = payload['listUltimos10min'];
        const latest: unknown = Array.isArray(list) ? list[0] : undefined;
        if (isRecord(latest)) {
            station = { ...payload, ...latest };
        }

        const measures = station['listaMedidas'];
        if (!Array.isArray(measures)) {
            return station;
        }

        const best = new Map<MeasureKind, { score: number; value: number }>();
        for (const measure of measures) {
            if (!isRecord(measure)) continue;
            const validation = parseNumber(measure.lnCodigoValidacion);
            if (validation === 3 || validation === 9) continue;

            let value = parseNumber(measure.valor);
            if (Number.isNaN(value) || value <= -9999) continue;

            const classified = classifyMeasure(String(measure.codigoParametro ?? ''));
            if (!classified) continue;

            const unit = String(measure.unidade ?? '').toLowerCase();
            if ((classified.kind === 'wind' || classified.kind === 'gust') && unit.includes('m/s')) {
                value = msToKmh(value);
            }

            const current = best.get(classified.kind);
            if (!current || classified.score >= current.score) {
                best.set(classified.kind, { score: classified.score, value });
            }
        }

        const flat: Record<string, unknown> = { ...station };
        for (const [kind, { value }] of best) {
            flat[kind] = value;
        }
        return flat;
    }
}
