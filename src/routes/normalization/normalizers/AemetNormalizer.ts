import { BaseNormalizer, type FieldAliases, type UnitConversions } from '../BaseNormalizer';
import { msToKmh } from '../converters';

/**
 * Normalizer for AEMET OpenData observations (`/observacion/convencional/datos/estacion/{idema}`).
 *
 * AEMET characteristics:
 * - Wind speeds are in m/s
 * - Field names change between endpoints and stations (ta / TA / tpre ...)
 * - Values may be strings with comma decimals or "Ip" for precipitation too small to measure
 */
export class AemetNormalizer extends BaseNormalizer {
    readonly providerId = 'AEMET';
    readonly providerName = 'AEMET';

    protected readonly aliases: FieldAliases = {
        epoch: ['fint', 'Fecha', 'fhora'],
        stationId: ['idema', 'indicativo'],
        stationName: ['ubi', 'nombre'],
        lat: ['lat', 'latitud'],
        lon: ['lon', 'longitud'],
        elevation: ['alt', 'altitud', 'elev'],
        temperature: ['ta', 't', 'temp', 'tpre'],
        humidity: ['hr', 'hrel'],
        dewPoint: ['tpr'],
        pressureAbsolute: ['pres'],
        pressureMsl: ['pres_nmar', 'pnm'],
        windSpeed: ['vv', 'ff', 'viento'],
        windGust: ['vmax', 'fx', 'racha'],
        windDirection: ['dv', 'dd', 'dir'],
        precipTotal: ['prec', 'precip', 'pr', 'lluvia'],
        solarRadiation: ['rs', 'inso_rad'],
        uv: ['uvi']
    };

    protected readonly conversions: UnitConversions = {
        windSpeed: msToKmh,
        windGust: msToKmh
    };
}
