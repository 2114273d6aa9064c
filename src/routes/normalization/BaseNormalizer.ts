import type { CanonicalReading, ProviderId, RawPayload, StationIdentity } from '../../types';
import { absoluteToMsl, compassToDegrees, mslToAbsolute, normalizeWindDirection } from './converters';
import { parseEpoch, parseNumber, resolveField, resolveNumber } from './parse';

/** Numeric fields of a CanonicalReading that come from a provider measurement. */
export type MeasureField =
    | 'temperature'
    | 'humidity'
    | 'dewPoint'
    | 'pressureAbsolute'
    | 'pressureMsl'
    | 'windSpeed'
    | 'windGust'
    | 'windDirection'
    | 'precipTotal'
    | 'solarRadiation'
    | 'uv';

/** Fields describing the time and the station rather than the weather. */
export type MetaField = 'epoch' | 'stationId' | 'stationName' | 'lat' | 'lon' | 'elevation';

/**
 * Declarative table of provider field names, tried in order, case-insensitive.
 * Dotted aliases ("metric.temp") descend into nested objects.
 */
export type FieldAliases = Readonly<Partial<Record<MeasureField | MetaField, readonly string[]>>>;

/** Converts a value from the provider's unit into the canonical unit. */
export type UnitConversions = Readonly<Partial<Record<MeasureField, (value: number) => number>>>;

/**
 * What the caller already knows about the station the payload belongs to.
 */
export interface NormalizationContext {
    stationId?: string;
    name?: string;
    lat?: number;
    lon?: number;
    /** User-supplied elevation in meters; wins over the provider's value. */
    elevation?: number;
    /** Unix epoch seconds used when the payload carries no usable timestamp. */
    now?: number;
}

/**
 * Abstract base class for reading normalizers.
 * Each provider implements a concrete normalizer that declares its alias table and source units.
 */
export abstract class BaseNormalizer {
    abstract readonly providerId: ProviderId;

    /**
     * Provider name used in logs (e.g. "AEMET", "NWS")
     */
    abstract readonly providerName: string;

    protected abstract readonly aliases: FieldAliases;

    protected readonly conversions: UnitConversions = {};

    /**
     * Normalize one raw provider payload into a CanonicalReading.
     * Never throws for bad data: missing or unparseable fields become NaN.
     *
     * @param payload - JSON-decoded provider response
     * @param context - station details known to the caller
     */
    normalize(payload: RawPayload, context: NormalizationContext = {}): CanonicalReading {
        const now = context.now ?? Date.now() / 1000;
        const data = this.prepare(payload);

        // The wall clock only resolves "now"; an unusable timestamp stays NaN
        const epoch = parseEpoch(resolveField(data, this.aliasesFor('epoch')), now);
        if (Number.isNaN(epoch)) {
            this.warn('No usable timestamp in payload');
        }

        const station = this.resolveStation(data, context);
        const temperature = this.readMeasure(data, 'temperature');

        let pressureAbsolute = this.readMeasure(data, 'pressureAbsolute');
        let pressureMsl = this.readMeasure(data, 'pressureMsl');
        if (Number.isNaN(station.elevation)) {
            // Unknown elevation: the station is taken to be at sea level
            if (Number.isNaN(pressureMsl)) {
                pressureMsl = pressureAbsolute;
            } else if (Number.isNaN(pressureAbsolute)) {
                pressureAbsolute = pressureMsl;
            }
        } else if (Number.isNaN(pressureMsl)) {
            pressureMsl = absoluteToMsl(pressureAbsolute, station.elevation, temperature);
        } else if (Number.isNaN(pressureAbsolute)) {
            pressureAbsolute = mslToAbsolute(pressureMsl, station.elevation, temperature);
        }

        return Object.freeze({
            epoch,
            temperature,
            humidity: this.readMeasure(data, 'humidity'),
            dewPoint: this.readMeasure(data, 'dewPoint'),
            pressureAbsolute,
            pressureMsl,
            windSpeed: this.readMeasure(data, 'windSpeed'),
            windGust: this.readMeasure(data, 'windGust'),
            windDirection: this.readDirection(data),
            precipTotal: this.readMeasure(data, 'precipTotal'),
            solarRadiation: this.readMeasure(data, 'solarRadiation'),
            uv: this.readMeasure(data, 'uv'),
            station: Object.freeze(station)
        });
    }

    /**
     * Reshape the payload before alias lookup. Providers that wrap their measurements in lists override this.
     */
    protected prepare(payload: RawPayload): RawPayload {
        return payload;
    }

    /**
     * Read one measurement in canonical units.
     */
    protected readMeasure(data: RawPayload, field: MeasureField): number {
        const value = resolveNumber(data, this.aliasesFor(field));
        const convert = this.conversions[field];
        return convert ? convert(value) : value;
    }

    /**
     * Wind direction in degrees, accepting compass names ("NNE", "SO", "Noroeste") as well.
     */
    protected readDirection(data: RawPayload): number {
        const raw = resolveField(data, this.aliasesFor('windDirection'));
        let degrees = parseNumber(raw);
        if (Number.isNaN(degrees) && typeof raw === 'string') {
            degrees = compassToDegrees(raw);
        }
        return normalizeWindDirection(degrees);
    }

    protected resolveStation(data: RawPayload, context: NormalizationContext): StationIdentity {
        const text = (field: MetaField): string | undefined => {
            const value = resolveField(data, this.aliasesFor(field));
            return typeof value === 'string' || typeof value === 'number' ? String(value).trim() : undefined;
        };
        const numberOr = (field: MetaField, fallback: number | undefined): number => {
            const value = resolveNumber(data, this.aliasesFor(field));
            return Number.isNaN(value) ? fallback ?? NaN : value;
        };

        const userElevation = context.elevation;
        return {
            providerId: this.providerId,
            stationId: text('stationId') || context.stationId || '',
            name: text('stationName') || context.name || '',
            lat: numberOr('lat', context.lat),
            lon: numberOr('lon', context.lon),
            elevation: userElevation !== undefined && Number.isFinite(userElevation)
                ? userElevation
                : numberOr('elevation', undefined)
        };
    }

    protected aliasesFor(field: MeasureField | MetaField): readonly string[] {
        return this.aliases[field] ?? [];
    }

    /**
     * Log warning.
     */
    protected warn(message: string): void {
        console.warn(`[${this.providerName} Normalizer] ${message}`);
    }
}
