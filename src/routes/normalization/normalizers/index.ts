import type { ProviderId } from '../../../types';
import { CodedError, ErrorCode } from '../../../errors';
import type { BaseNormalizer } from '../BaseNormalizer';
import { AemetNormalizer } from './AemetNormalizer';
import { LocalNormalizer } from './LocalNormalizer';
import { MeteocatNormalizer } from './MeteocatNormalizer';
import { MeteoGaliciaNormalizer } from './MeteoGaliciaNormalizer';
import { NwsNormalizer } from './NwsNormalizer';
import { WUndergroundNormalizer } from './WUndergroundNormalizer';

export { AemetNormalizer, LocalNormalizer, MeteocatNormalizer, MeteoGaliciaNormalizer, NwsNormalizer, WUndergroundNormalizer };

// Euskalmet readings come as separate per-sensor series, they are only searchable as stations for now
const normalizers: ReadonlyMap<ProviderId, BaseNormalizer> = new Map<ProviderId, BaseNormalizer>([
    ['AEMET', new AemetNormalizer()],
    ['METEOCAT', new MeteocatNormalizer()],
    ['METEOGALICIA', new MeteoGaliciaNormalizer()],
    ['NWS', new NwsNormalizer()],
    ['WU', new WUndergroundNormalizer()],
    ['LOCAL', new LocalNormalizer()]
]);

const PROVIDER_IDS: readonly string[] = ['AEMET', 'METEOCAT', 'EUSKALMET', 'METEOGALICIA', 'NWS', 'WU', 'LOCAL'];

export function isProviderId(value: string): value is ProviderId {
    return PROVIDER_IDS.includes(value);
}

/**
 * Return the normalizer registered for a provider.
 * @throws CodedError(UnknownProvider) if the provider has none.
 */
export function getNormalizer(providerId: string): BaseNormalizer {
    const id = providerId.toUpperCase();
    const normalizer = isProviderId(id) ? normalizers.get(id) : undefined;
    if (!normalizer) {
        throw new CodedError(ErrorCode.UnknownProvider, `No normalizer for provider "${providerId}"`);
    }
    return normalizer;
}
