import { CodedError, ErrorCode } from "../errors";

/** Lower bound of the matching tolerance (seconds). */
const MIN_TOLERANCE = 30;

/**
 * Typical sampling step of a series: the median of the positive gaps between consecutive (sorted) timestamps.
 * @return The step in seconds, 0 if the series has fewer than two distinct timestamps.
 */
export function inferSamplingStep( times: readonly number[] ): number {
	const sorted = times.filter( Number.isFinite ).sort( ( a, b ) => a - b );
	const deltas: number[] = [];
	for ( let i = 1; i < sorted.length; i++ ) {
		const delta = sorted[ i ] - sorted[ i - 1 ];
		if ( delta > 0 ) {
			deltas.push( delta );
		}
	}
	if ( deltas.length === 0 ) {
		return 0;
	}

	deltas.sort( ( a, b ) => a - b );
	const middle = Math.floor( deltas.length / 2 );
	return deltas.length % 2 === 1 ? deltas[ middle ] : ( deltas[ middle - 1 ] + deltas[ middle ] ) / 2;
}

/**
 * Rate of change of an irregularly sampled series over a fixed lookback.
 *
 * For every sample, the earlier sample closest to `interval` before it is looked up. If it lies within the tolerance
 * (the largest of 30 s, 35% of the interval and 1.5 sampling steps) the trend is the value difference per hour of
 * interval, otherwise NaN. The input may be in any order; the output has one entry per input index.
 *
 * @param values The series values (NaN for gaps).
 * @param times Unix epoch seconds of each value.
 * @param intervalMinutes The lookback.
 * @throws CodedError(InvalidArgument) if the arrays differ in length or the interval is not positive.
 */
export function calculateTrend( values: readonly number[], times: readonly number[], intervalMinutes: number = 10 ): number[] {
	if ( values.length !== times.length ) {
		throw new CodedError( ErrorCode.InvalidArgument, `values and times differ in length (${ values.length } vs ${ times.length })` );
	}
	if ( !( intervalMinutes > 0 ) ) {
		throw new CodedError( ErrorCode.InvalidArgument, `intervalMinutes must be positive (got ${ intervalMinutes })` );
	}

	const interval = intervalMinutes * 60;
	const intervalHours = intervalMinutes / 60;
	const tolerance = Math.max( MIN_TOLERANCE, 0.35 * interval, 1.5 * inferSamplingStep( times ) );

	return times.map( ( time, i ) => {
		if ( !Number.isFinite( time ) || Number.isNaN( values[ i ] ) ) {
			return NaN;
		}

		const target = time - interval;
		let match = -1;
		let matchDistance = Infinity;
		times.forEach( ( candidate, j ) => {
			const distance = Math.abs( candidate - target );
			// Only earlier samples, so a sample never matches itself
			if ( candidate < time && distance < matchDistance ) {
				match = j;
				matchDistance = distance;
			}
		} );

		if ( match < 0 || matchDistance > tolerance || Number.isNaN( values[ match ] ) ) {
			return NaN;
		}
		return ( values[ i ] - values[ match ] ) / intervalHours;
	} );
}
